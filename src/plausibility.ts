import { NUTRIENT_REGISTRY } from "./nutrientRegistry";
import type { ExtractionCandidate, NutrientRegistry, ValueRange } from "./types";

export const UNIVERSAL_PLAUSIBLE_RANGE: Readonly<ValueRange> = Object.freeze({ low: 0.01, high: 10000 });

export const plausibleRangeOf = (
  nutrientKey: string,
  registry: NutrientRegistry = NUTRIENT_REGISTRY
): Readonly<ValueRange> => registry.lookup(nutrientKey)?.plausibleRange ?? UNIVERSAL_PLAUSIBLE_RANGE;

export const isPlausibleValue = (
  nutrientKey: string,
  value: number,
  registry: NutrientRegistry = NUTRIENT_REGISTRY
): boolean => {
  if (!Number.isFinite(value) || value <= 0) {
    return false;
  }
  const range = plausibleRangeOf(nutrientKey, registry);
  return value >= range.low && value <= range.high;
};

export const filterPlausibleCandidates = (
  candidates: Iterable<ExtractionCandidate>,
  registry: NutrientRegistry = NUTRIENT_REGISTRY
): ExtractionCandidate[] =>
  Array.from(candidates).filter((candidate) => isPlausibleValue(candidate.nutrientKey, candidate.value, registry));
