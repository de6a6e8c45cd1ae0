import { NUTRIENT_REGISTRY } from "./nutrientRegistry";
import type { ExtractionResult, InterpretedValue, NutrientRegistry } from "./types";
import { deriveStatus } from "./utils";

/** Values in registry order, each with its label, unit and status against the normal range. */
export const interpretExtraction = (
  result: ExtractionResult,
  registry: NutrientRegistry = NUTRIENT_REGISTRY
): InterpretedValue[] => {
  const interpreted: InterpretedValue[] = [];
  for (const spec of registry.all()) {
    const value = result.values[spec.key];
    if (value === undefined) {
      continue;
    }
    interpreted.push({
      key: spec.key,
      label: spec.label,
      value,
      unit: spec.unit,
      normalRange: { ...spec.normalRange },
      status: deriveStatus(value, spec.normalRange),
      confidence: result.confidence[spec.key] ?? 0
    });
  }
  return interpreted;
};

export const formatBloodValueSummary = (
  result: ExtractionResult,
  registry: NutrientRegistry = NUTRIENT_REGISTRY
): string =>
  interpretExtraction(result, registry)
    .map(
      (entry) =>
        `- ${entry.label}: ${entry.value} ${entry.unit} (Normal range: ${entry.normalRange.low}-${entry.normalRange.high} ${entry.unit})`
    )
    .join("\n");

export const findDeficiencies = (result: ExtractionResult, registry: NutrientRegistry = NUTRIENT_REGISTRY): string[] =>
  interpretExtraction(result, registry)
    .filter((entry) => entry.status === "low")
    .map((entry) => entry.key);
