import { arbitrateCandidates } from "./arbitration";
import { STRATEGY_PRIORITY } from "./constants";
import { NUTRIENT_REGISTRY } from "./nutrientRegistry";
import { isPlausibleValue } from "./plausibility";
import { resolveExtractionSettings } from "./settings";
import { EXTRACTION_STRATEGIES } from "./strategies";
import type {
  ExtractionCandidate,
  ExtractionOptions,
  ExtractionResult,
  NutrientRegistry,
  PartialExtraction,
  StrategyContext,
  StrategyId
} from "./types";

const buildContext = (options: ExtractionOptions = {}): StrategyContext => ({
  registry: options.registry ?? NUTRIENT_REGISTRY,
  settings: resolveExtractionSettings(options.settings)
});

const runStrategies = (text: string, context: StrategyContext): Record<StrategyId, PartialExtraction> => {
  const partials: Record<StrategyId, PartialExtraction> = {
    direct: new Map(),
    table: new Map(),
    positional: new Map(),
    nlp: new Map(),
    fallback: new Map()
  };
  if (!text.trim()) {
    return partials;
  }
  for (const strategy of STRATEGY_PRIORITY) {
    partials[strategy] = EXTRACTION_STRATEGIES[strategy](text, context);
  }
  return partials;
};

const toResult = (candidates: Map<string, ExtractionCandidate>, registry: NutrientRegistry): ExtractionResult => {
  const values: Record<string, number> = {};
  const confidence: Record<string, number> = {};
  const sources: Record<string, StrategyId> = {};

  // Registry order keeps the output stable no matter which strategy found what.
  for (const spec of registry.all()) {
    const candidate = candidates.get(spec.key);
    if (!candidate || !isPlausibleValue(spec.key, candidate.value, registry)) {
      continue;
    }
    values[spec.key] = candidate.value;
    confidence[spec.key] = candidate.confidence;
    sources[spec.key] = candidate.sourceStrategy;
  }

  return Object.freeze({
    values: Object.freeze(values),
    confidence: Object.freeze(confidence),
    sources: Object.freeze(sources)
  });
};

/** Per-strategy candidates before arbitration, for inspection tooling. */
export const runExtractionStrategies = (
  text: string,
  options?: ExtractionOptions
): Record<StrategyId, PartialExtraction> => runStrategies(text, buildContext(options));

/**
 * Runs all five strategies over the report text, keeps the most confident
 * candidate per nutrient and drops values outside the plausible range.
 * Never throws for malformed text; the worst case is an empty result.
 */
export const extractBloodTestValues = (text: string, options?: ExtractionOptions): ExtractionResult => {
  const context = buildContext(options);
  const merged = arbitrateCandidates(runStrategies(text, context));
  return toResult(merged, context.registry);
};

export const __extractionInternals = {
  buildContext,
  toResult
};
