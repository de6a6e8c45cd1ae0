import { STRATEGY_PRIORITY } from "./constants";
import type { ExtractionCandidate, PartialExtraction, StrategyId } from "./types";

/**
 * Folds the per-strategy results in priority order. A later strategy only
 * replaces a kept candidate with a strictly higher confidence, so ties go to
 * the stricter strategy.
 */
export const arbitrateCandidates = (
  partials: Partial<Record<StrategyId, PartialExtraction>>
): Map<string, ExtractionCandidate> => {
  const merged = new Map<string, ExtractionCandidate>();

  for (const strategy of STRATEGY_PRIORITY) {
    const partial = partials[strategy];
    if (!partial) {
      continue;
    }
    for (const candidate of partial.values()) {
      const kept = merged.get(candidate.nutrientKey);
      if (!kept || candidate.confidence > kept.confidence) {
        merged.set(candidate.nutrientKey, candidate);
      }
    }
  }

  return merged;
};
