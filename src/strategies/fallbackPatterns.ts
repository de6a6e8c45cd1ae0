import type { PartialExtraction, StrategyContext } from "../types";
import { isLikelyUnit, unitsMatch } from "../unitReconciler";
import { clip, safeNumber } from "../utils";
import { offerCandidate, UNIT_SOURCE } from "./shared";

// The gap never swallows the sign of a value such as "Glucose -95".
const GAP = "[^\\d\\n]{0,30}?(?<![\\s:=]-)";
// The unit is only looked at, so a following name stays available.
const NUM = `((?:(?<![\\dA-Za-z])-)?\\d+(?:[.,]\\d+)?)(?![.,]?\\d)(?=(?:[^\\S\\n]*(${UNIT_SOURCE}))?)`;

interface FallbackPattern {
  nutrientKey: string;
  pattern: RegExp;
  confidence: number;
}

// Loose last-resort patterns for the nutrients that matter most. Only a unit
// that names another scale rules a value out; the plausibility filter has the
// final word on the rest.
const FALLBACK_PATTERNS: readonly FallbackPattern[] = [
  {
    nutrientKey: "vitamin_d",
    pattern: new RegExp(`(?:vitamin\\s*d(?![a-z])|25\\s*[({]?\\s*oh\\s*\\)?\\s*d?)${GAP}${NUM}`, "gi"),
    confidence: 0.6
  },
  {
    nutrientKey: "vitamin_b12",
    pattern: new RegExp(`(?<![a-z])(?:vitamin\\s*)?b[\\s-]?12(?!\\d)${GAP}${NUM}`, "gi"),
    confidence: 0.6
  },
  {
    nutrientKey: "iron",
    pattern: new RegExp(
      `(?<![a-z])[il1]ron(?![a-z])(?!\\s*(?:binding|saturation|studies|panel))${GAP}${NUM}`,
      "gi"
    ),
    confidence: 0.55
  },
  {
    nutrientKey: "ferritin",
    pattern: new RegExp(`ferritin${GAP}${NUM}`, "gi"),
    confidence: 0.65
  },
  {
    nutrientKey: "hemoglobin",
    pattern: new RegExp(`(?<!(?:glycated|corpuscular)\\s+)ha?emoglobin(?!\\s*a1c)${GAP}${NUM}`, "gi"),
    confidence: 0.6
  },
  {
    nutrientKey: "glucose",
    pattern: new RegExp(`glucose${GAP}${NUM}`, "gi"),
    confidence: 0.65
  },
  {
    nutrientKey: "total_cholesterol",
    pattern: new RegExp(`(?<!(?:non-?\\s*)?(?:ldl|hdl)[\\s-]*)cholesterol${GAP}${NUM}`, "gi"),
    confidence: 0.5
  }
];

/**
 * Last-resort patterns, only for nutrients the registry knows. Confidences
 * are scaled by `fallbackScale`.
 */
export const extractFallbackPatterns = (text: string, context: StrategyContext): PartialExtraction => {
  const found: PartialExtraction = new Map();
  const { registry, settings } = context;

  for (const { nutrientKey, pattern, confidence } of FALLBACK_PATTERNS) {
    if (!registry.lookup(nutrientKey)) {
      continue;
    }
    for (const match of text.matchAll(pattern)) {
      const value = safeNumber(match[1]);
      if (value === null) {
        continue;
      }
      const unit = match[2] ?? "";
      if (isLikelyUnit(unit) && !unitsMatch(unit, nutrientKey, registry)) {
        continue;
      }
      offerCandidate(
        found,
        {
          nutrientKey,
          value,
          confidence: clip(confidence * settings.fallbackScale, 0, 1),
          sourceStrategy: "fallback"
        },
        registry
      );
    }
  }

  return found;
};
