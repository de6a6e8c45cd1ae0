import { resolveNutrientName } from "../nameMatching";
import type { PartialExtraction, StrategyContext } from "../types";
import { safeNumber } from "../utils";
import { NUMBER_SOURCE, offerCandidate, UNIT_SOURCE } from "./shared";

const NAME = "([A-Za-z][A-Za-z0-9 ,()'\\-]{1,40}?)";
const VALUE = `(?:about\\s+|approximately\\s+|around\\s+)?(${NUMBER_SOURCE})`;
const UNIT = `(?:\\s*(${UNIT_SOURCE}))?`;

// Each pattern captures name, value and an optional unit, in that order.
const SENTENCE_PATTERNS: readonly RegExp[] = [
  new RegExp(
    `${NAME}\\s+(?:level|value|result|reading|concentration)s?\\s+(?:is|was|of|measures|measured|came back at|at)\\s+${VALUE}${UNIT}`,
    "gi"
  ),
  new RegExp(`${NAME}\\s*:\\s*${VALUE}\\s*(${UNIT_SOURCE})`, "gi"),
  new RegExp(`level\\s+of\\s+${NAME}\\s+(?:is|was)\\s+${VALUE}${UNIT}`, "gi")
];

export const splitSentences = (text: string): string[] =>
  text
    .split(/(?<!\d)[.!?;](?!\d)|\n/)
    .map((sentence) => sentence.replace(/^\s*(?:[-*•]|\d+[.)])\s+/, "").trim())
    .filter(Boolean);

/** Prose such as "Your vitamin D level is 25 ng/mL". */
export const extractNaturalLanguage = (text: string, context: StrategyContext): PartialExtraction => {
  const found: PartialExtraction = new Map();
  const { registry, settings } = context;

  for (const sentence of splitSentences(text)) {
    for (const pattern of SENTENCE_PATTERNS) {
      for (const match of sentence.matchAll(pattern)) {
        const value = safeNumber(match[2]);
        if (value === null) {
          continue;
        }
        const spec = resolveNutrientName(match[1], match[3] ?? "", registry);
        if (!spec) {
          continue;
        }
        offerCandidate(
          found,
          { nutrientKey: spec.key, value, confidence: settings.nlpConfidence, sourceStrategy: "nlp" },
          registry
        );
      }
    }
  }

  return found;
};
