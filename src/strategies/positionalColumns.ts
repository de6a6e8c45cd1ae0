import { resolveNutrientName } from "../nameMatching";
import type { PartialExtraction, StrategyContext } from "../types";
import { isLikelyUnit } from "../unitReconciler";
import { findUnitToken, offerCandidate, readLeadingNumber, splitLines } from "./shared";

const COLUMN_GAP_PATTERN = /\s{2,}|\t/;
const VALUE_PART_PATTERN = /^[<>≤≥]?\s*\d/;

// "25(OH)D" starts with digits but is still a name.
const looksLikeName = (part: string): boolean =>
  /[A-Za-z]/.test(part) && !isLikelyUnit(part) && !VALUE_PART_PATTERN.test(part.replace(/^\d+\s*\(/, ""));

/**
 * Treats runs of two or more spaces as column gaps. A name column is paired
 * with the next column that holds a number; the unit may trail the number
 * or sit in one of the next two columns.
 */
export const extractPositionalColumns = (text: string, context: StrategyContext): PartialExtraction => {
  const found: PartialExtraction = new Map();
  const { registry, settings } = context;

  for (const line of splitLines(text)) {
    const parts = line
      .split(COLUMN_GAP_PATTERN)
      .map((part) => part.trim())
      .filter(Boolean);
    if (parts.length < 2) {
      continue;
    }

    let index = 0;
    while (index < parts.length - 1) {
      const name = parts[index];
      if (!looksLikeName(name)) {
        index += 1;
        continue;
      }

      const valueIndex = parts.findIndex((part, position) => position > index && VALUE_PART_PATTERN.test(part));
      if (valueIndex === -1) {
        break;
      }
      const parsed = readLeadingNumber(parts[valueIndex]);
      if (!parsed) {
        index = valueIndex + 1;
        continue;
      }

      const unit = findUnitToken([parsed.rest, parts[valueIndex + 1] ?? "", parts[valueIndex + 2] ?? ""]);
      const spec = resolveNutrientName(name, unit, registry);
      if (spec) {
        offerCandidate(
          found,
          {
            nutrientKey: spec.key,
            value: parsed.value,
            confidence: settings.positionalConfidence,
            sourceStrategy: "positional"
          },
          registry
        );
      }
      index = valueIndex + 1;
    }
  }

  return found;
};
