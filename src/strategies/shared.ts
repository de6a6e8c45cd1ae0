import { isPlausibleValue } from "../plausibility";
import type { ExtractionCandidate, NutrientRegistry, PartialExtraction } from "../types";
import { isLikelyUnit } from "../unitReconciler";
import { safeNumber } from "../utils";

// "1,200" groups thousands; otherwise a comma is a decimal separator. The
// lookahead keeps "22.5" from being read as "22". A minus sign counts unless
// it joins a range ("30-100") or a name ("B-12").
export const NUMBER_SOURCE =
  "(?:(?<![\\dA-Za-z])-)?(?:\\d{1,3}(?:,\\d{3})+(?:\\.\\d+)?|\\d+(?:[.,]\\d+)?)(?![.,]?\\d)";
// "ng per ml" is one unit.
export const UNIT_SOURCE =
  "(?:[A-Za-zµμ]+[^\\S\\n]+per[^\\S\\n]+[A-Za-zµμ]+(?![A-Za-z0-9])|[xX×]?10[\\^*]?\\d{1,2}\\/[A-Za-zµμ]+|%|[A-Za-zµμ][A-Za-z0-9%µμ/.\\-^²]*)";

const FIRST_NUMBER_PATTERN = new RegExp(`(${NUMBER_SOURCE})`);

export const splitLines = (text: string): string[] =>
  text
    .replace(/\r\n?/g, "\n")
    .split("\n")
    .map((line) => line.replace(/ /g, " ").replace(/\s+$/, ""));

/** First number in a chunk plus whatever text follows it. */
export const readLeadingNumber = (chunk: string): { value: number; rest: string } | null => {
  const match = chunk.match(FIRST_NUMBER_PATTERN);
  if (!match || match.index === undefined) {
    return null;
  }
  const value = safeNumber(match[1]);
  if (value === null) {
    return null;
  }
  return { value, rest: chunk.slice(match.index + match[0].length) };
};

const SPELLED_UNIT_PATTERN = /([A-Za-zµμ]+)\s+per\s+([A-Za-zµμ]+)(?![A-Za-z0-9])/gi;

export const findUnitToken = (chunks: string[]): string => {
  for (const chunk of chunks) {
    const token = chunk
      .replace(SPELLED_UNIT_PATTERN, "$1/$2")
      .split(/\s+/)
      .map((part) => part.replace(/^[*†‡§#]+/, ""))
      .find((part) => isLikelyUnit(part));
    if (token) {
      return token.replace(/[.,;:)\]]+$/, "");
    }
  }
  return "";
};

/**
 * Records a candidate unless the nutrient already has one. An implausible
 * earlier candidate still gives way to a plausible later one.
 */
export const offerCandidate = (
  found: PartialExtraction,
  candidate: ExtractionCandidate,
  registry: NutrientRegistry
): void => {
  const existing = found.get(candidate.nutrientKey);
  if (!existing) {
    found.set(candidate.nutrientKey, candidate);
    return;
  }
  if (
    !isPlausibleValue(existing.nutrientKey, existing.value, registry) &&
    isPlausibleValue(candidate.nutrientKey, candidate.value, registry)
  ) {
    found.set(candidate.nutrientKey, candidate);
  }
};
