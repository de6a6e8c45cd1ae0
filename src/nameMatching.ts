import { canonicalNameOf, NUTRIENT_REGISTRY } from "./nutrientRegistry";
import type { NutrientRegistry, NutrientSpec } from "./types";
import { unitsMatch } from "./unitReconciler";
import { escapeRegex, foldOcrConfusables, normalizeLookupKey } from "./utils";

const SHORT_TERM_LENGTH = 3;
const TOKEN_JOINER = "[^A-Za-z0-9\\n]{0,3}";

/**
 * Surface forms a report may use for one nutrient: the canonical name, its
 * spaceless, underscored and hyphenated spellings, then every alias.
 */
export const buildNameVariants = (spec: NutrientSpec): string[] => {
  const canonical = canonicalNameOf(spec.key);
  const variants = [
    canonical,
    canonical.replace(/\s+/g, ""),
    canonical.replace(/\s+/g, "_"),
    canonical.replace(/\s+/g, "-"),
    ...spec.aliases
  ];
  return Array.from(new Set(variants.map((variant) => variant.trim().toLowerCase()).filter(Boolean)));
};

/**
 * Regex source for a name variant. Word tokens may be separated by up to
 * three non-alphanumeric characters so "25(OH)D", "25-OH D" and "25{OH)D"
 * all match the same variant.
 */
export const variantPatternSource = (variant: string): string | null => {
  const tokens = variant
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter(Boolean)
    .map(escapeRegex);
  if (tokens.length === 0) {
    return null;
  }
  return `(?<![A-Za-z0-9])${tokens.join(TOKEN_JOINER)}(?![A-Za-z0-9])`;
};

const containsTerm = (haystack: string, term: string): boolean => {
  if (!term) {
    return false;
  }
  if (term.replace(/\s+/g, "").length <= SHORT_TERM_LENGTH) {
    return ` ${haystack} `.includes(` ${term} `);
  }
  return haystack.includes(term);
};

interface TermHit {
  spec: NutrientSpec;
  length: number;
}

const termsOf = (spec: NutrientSpec): string[] =>
  Array.from(new Set([canonicalNameOf(spec.key), ...spec.aliases].map(normalizeLookupKey).filter(Boolean)));

const collectSubstringHits = (
  candidate: string,
  registry: NutrientRegistry,
  transform: (value: string) => string
): TermHit[] => {
  const haystack = transform(candidate);
  const hits: TermHit[] = [];
  for (const spec of registry.all()) {
    let best = 0;
    for (const term of termsOf(spec)) {
      const needle = transform(term);
      if (needle.length > best && containsTerm(haystack, needle)) {
        best = needle.length;
      }
    }
    if (best > 0) {
      hits.push({ spec, length: best });
    }
  }
  // Stable sort keeps registry order between equally long terms.
  return hits.sort((left, right) => right.length - left.length);
};

const collectWordHits = (candidate: string, registry: NutrientRegistry): TermHit[] => {
  const candidateWords = candidate.split(" ").filter(Boolean);
  const hits: Array<TermHit & { ratio: number }> = [];

  for (const spec of registry.all()) {
    const words = canonicalNameOf(spec.key).split(" ").filter(Boolean);
    const matched = words.filter((word) =>
      word.length <= SHORT_TERM_LENGTH
        ? candidateWords.includes(word)
        : candidateWords.some((candidateWord) => candidateWord.includes(word))
    );
    const ratio = matched.length / words.length;
    // A lone single-letter word such as the "d" of "vitamin d" is not evidence.
    if (ratio >= 0.5 && matched.some((word) => word.length >= SHORT_TERM_LENGTH)) {
      hits.push({ spec, length: matched.join("").length, ratio });
    }
  }

  return hits.sort((left, right) => right.ratio - left.ratio || right.length - left.length);
};

/**
 * Maps a free-text test name onto a nutrient.
 *
 * Substring hits on the canonical name or an alias win first (longest term
 * first, so "HDL Cholesterol" is not read as total cholesterol), then the
 * same check on OCR-folded text, then word overlap with at least half of the
 * canonical name's words. The unit has to be compatible; a missing unit is.
 * Word overlap is only tried when no known name occurs in the text at all.
 */
export const resolveNutrientName = (
  rawName: string,
  unit: string | null | undefined,
  registry: NutrientRegistry = NUTRIENT_REGISTRY
): NutrientSpec | undefined => {
  const candidate = normalizeLookupKey(rawName);
  if (!candidate || !/[a-z]/.test(candidate)) {
    return undefined;
  }

  const passes: Array<() => TermHit[]> = [
    () => collectSubstringHits(candidate, registry, (value) => value),
    () => collectSubstringHits(candidate, registry, foldOcrConfusables)
  ];

  let namedByTerm = false;
  for (const pass of passes) {
    const hits = pass();
    if (hits.length === 0) {
      continue;
    }
    namedByTerm = true;
    const compatible = hits.find((hit) => unitsMatch(unit, hit.spec.key, registry));
    if (compatible) {
      return compatible.spec;
    }
  }

  // "Vitamin D" in nmol/L stays unresolved rather than becoming another vitamin.
  if (namedByTerm) {
    return undefined;
  }
  return collectWordHits(candidate, registry).find((hit) => unitsMatch(unit, hit.spec.key, registry))?.spec;
};
