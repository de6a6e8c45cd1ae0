import { DIRECT_PATTERN_TIERS } from "../constants";
import { buildNameVariants, variantPatternSource } from "../nameMatching";
import { isPlausibleValue } from "../plausibility";
import type {
  DirectPatternTier,
  ExtractionCandidate,
  NutrientRegistry,
  NutrientSpec,
  PartialExtraction,
  StrategyContext
} from "../types";
import { isLikelyUnit, unitsMatch } from "../unitReconciler";
import { normalizeLookupKey, safeNumber } from "../utils";
import { NUMBER_SOURCE, UNIT_SOURCE } from "./shared";

interface CompiledTier {
  tier: DirectPatternTier;
  pattern: RegExp;
  requiresUnit: boolean;
}

interface CompiledVariant {
  variant: string;
  tiers: CompiledTier[];
}

interface CompiledNutrient {
  spec: NutrientSpec;
  variants: CompiledVariant[];
  // Longer names of other nutrients that contain one of this nutrient's names.
  shadows: RegExp[];
}

const SPACE = "[^\\S\\n]";
// ", Serum" or "(Total)" between a name and its value.
const QUALIFIER = `(?:${SPACE}*(?:,[^\\n\\d:=|]{0,25}?|\\([^)\\n]{0,20}\\)))?`;
const VALUE = `(?<value>${NUMBER_SOURCE})`;
const UNIT = `(?<unit>${UNIT_SOURCE})`;

// A single space separates name and value in prose; wider gaps are table
// cells and rank below the table strategy.
const TIER_TEMPLATES: Record<DirectPatternTier, { build: (name: string) => string; requiresUnit: boolean }> = {
  colonWithUnit: {
    build: (name) => `${name}${QUALIFIER}${SPACE}*[:=]${SPACE}*${VALUE}${SPACE}*${UNIT}`,
    requiresUnit: true
  },
  spaceWithUnit: {
    build: (name) => `${name}${QUALIFIER}${SPACE}${VALUE}${SPACE}*${UNIT}`,
    requiresUnit: true
  },
  reversed: {
    build: (name) => `${VALUE}${SPACE}*${UNIT}${SPACE}+(?:(?:of|for)${SPACE}+)?${name}`,
    requiresUnit: true
  },
  tableCell: {
    build: (name) =>
      `${name}${QUALIFIER}${SPACE}*(?:\\||\\t|${SPACE}{2,})${SPACE}*${VALUE}(?:${SPACE}*(?:\\||\\t)?${SPACE}*${UNIT})?`,
    requiresUnit: false
  },
  parenthetical: {
    build: (name) => `${name}${QUALIFIER}${SPACE}*\\(${SPACE}*${VALUE}${SPACE}*${UNIT}?${SPACE}*\\)`,
    requiresUnit: false
  },
  range: {
    build: (name) =>
      `${name}${QUALIFIER}${SPACE}*[:=]?${SPACE}*${VALUE}${SPACE}*[-–]${SPACE}*\\d+(?:[.,]\\d+)?(?:${SPACE}*${UNIT})?`,
    requiresUnit: false
  },
  footnote: {
    build: (name) =>
      `${name}${QUALIFIER}${SPACE}*[:=]?${SPACE}*${VALUE}${SPACE}*(?:[*†‡§#]+|[HL](?![A-Za-z]))(?:${SPACE}*${UNIT})?`,
    requiresUnit: false
  },
  bareValue: {
    build: (name) => `${name}${QUALIFIER}${SPACE}*[:=]?${SPACE}*${VALUE}(?:${SPACE}*${UNIT})?`,
    requiresUnit: false
  }
};

const compileOrWarn = (source: string, flags: string, id: string): RegExp | null => {
  try {
    return new RegExp(source, flags);
  } catch (error) {
    console.warn(`Skipping direct pattern ${id}: ${error instanceof Error ? error.message : String(error)}`);
    return null;
  }
};

const containsWholeTerm = (longer: string, shorter: string): boolean =>
  longer !== shorter && ` ${longer} `.includes(` ${shorter} `);

const compileRegistry = (registry: NutrientRegistry): CompiledNutrient[] => {
  const specs = registry.all();
  const variantsByKey = new Map(specs.map((spec) => [spec.key, buildNameVariants(spec)] as const));

  return specs.map((spec) => {
    const own = variantsByKey.get(spec.key) ?? [];
    const variants: CompiledVariant[] = [];
    for (const variant of own) {
      const nameSource = variantPatternSource(variant);
      if (!nameSource) {
        continue;
      }
      const tiers: CompiledTier[] = [];
      for (const tier of DIRECT_PATTERN_TIERS) {
        const template = TIER_TEMPLATES[tier];
        const pattern = compileOrWarn(template.build(`(?<name>${nameSource})`), "gid", `${spec.key}/${variant}/${tier}`);
        if (pattern) {
          tiers.push({ tier, pattern, requiresUnit: template.requiresUnit });
        }
      }
      variants.push({ variant, tiers });
    }

    const ownTerms = own.map(normalizeLookupKey);
    const shadows: RegExp[] = [];
    for (const other of specs) {
      if (other.key === spec.key) {
        continue;
      }
      for (const otherVariant of variantsByKey.get(other.key) ?? []) {
        const otherTerm = normalizeLookupKey(otherVariant);
        if (!ownTerms.some((term) => containsWholeTerm(otherTerm, term))) {
          continue;
        }
        const source = variantPatternSource(otherVariant);
        const pattern = source ? compileOrWarn(source, "gi", `${other.key}/${otherVariant}/shadow`) : null;
        if (pattern) {
          shadows.push(pattern);
        }
      }
    }

    return { spec, variants, shadows };
  });
};

const compiledByRegistry = new WeakMap<NutrientRegistry, CompiledNutrient[]>();

const compiledFor = (registry: NutrientRegistry): CompiledNutrient[] => {
  const cached = compiledByRegistry.get(registry);
  if (cached) {
    return cached;
  }
  const compiled = compileRegistry(registry);
  compiledByRegistry.set(registry, compiled);
  return compiled;
};

const lineAround = (text: string, start: number, end: number): { line: string; offset: number } => {
  const lineStart = text.lastIndexOf("\n", start - 1) + 1;
  const newline = text.indexOf("\n", end);
  const lineEnd = newline === -1 ? text.length : newline;
  return { line: text.slice(lineStart, lineEnd), offset: lineStart };
};

// "Cholesterol" inside "HDL Cholesterol" belongs to HDL, not to total cholesterol.
const isShadowed = (text: string, nameStart: number, nameEnd: number, shadows: RegExp[]): boolean => {
  if (shadows.length === 0) {
    return false;
  }
  const { line, offset } = lineAround(text, nameStart, nameEnd);
  return shadows.some((shadow) =>
    Array.from(line.matchAll(shadow)).some((match) => {
      const start = offset + (match.index ?? 0);
      return start <= nameStart && start + match[0].length >= nameEnd && match[0].length > nameEnd - nameStart;
    })
  );
};

interface TierHit {
  tier: DirectPatternTier;
  value: number;
}

const firstHitForVariant = (
  text: string,
  compiled: CompiledVariant,
  nutrient: CompiledNutrient,
  registry: NutrientRegistry
): TierHit | null => {
  const key = nutrient.spec.key;
  for (const { tier, pattern, requiresUnit } of compiled.tiers) {
    for (const match of text.matchAll(pattern)) {
      const value = safeNumber(match.groups?.value);
      if (value === null) {
        continue;
      }
      // A trailing word that is not a unit ("25 Low") neither supplies nor blocks a unit.
      const unit = match.groups?.unit ?? "";
      const unitLike = unit !== "" && isLikelyUnit(unit);
      if (requiresUnit ? !unitLike || !unitsMatch(unit, key, registry) : unitLike && !unitsMatch(unit, key, registry)) {
        continue;
      }
      if (!isPlausibleValue(key, value, registry)) {
        continue;
      }
      const nameSpan = match.indices?.groups?.name;
      if (nameSpan && isShadowed(text, nameSpan[0], nameSpan[1], nutrient.shadows)) {
        continue;
      }
      return { tier, value };
    }
  }
  return null;
};

/**
 * Name-anchored regex tiers, tried from the most to the least specific for
 * every name variant. The best tier over all variants supplies the value.
 */
export const extractDirectPatterns = (text: string, context: StrategyContext): PartialExtraction => {
  const found: PartialExtraction = new Map();
  const { registry, settings } = context;

  for (const nutrient of compiledFor(registry)) {
    let best: ExtractionCandidate | null = null;
    for (const variant of nutrient.variants) {
      const hit = firstHitForVariant(text, variant, nutrient, registry);
      if (!hit) {
        continue;
      }
      const confidence = settings.directTiers[hit.tier];
      if (!best || confidence > best.confidence) {
        best = { nutrientKey: nutrient.spec.key, value: hit.value, confidence, sourceStrategy: "direct" };
      }
    }
    if (best) {
      found.set(best.nutrientKey, best);
    }
  }

  return found;
};
