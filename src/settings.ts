import { z } from "zod";
import { DEFAULT_EXTRACTION_SETTINGS, DIRECT_PATTERN_TIERS } from "./constants";
import type { ExtractionSettings, ExtractionSettingsOverrides } from "./types";
import { clip } from "./utils";

const weight = z.number().finite().transform((value) => clip(value, 0, 1));

const overridesSchema = z.object({
  directTiers: z
    .object({
      colonWithUnit: weight,
      spaceWithUnit: weight,
      reversed: weight,
      tableCell: weight,
      parenthetical: weight,
      range: weight,
      footnote: weight,
      bareValue: weight
    })
    .partial()
    .optional(),
  tableConfidence: weight.optional(),
  positionalConfidence: weight.optional(),
  nlpConfidence: weight.optional(),
  fallbackScale: weight.optional(),
  minimumExpectedValues: z.number().int().min(0).optional(),
  insufficientWordCount: z.number().int().min(0).optional()
});

/**
 * Merges caller overrides onto the defaults. Weights are clamped into [0, 1];
 * an override that fails validation is reported and the defaults are used.
 */
export const resolveExtractionSettings = (overrides?: ExtractionSettingsOverrides): ExtractionSettings => {
  if (!overrides) {
    return DEFAULT_EXTRACTION_SETTINGS;
  }

  const parsed = overridesSchema.safeParse(overrides);
  if (!parsed.success) {
    console.warn(`Ignoring invalid extraction settings: ${parsed.error.issues.map((issue) => issue.message).join("; ")}`);
    return DEFAULT_EXTRACTION_SETTINGS;
  }

  const { directTiers, ...rest } = parsed.data;
  const defaults = DEFAULT_EXTRACTION_SETTINGS;
  const tiers = { ...defaults.directTiers };
  for (const tier of DIRECT_PATTERN_TIERS) {
    tiers[tier] = directTiers?.[tier] ?? defaults.directTiers[tier];
  }

  return {
    directTiers: tiers,
    tableConfidence: rest.tableConfidence ?? defaults.tableConfidence,
    positionalConfidence: rest.positionalConfidence ?? defaults.positionalConfidence,
    nlpConfidence: rest.nlpConfidence ?? defaults.nlpConfidence,
    fallbackScale: rest.fallbackScale ?? defaults.fallbackScale,
    minimumExpectedValues: rest.minimumExpectedValues ?? defaults.minimumExpectedValues,
    insufficientWordCount: rest.insufficientWordCount ?? defaults.insufficientWordCount
  };
};
