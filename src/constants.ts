import type { DirectPatternTier, ExtractionSettings, StrategyId } from "./types";

// Earlier strategies win confidence ties: their layout assumptions are stricter.
export const STRATEGY_PRIORITY: readonly StrategyId[] = ["direct", "table", "positional", "nlp", "fallback"];

// Highest confidence first; the direct matcher tries them in this order.
export const DIRECT_PATTERN_TIERS: readonly DirectPatternTier[] = [
  "colonWithUnit",
  "spaceWithUnit",
  "reversed",
  "tableCell",
  "parenthetical",
  "range",
  "footnote",
  "bareValue"
];

// Empirical weights, kept overridable so they can be recalibrated against fixtures.
export const DEFAULT_EXTRACTION_SETTINGS: ExtractionSettings = {
  directTiers: {
    colonWithUnit: 0.9,
    spaceWithUnit: 0.85,
    reversed: 0.8,
    tableCell: 0.75,
    parenthetical: 0.7,
    range: 0.65,
    footnote: 0.6,
    bareValue: 0.5
  },
  tableConfidence: 0.8,
  positionalConfidence: 0.6,
  nlpConfidence: 0.7,
  fallbackScale: 1,
  minimumExpectedValues: 3,
  insufficientWordCount: 50
};

export const BLOOD_TEST_KEYWORDS = [
  "vitamin",
  "serum",
  "plasma",
  "blood",
  "hemoglobin",
  "cholesterol",
  "glucose",
  "iron",
  "ferritin",
  "reference range",
  "lab",
  "panel",
  "result"
] as const;

export const UNIT_KEYWORDS = ["ng/mL", "pg/mL", "mg/dL", "mcg/dL", "g/dL", "mmol/L", "mEq/L", "mIU/L", "U/L", "fL"] as const;

export const FOOTNOTE_MARKER_PATTERN = /\d\s*[*†‡§]/;
