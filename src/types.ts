export type NutrientCategory =
  | "vitamins"
  | "minerals"
  | "hematology"
  | "metabolic"
  | "lipids"
  | "liver"
  | "kidney"
  | "thyroid"
  | "inflammation"
  | "hormones";

export type StrategyId = "direct" | "table" | "positional" | "nlp" | "fallback";
export type TextQuality = "no_text" | "insufficient" | "good";
export type NutrientStatus = "low" | "normal" | "high";

export interface ValueRange {
  low: number;
  high: number;
}

export interface NutrientSpec {
  readonly key: string;
  readonly label: string;
  readonly category: NutrientCategory;
  readonly unit: string;
  readonly normalRange: Readonly<ValueRange>;
  readonly plausibleRange: Readonly<ValueRange>;
  readonly aliases: readonly string[];
}

export interface NutrientRegistry {
  lookup: (key: string) => NutrientSpec | undefined;
  all: () => readonly NutrientSpec[];
  resolveAlias: (name: string) => NutrientSpec | undefined;
  aliasesOf: (key: string) => readonly string[];
}

export interface ExtractionCandidate {
  nutrientKey: string;
  value: number;
  confidence: number;
  sourceStrategy: StrategyId;
}

export type PartialExtraction = Map<string, ExtractionCandidate>;

export interface ExtractionResult {
  readonly values: Readonly<Record<string, number>>;
  readonly confidence: Readonly<Record<string, number>>;
  readonly sources: Readonly<Record<string, StrategyId>>;
}

export interface DiagnosisStats {
  wordCount: number;
  numericTokenCount: number;
  extractedCount: number;
}

export interface Diagnosis {
  textQuality: TextQuality;
  potentialIssues: string[];
  suggestions: string[];
  detectedPatterns: string[];
  stats: DiagnosisStats;
}

export type DirectPatternTier =
  | "colonWithUnit"
  | "spaceWithUnit"
  | "reversed"
  | "tableCell"
  | "parenthetical"
  | "range"
  | "footnote"
  | "bareValue";

export interface ExtractionSettings {
  directTiers: Record<DirectPatternTier, number>;
  tableConfidence: number;
  positionalConfidence: number;
  nlpConfidence: number;
  fallbackScale: number;
  minimumExpectedValues: number;
  insufficientWordCount: number;
}

export interface StrategyContext {
  registry: NutrientRegistry;
  settings: ExtractionSettings;
}

export type ExtractionStrategy = (text: string, context: StrategyContext) => PartialExtraction;

export type ExtractionSettingsOverrides = Partial<Omit<ExtractionSettings, "directTiers">> & {
  directTiers?: Partial<Record<DirectPatternTier, number>>;
};

export interface ExtractionOptions {
  registry?: NutrientRegistry;
  settings?: ExtractionSettingsOverrides;
}

export interface InterpretedValue {
  key: string;
  label: string;
  value: number;
  unit: string;
  normalRange: ValueRange;
  status: NutrientStatus;
  confidence: number;
}
