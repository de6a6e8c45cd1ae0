export { arbitrateCandidates } from "./arbitration";
export { DEFAULT_EXTRACTION_SETTINGS, STRATEGY_PRIORITY } from "./constants";
export { diagnoseExtractionFailure, provideExtractionFeedback } from "./diagnostics";
export { extractBloodTestValues, runExtractionStrategies } from "./extraction";
export { findDeficiencies, formatBloodValueSummary, interpretExtraction } from "./interpretation";
export { NutrientRegistryError } from "./lib/errors";
export type { NutrientRegistryErrorCode } from "./lib/errors";
export { mapRegistryErrorToMessage } from "./lib/errorMessages";
export { resolveNutrientName } from "./nameMatching";
export { buildNutrientRegistry, NUTRIENT_REGISTRY } from "./nutrientRegistry";
export { filterPlausibleCandidates, isPlausibleValue } from "./plausibility";
export { extractReportDate } from "./reportDate";
export { resolveExtractionSettings } from "./settings";
export { EXTRACTION_STRATEGIES } from "./strategies";
export { canonicalUnit, normalizeUnitToken, unitsMatch } from "./unitReconciler";
export type {
  Diagnosis,
  DiagnosisStats,
  DirectPatternTier,
  ExtractionCandidate,
  ExtractionOptions,
  ExtractionResult,
  ExtractionSettings,
  ExtractionSettingsOverrides,
  ExtractionStrategy,
  InterpretedValue,
  NutrientCategory,
  NutrientRegistry,
  NutrientSpec,
  NutrientStatus,
  PartialExtraction,
  StrategyContext,
  StrategyId,
  TextQuality,
  ValueRange
} from "./types";
