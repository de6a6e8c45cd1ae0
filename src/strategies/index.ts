import type { ExtractionStrategy, StrategyId } from "../types";
import { extractDirectPatterns } from "./directPatterns";
import { extractFallbackPatterns } from "./fallbackPatterns";
import { extractNaturalLanguage } from "./naturalLanguage";
import { extractPositionalColumns } from "./positionalColumns";
import { extractTableStructure } from "./tableStructure";

export const EXTRACTION_STRATEGIES: Readonly<Record<StrategyId, ExtractionStrategy>> = {
  direct: extractDirectPatterns,
  table: extractTableStructure,
  positional: extractPositionalColumns,
  nlp: extractNaturalLanguage,
  fallback: extractFallbackPatterns
};

export {
  extractDirectPatterns,
  extractFallbackPatterns,
  extractNaturalLanguage,
  extractPositionalColumns,
  extractTableStructure
};
