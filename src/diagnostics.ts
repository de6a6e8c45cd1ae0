import { BLOOD_TEST_KEYWORDS, FOOTNOTE_MARKER_PATTERN, UNIT_KEYWORDS } from "./constants";
import { resolveExtractionSettings } from "./settings";
import type { Diagnosis, ExtractionResult, ExtractionSettingsOverrides, TextQuality } from "./types";
import { countWords, escapeRegex } from "./utils";

const NUMERIC_TOKEN_PATTERN = /\d+(?:[.,]\d+)?/g;
const WIDE_GAP_PATTERN = /\S(?: {3,}|\t)\S/;

const SUGGEST_OCR = "Try OCR if the document is a scanned image.";
const SUGGEST_MANUAL = "Enter the values manually.";
const SUGGEST_CLEARER_SCAN = "Upload a clearer scan or a higher-resolution file.";
const SUGGEST_CHECK_DOCUMENT = "Check that the document is a blood test report.";
const SUGGEST_REVIEW = "Review the extracted values and add any missing ones manually.";

const keywordPattern = (keyword: string): RegExp => new RegExp(`(?<![A-Za-z])${escapeRegex(keyword)}`, "i");

const KEYWORD_PATTERNS = BLOOD_TEST_KEYWORDS.map((keyword) => ({ keyword, pattern: keywordPattern(keyword) }));

const hasTableStructure = (text: string): boolean => {
  const lines = text.split(/\r?\n/);
  if (lines.some((line) => line.includes("|") || line.includes("\t"))) {
    return true;
  }
  return lines.filter((line) => WIDE_GAP_PATTERN.test(line)).length >= 2;
};

const detectPatterns = (text: string): { keywords: string[]; units: string[]; detected: string[] } => {
  const keywords = KEYWORD_PATTERNS.filter(({ pattern }) => pattern.test(text)).map(({ keyword }) => keyword);
  const lowered = text.toLowerCase();
  const units = UNIT_KEYWORDS.filter((unit) => lowered.includes(unit.toLowerCase()));

  const detected = [...keywords.map((keyword) => `keyword: ${keyword}`), ...units.map((unit) => `unit: ${unit}`)];
  if (hasTableStructure(text)) {
    detected.push("structure: table-like layout");
  }
  if (FOOTNOTE_MARKER_PATTERN.test(text)) {
    detected.push("structure: footnote markers");
  }
  return { keywords, units, detected };
};

/**
 * Explains a weak or empty extraction. Looks at the raw text only; the
 * extraction result is read for its size and never modified.
 */
export const diagnoseExtractionFailure = (
  text: string,
  result: ExtractionResult,
  settings?: ExtractionSettingsOverrides
): Diagnosis => {
  const { insufficientWordCount, minimumExpectedValues } = resolveExtractionSettings(settings);
  const wordCount = countWords(text);
  const numericTokenCount = (text.match(NUMERIC_TOKEN_PATTERN) ?? []).length;
  const extractedCount = Object.keys(result.values).length;

  const issues: string[] = [];
  const suggestions: string[] = [];

  if (!text.trim()) {
    return {
      textQuality: "no_text",
      potentialIssues: ["No text could be read from the document."],
      suggestions: [SUGGEST_OCR, SUGGEST_MANUAL],
      detectedPatterns: [],
      stats: { wordCount: 0, numericTokenCount: 0, extractedCount }
    };
  }

  const textQuality: TextQuality =
    wordCount < insufficientWordCount || numericTokenCount === 0 ? "insufficient" : "good";
  const { keywords, detected } = detectPatterns(text);

  if (wordCount < insufficientWordCount) {
    issues.push(`Only ${wordCount} words were found in the document.`);
    suggestions.push(SUGGEST_CLEARER_SCAN, SUGGEST_OCR);
  }
  if (numericTokenCount === 0) {
    issues.push("The text contains no numeric values.");
    suggestions.push(SUGGEST_OCR, SUGGEST_MANUAL);
  }
  if (keywords.length === 0) {
    issues.push("No blood test terminology was found.");
    suggestions.push(SUGGEST_CHECK_DOCUMENT);
  } else if (extractedCount === 0) {
    issues.push("Blood test terms were found but no values could be matched to them.");
    suggestions.push(SUGGEST_MANUAL);
  }
  if (extractedCount > 0 && extractedCount < minimumExpectedValues) {
    issues.push(`Only ${extractedCount} of at least ${minimumExpectedValues} expected values were extracted.`);
    suggestions.push(SUGGEST_REVIEW);
  }
  if (detected.includes("structure: table-like layout") && extractedCount === 0) {
    issues.push("A table layout was detected but none of its rows could be read.");
    suggestions.push(SUGGEST_OCR);
  }
  if (detected.includes("structure: footnote markers")) {
    issues.push("Footnote markers next to values may hide some results.");
    suggestions.push(SUGGEST_REVIEW);
  }

  return {
    textQuality,
    potentialIssues: Array.from(new Set(issues)),
    suggestions: Array.from(new Set(suggestions)),
    detectedPatterns: detected,
    stats: { wordCount, numericTokenCount, extractedCount }
  };
};

/** Markdown message for the reader of a weak extraction. */
export const provideExtractionFeedback = (diagnosis: Diagnosis): string => {
  const { stats } = diagnosis;
  const lines = [
    `**Extraction quality:** ${diagnosis.textQuality.replace("_", " ")}`,
    `Found ${stats.extractedCount} value(s) in ${stats.wordCount} words.`
  ];

  if (diagnosis.potentialIssues.length > 0) {
    lines.push("", "**Possible issues**", ...diagnosis.potentialIssues.map((issue) => `- ${issue}`));
  }
  if (diagnosis.suggestions.length > 0) {
    lines.push("", "**What you can try**", ...diagnosis.suggestions.map((suggestion) => `- ${suggestion}`));
  }

  return lines.join("\n");
};
