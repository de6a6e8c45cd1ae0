import { resolveNutrientName } from "../nameMatching";
import type { PartialExtraction, StrategyContext } from "../types";
import { safeNumber } from "../utils";
import { findUnitToken, NUMBER_SOURCE, offerCandidate, readLeadingNumber, splitLines, UNIT_SOURCE } from "./shared";

const SEPARATOR_LINE_PATTERN = /^[\s|:+\-=_═─━┼]+$/;
const LEADING_VALUE_PATTERN = /^[<>≤≥]?\s*\d/;
const FIXED_WIDTH_ROW_PATTERN = new RegExp(
  `^\\s*([A-Za-z0-9(][^|\\t]*?)\\s{2,}[<>≤≥]?(${NUMBER_SOURCE})[*†‡]?[^\\S\\n]+(${UNIT_SOURCE})`
);

interface TableRow {
  name: string;
  value: number;
  unit: string;
}

const rowFromCells = (cells: string[]): TableRow | null => {
  if (cells.length < 2 || !/[A-Za-z]/.test(cells[0])) {
    return null;
  }
  for (let index = 1; index < cells.length; index += 1) {
    if (!LEADING_VALUE_PATTERN.test(cells[index])) {
      continue;
    }
    const parsed = readLeadingNumber(cells[index]);
    if (!parsed) {
      return null;
    }
    const unit = findUnitToken([parsed.rest, cells[index + 1] ?? ""]);
    return { name: cells[0], value: parsed.value, unit };
  }
  return null;
};

const parseRow = (line: string): TableRow | null => {
  if (line.includes("|")) {
    return rowFromCells(line.split("|").map((cell) => cell.trim()).filter(Boolean));
  }
  if (line.includes("\t")) {
    return rowFromCells(line.split("\t").map((cell) => cell.trim()).filter(Boolean));
  }
  const match = line.match(FIXED_WIDTH_ROW_PATTERN);
  if (!match) {
    return null;
  }
  const value = safeNumber(match[2]);
  return value === null ? null : { name: match[1].trim(), value, unit: match[3] };
};

/**
 * Reads pipe-delimited, tab-delimited and fixed-width rows of a results
 * table. The first numeric cell after the test name is the result.
 */
export const extractTableStructure = (text: string, context: StrategyContext): PartialExtraction => {
  const found: PartialExtraction = new Map();
  const { registry, settings } = context;

  for (const line of splitLines(text)) {
    if (!line.trim() || SEPARATOR_LINE_PATTERN.test(line)) {
      continue;
    }
    const row = parseRow(line);
    if (!row) {
      continue;
    }
    const spec = resolveNutrientName(row.name, row.unit, registry);
    if (!spec) {
      continue;
    }
    offerCandidate(
      found,
      { nutrientKey: spec.key, value: row.value, confidence: settings.tableConfidence, sourceStrategy: "table" },
      registry
    );
  }

  return found;
};
