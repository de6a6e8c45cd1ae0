import { NUTRIENT_REGISTRY } from "./nutrientRegistry";
import type { NutrientRegistry } from "./types";
import { foldOcrConfusables } from "./utils";

const UNIT_TOKEN_PATTERN = /^(?:%|[A-Za-zµμ%/][A-Za-z0-9%µμ/.\-^²*]*|[xX×]?10[\^*]?\d{1,2}\/[A-Za-zµμ]+)$/;

// Each group lists spellings that denote the same numeric scale once normalized.
const UNIT_VARIANT_GROUPS: readonly (readonly string[])[] = [
  ["ng/ml", "ngml", "ngperml", "ug/l", "ugl", "ugperl"],
  ["pg/ml", "pgml", "pgperml", "ng/l", "ngl"],
  ["ug/dl", "ugdl", "ugperdl"],
  ["mg/dl", "mgdl", "mgperdl", "mg%"],
  ["g/dl", "gdl", "gperdl", "gm/dl", "gms/dl"],
  ["mg/l", "mgl", "mgperl", "ug/ml"],
  ["ng/dl", "ngdl", "ngperdl"],
  ["meq/l", "meql", "mmol/l", "mmoll"],
  ["umol/l", "umoll", "micromol/l"],
  ["nmol/l", "nmoll"],
  ["%", "percent", "pct"],
  ["u/l", "iu/l", "units/l", "unit/l"],
  ["miu/l", "mu/l", "uiu/ml", "uu/ml", "miu/ml"],
  ["fl", "femtoliters", "femtoliter"],
  ["pg", "picograms", "picogram"],
  ["mm/hr", "mm/h", "mmhr", "mm/1hr"],
  ["ml/min/1.73m2", "ml/min/1.73", "ml/min/1.73m^2", "ml/min"],
  ["million/ul", "mil/ul", "m/ul", "x10^6/ul", "10^6/ul", "x10e6/ul", "10^12/l", "x10^12/l"],
  ["thousand/ul", "k/ul", "x10^3/ul", "10^3/ul", "x10e3/ul", "10^9/l", "x10^9/l", "k/mm3"]
];

/** Lowercases, strips whitespace and maps micro spellings onto `u`. */
export const normalizeUnitToken = (raw: string): string =>
  raw
    .trim()
    .toLowerCase()
    .replace(/[µμ]/g, "u")
    .replace(/mcg/g, "ug")
    .replace(/\s+/g, "")
    .replace(/[.,;:)\]]+$/, "")
    .replace(/^[(\[]+/, "");

const GROUP_BY_UNIT = new Map<string, number>();
const GROUP_BY_FOLDED_UNIT = new Map<string, number>();
UNIT_VARIANT_GROUPS.forEach((group, index) => {
  for (const unit of group) {
    GROUP_BY_UNIT.set(unit, index);
    if (!GROUP_BY_FOLDED_UNIT.has(foldOcrConfusables(unit))) {
      GROUP_BY_FOLDED_UNIT.set(foldOcrConfusables(unit), index);
    }
  }
});

const groupOf = (normalized: string): number | undefined => GROUP_BY_UNIT.get(normalized);

export const isLikelyUnit = (token: string): boolean => {
  const trimmed = token
    .trim()
    .replace(/\s+per\s+/i, "per")
    .replace(/[.,;:)\]]+$/, "")
    .replace(/^[(\[]+/, "");
  if (!trimmed || !UNIT_TOKEN_PATTERN.test(trimmed)) {
    return false;
  }

  const normalized = normalizeUnitToken(trimmed);
  if (groupOf(normalized) !== undefined || normalized.includes("/") || normalized.includes("%")) {
    return true;
  }

  return /^(?:mmol|nmol|pmol|pg|ng|mu|miu|u|iu|mg|g|ug|umol|fl|fmol|meq|ratio)$/.test(normalized);
};

/**
 * Checks whether a unit token found next to a value is compatible with the
 * nutrient's expected unit. A missing unit never blocks a match.
 */
export const unitsMatch = (
  extracted: string | null | undefined,
  nutrientKey: string,
  registry: NutrientRegistry = NUTRIENT_REGISTRY
): boolean => {
  const normalized = normalizeUnitToken(extracted ?? "");
  if (!normalized) {
    return true;
  }

  const spec = registry.lookup(nutrientKey);
  if (!spec) {
    return false;
  }

  const expected = normalizeUnitToken(spec.unit);
  if (normalized === expected) {
    return true;
  }

  const expectedGroup = groupOf(expected);
  if (expectedGroup !== undefined && groupOf(normalized) === expectedGroup) {
    return true;
  }

  const folded = foldOcrConfusables(normalized);
  if (folded === foldOcrConfusables(expected)) {
    return true;
  }
  return expectedGroup !== undefined && GROUP_BY_FOLDED_UNIT.get(folded) === expectedGroup;
};

const DISPLAY_UNITS: Record<string, string> = {
  "ng/ml": "ng/mL",
  "pg/ml": "pg/mL",
  "ug/dl": "mcg/dL",
  "mg/dl": "mg/dL",
  "g/dl": "g/dL",
  "mg/l": "mg/L",
  "ng/dl": "ng/dL",
  "meq/l": "mEq/L",
  "umol/l": "µmol/L",
  "nmol/l": "nmol/L",
  "%": "%",
  "u/l": "U/L",
  "miu/l": "mIU/L",
  fl: "fL",
  pg: "pg",
  "mm/hr": "mm/hr"
};

/** Display spelling of a unit, falling back to the trimmed input. */
export const canonicalUnit = (raw: string): string => {
  const normalized = normalizeUnitToken(raw);
  const group = groupOf(normalized);
  const head = group !== undefined ? UNIT_VARIANT_GROUPS[group][0] : normalized;
  return DISPLAY_UNITS[head] ?? raw.trim();
};
