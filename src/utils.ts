import type { NutrientStatus, ValueRange } from "./types";

export const safeNumber = (value: string | number | null | undefined): number | null => {
  if (typeof value === "number") {
    if (Number.isFinite(value)) {
      return value;
    }
    return null;
  }

  if (typeof value !== "string") {
    return null;
  }

  const trimmed = value.trim();
  // "1,200" is a thousands separator, "13,5" a decimal comma.
  const withoutGrouping = /^\d{1,3}(?:,\d{3})+(?:\.\d+)?$/.test(trimmed) ? trimmed.replace(/,/g, "") : trimmed;
  const cleaned = withoutGrouping.replace(/,/g, ".").replace(/[^0-9.+-]/g, "");
  if (!cleaned) {
    return null;
  }

  const parsed = Number(cleaned);
  return Number.isFinite(parsed) ? parsed : null;
};

export const clip = (value: number, min: number, max: number): number => {
  return Math.min(max, Math.max(min, value));
};

export const escapeRegex = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

export const normalizeLookupKey = (value: string): string =>
  value
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, " ")
    .replace(/\s+/g, " ")
    .trim();

// Glyph pairs OCR engines routinely swap in lab printouts.
export const foldOcrConfusables = (value: string): string =>
  value.replace(/0/g, "o").replace(/1/g, "l").replace(/i/g, "l").replace(/5/g, "s");

export const countWords = (value: string): number => value.split(/\s+/).filter(Boolean).length;

export const deriveStatus = (value: number, range: Readonly<ValueRange>): NutrientStatus => {
  if (value < range.low) {
    return "low";
  }
  if (value > range.high) {
    return "high";
  }
  return "normal";
};
