import { describe, expect, it } from "vitest";
import { findDeficiencies, formatBloodValueSummary, interpretExtraction } from "../interpretation";
import type { ExtractionResult } from "../types";

const result: ExtractionResult = {
  values: { glucose: 120, vitamin_d: 25, ferritin: 80, unobtainium: 3 },
  confidence: { glucose: 0.8, vitamin_d: 0.9, ferritin: 0.85, unobtainium: 0.5 },
  sources: { glucose: "table", vitamin_d: "direct", ferritin: "direct", unobtainium: "nlp" }
};

describe("interpretation", () => {
  it("rates each value against its normal range in registry order", () => {
    expect(interpretExtraction(result)).toEqual([
      {
        key: "vitamin_d",
        label: "Vitamin D",
        value: 25,
        unit: "ng/mL",
        normalRange: { low: 30, high: 100 },
        status: "low",
        confidence: 0.9
      },
      {
        key: "ferritin",
        label: "Ferritin",
        value: 80,
        unit: "ng/mL",
        normalRange: { low: 15, high: 150 },
        status: "normal",
        confidence: 0.85
      },
      {
        key: "glucose",
        label: "Glucose",
        value: 120,
        unit: "mg/dL",
        normalRange: { low: 70, high: 100 },
        status: "high",
        confidence: 0.8
      }
    ]);
  });

  it("formats a summary line per value", () => {
    expect(formatBloodValueSummary(result)).toBe(
      [
        "- Vitamin D: 25 ng/mL (Normal range: 30-100 ng/mL)",
        "- Ferritin: 80 ng/mL (Normal range: 15-150 ng/mL)",
        "- Glucose: 120 mg/dL (Normal range: 70-100 mg/dL)"
      ].join("\n")
    );
  });

  it("lists deficiencies", () => {
    expect(findDeficiencies(result)).toEqual(["vitamin_d"]);
  });

  it("returns nothing for an empty result", () => {
    expect(formatBloodValueSummary({ values: {}, confidence: {}, sources: {} })).toBe("");
  });
});
