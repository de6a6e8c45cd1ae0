import { describe, expect, it } from "vitest";
import { DEFAULT_EXTRACTION_SETTINGS } from "../constants";
import { NUTRIENT_REGISTRY } from "../nutrientRegistry";
import { resolveExtractionSettings } from "../settings";
import { extractDirectPatterns } from "../strategies/directPatterns";
import type { StrategyContext } from "../types";

const context: StrategyContext = { registry: NUTRIENT_REGISTRY, settings: DEFAULT_EXTRACTION_SETTINGS };

const hit = (text: string, key: string) => {
  const candidate = extractDirectPatterns(text, context).get(key);
  return candidate ? { value: candidate.value, confidence: candidate.confidence } : undefined;
};

describe("extractDirectPatterns", () => {
  it("reads name, colon, value and unit", () => {
    const found = extractDirectPatterns("Vitamin D: 25 ng/mL", context);
    expect(Array.from(found.keys())).toEqual(["vitamin_d"]);
    expect(found.get("vitamin_d")).toEqual({
      nutrientKey: "vitamin_d",
      value: 25,
      confidence: 0.9,
      sourceStrategy: "direct"
    });
  });

  it("ranks each layout by its tier weight", () => {
    expect(hit("Ferritin 45 ng/mL", "ferritin")).toEqual({ value: 45, confidence: 0.85 });
    expect(hit("25 ng/mL of Vitamin D", "vitamin_d")).toEqual({ value: 25, confidence: 0.8 });
    expect(hit("Vitamin D (25 ng/mL)", "vitamin_d")).toEqual({ value: 25, confidence: 0.7 });
    expect(hit("Vitamin D 30-100", "vitamin_d")).toEqual({ value: 30, confidence: 0.65 });
    expect(hit("Vitamin D 22.5* ng/mL", "vitamin_d")).toEqual({ value: 22.5, confidence: 0.6 });
    expect(hit("Vitamin D 25", "vitamin_d")).toEqual({ value: 25, confidence: 0.5 });
  });

  it("accepts qualifiers and multi-word aliases", () => {
    expect(hit("Iron, Serum: 45 mcg/dL", "iron")).toEqual({ value: 45, confidence: 0.9 });
    expect(hit("Vitamin D, 25-Hydroxy: 31 ng/mL (Normal: 30-100)", "vitamin_d")).toEqual({
      value: 31,
      confidence: 0.9
    });
  });

  it("treats wide gaps as table cells", () => {
    expect(hit("Glucose     95", "glucose")).toEqual({ value: 95, confidence: 0.75 });
  });

  it("skips values whose unit belongs to another scale", () => {
    expect(hit("Vitamin D: 25 mg/dL", "vitamin_d")).toBeUndefined();
  });

  it("ignores trailing words that are not units", () => {
    expect(hit("Vitamin D 18 Low", "vitamin_d")).toEqual({ value: 18, confidence: 0.5 });
  });

  it("skips implausible values and keeps looking", () => {
    expect(hit("Vitamin D: 2500 ng/mL\nVitamin D: 35 ng/mL", "vitamin_d")).toEqual({ value: 35, confidence: 0.9 });
  });

  it("leaves a name inside a longer name of another nutrient alone", () => {
    const found = extractDirectPatterns("HDL Cholesterol: 55 mg/dL", context);
    expect(found.get("hdl_cholesterol")?.value).toBe(55);
    expect(found.has("total_cholesterol")).toBe(false);
  });

  it("tells HbA1c apart from hemoglobin", () => {
    const found = extractDirectPatterns("Hemoglobin A1c: 5.4 %", context);
    expect(found.get("hba1c")?.value).toBe(5.4);
    expect(found.has("hemoglobin")).toBe(false);
  });

  it("uses configured tier weights", () => {
    const tuned: StrategyContext = {
      registry: NUTRIENT_REGISTRY,
      settings: resolveExtractionSettings({ directTiers: { colonWithUnit: 0.95 } })
    };
    expect(extractDirectPatterns("Ferritin: 45 ng/mL", tuned).get("ferritin")?.confidence).toBe(0.95);
  });

  it("finds nothing in text without values", () => {
    expect(extractDirectPatterns("Vitamin D was not measured", context).size).toBe(0);
  });

  it("reads units spelled with per", () => {
    expect(hit("Folate: 9 ng per ml", "folate")).toEqual({ value: 9, confidence: 0.9 });
  });

  it("does not drop the minus sign of a value", () => {
    expect(hit("Ferritin: -40 ng/mL", "ferritin")).toBeUndefined();
    expect(hit("Vitamin D 30-100", "vitamin_d")).toEqual({ value: 30, confidence: 0.65 });
  });
});
