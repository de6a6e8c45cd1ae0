import { describe, expect, it } from "vitest";
import { buildNameVariants, resolveNutrientName, variantPatternSource } from "../nameMatching";
import { NUTRIENT_REGISTRY } from "../nutrientRegistry";

const variantPattern = (variant: string): RegExp => {
  const source = variantPatternSource(variant);
  if (!source) {
    throw new Error(`no pattern for ${variant}`);
  }
  return new RegExp(source, "i");
};

describe("nameMatching", () => {
  it("builds canonical spellings before aliases", () => {
    const spec = NUTRIENT_REGISTRY.lookup("vitamin_d");
    expect(spec).toBeDefined();
    if (!spec) {
      return;
    }
    expect(buildNameVariants(spec).slice(0, 5)).toEqual(["vitamin d", "vitamind", "vitamin_d", "vitamin-d", "vit d"]);
  });

  it("lets punctuation between name tokens vary", () => {
    const pattern = variantPattern("25(oh)d");
    expect(pattern.test("25-OH D")).toBe(true);
    expect(pattern.test("25{OH)D")).toBe(true);
    expect(pattern.test("125(OH)D")).toBe(false);
    expect(variantPatternSource("--")).toBeNull();
  });

  it("prefers the longest matching name", () => {
    expect(resolveNutrientName("HDL Cholesterol", "mg/dL")?.key).toBe("hdl_cholesterol");
    expect(resolveNutrientName("Hemoglobin A1c", "%")?.key).toBe("hba1c");
    expect(resolveNutrientName("Total Cholesterol", "mg/dL")?.key).toBe("total_cholesterol");
  });

  it("resolves aliases and abbreviations", () => {
    expect(resolveNutrientName("25(OH)D", "")?.key).toBe("vitamin_d");
    expect(resolveNutrientName("B-12 Cobalarnin", "pg/mL")?.key).toBe("vitamin_b12");
    expect(resolveNutrientName("Glucose, Fasting", "mg/dL")?.key).toBe("glucose");
  });

  it("reads OCR-damaged names", () => {
    expect(resolveNutrientName("lron, Serum", "mcg/dL")?.key).toBe("iron");
  });

  it("falls back to word overlap", () => {
    expect(resolveNutrientName("Acid, Uric", "mg/dL")?.key).toBe("uric_acid");
  });

  it("requires a compatible unit", () => {
    expect(resolveNutrientName("Hemoglobin", "%")).toBeUndefined();
    expect(resolveNutrientName("Hemoglobin", "g/dL")?.key).toBe("hemoglobin");
  });

  it("ignores names without letters", () => {
    expect(resolveNutrientName("12345", "")).toBeUndefined();
    expect(resolveNutrientName("", "")).toBeUndefined();
  });

  it("leaves a known name with a foreign unit unresolved", () => {
    expect(resolveNutrientName("25-OH Vitamin D", "nmol/L")).toBeUndefined();
    expect(resolveNutrientName("Vitamin D", "nmol/L")).toBeUndefined();
  });
});
