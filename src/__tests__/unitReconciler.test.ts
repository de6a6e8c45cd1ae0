import { describe, expect, it } from "vitest";
import { canonicalUnit, isLikelyUnit, normalizeUnitToken, unitsMatch } from "../unitReconciler";

describe("unitReconciler", () => {
  it("normalizes unit tokens", () => {
    expect(normalizeUnitToken(" µg/dL. ")).toBe("ug/dl");
    expect(normalizeUnitToken("(mcg/L)")).toBe("ug/l");
    expect(normalizeUnitToken("ng / mL")).toBe("ng/ml");
  });

  it("accepts the expected unit and its variants", () => {
    expect(unitsMatch("ng/mL", "vitamin_d")).toBe(true);
    expect(unitsMatch("ug/L", "vitamin_d")).toBe(true);
    expect(unitsMatch("µg/dL", "iron")).toBe(true);
    expect(unitsMatch("mmol/L", "sodium")).toBe(true);
    expect(unitsMatch("uIU/mL", "tsh")).toBe(true);
  });

  it("tolerates OCR-damaged units", () => {
    expect(unitsMatch("ng/m1", "vitamin_d")).toBe(true);
  });

  it("rejects incompatible units", () => {
    expect(unitsMatch("mg/dL", "vitamin_d")).toBe(false);
    expect(unitsMatch("g/dL", "glucose")).toBe(false);
  });

  it("never blocks on a missing unit", () => {
    expect(unitsMatch("", "vitamin_d")).toBe(true);
    expect(unitsMatch(null, "vitamin_d")).toBe(true);
    expect(unitsMatch(undefined, "unobtainium")).toBe(true);
  });

  it("rejects a real unit for an unknown nutrient", () => {
    expect(unitsMatch("ng/mL", "unobtainium")).toBe(false);
  });

  it("recognizes unit-like tokens", () => {
    expect(isLikelyUnit("ng/mL")).toBe(true);
    expect(isLikelyUnit("mg/dL.")).toBe(true);
    expect(isLikelyUnit("pg")).toBe(true);
    expect(isLikelyUnit("%")).toBe(true);
    expect(isLikelyUnit("x10^3/uL")).toBe(true);
    expect(isLikelyUnit("Normal")).toBe(false);
    expect(isLikelyUnit("450")).toBe(false);
  });

  it("returns display spellings", () => {
    expect(canonicalUnit("ug/dl")).toBe("mcg/dL");
    expect(canonicalUnit("NG/ML")).toBe("ng/mL");
    expect(canonicalUnit("uIU/mL")).toBe("mIU/L");
    expect(canonicalUnit(" cells ")).toBe("cells");
  });

  it("treats a spelled-out unit as one token", () => {
    expect(isLikelyUnit("ng per ml")).toBe(true);
    expect(unitsMatch("ng per ml", "folate")).toBe(true);
  });
});
