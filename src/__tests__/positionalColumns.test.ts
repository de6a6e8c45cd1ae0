import { describe, expect, it } from "vitest";
import { DEFAULT_EXTRACTION_SETTINGS } from "../constants";
import { NUTRIENT_REGISTRY } from "../nutrientRegistry";
import { extractPositionalColumns } from "../strategies/positionalColumns";
import type { StrategyContext } from "../types";

const context: StrategyContext = { registry: NUTRIENT_REGISTRY, settings: DEFAULT_EXTRACTION_SETTINGS };

describe("extractPositionalColumns", () => {
  it("pairs a name column with the next numeric column", () => {
    expect(extractPositionalColumns("B12  450  pg/mL", context).get("vitamin_b12")).toEqual({
      nutrientKey: "vitamin_b12",
      value: 450,
      confidence: 0.6,
      sourceStrategy: "positional"
    });
  });

  it("reads several pairs on one line", () => {
    const found = extractPositionalColumns("Ferritin  45 ng/mL  Folate  8.1 ng/mL", context);
    expect(found.get("ferritin")?.value).toBe(45);
    expect(found.get("folate")?.value).toBe(8.1);
  });

  it("keeps OCR-damaged names that start with digits", () => {
    const found = extractPositionalColumns("Vitamin D 25{OH)D        25.8    ng/mL", context);
    expect(found.get("vitamin_d")?.value).toBe(25.8);
  });

  it("ignores single-column lines", () => {
    expect(extractPositionalColumns("Vitamin D 25 ng/mL", context).size).toBe(0);
  });

  it("joins a unit spelled with per", () => {
    expect(extractPositionalColumns("Folate    9 ng per ml", context).get("folate")?.value).toBe(9);
  });
});
