import { describe, expect, it } from "vitest";
import { arbitrateCandidates } from "../arbitration";
import type { ExtractionCandidate, PartialExtraction, StrategyId } from "../types";

const partial = (key: string, value: number, confidence: number, sourceStrategy: StrategyId): PartialExtraction =>
  new Map<string, ExtractionCandidate>([[key, { nutrientKey: key, value, confidence, sourceStrategy }]]);

describe("arbitrateCandidates", () => {
  it("keeps the more confident candidate", () => {
    const merged = arbitrateCandidates({
      direct: partial("vitamin_d", 25, 0.9, "direct"),
      fallback: partial("vitamin_d", 28, 0.5, "fallback")
    });
    expect(merged.get("vitamin_d")?.value).toBe(25);
  });

  it("lets a later strategy win only with strictly higher confidence", () => {
    const tie = arbitrateCandidates({
      table: partial("ferritin", 40, 0.7, "table"),
      nlp: partial("ferritin", 44, 0.7, "nlp")
    });
    expect(tie.get("ferritin")?.sourceStrategy).toBe("table");

    const higher = arbitrateCandidates({
      positional: partial("ferritin", 40, 0.6, "positional"),
      nlp: partial("ferritin", 44, 0.7, "nlp")
    });
    expect(higher.get("ferritin")).toEqual({ nutrientKey: "ferritin", value: 44, confidence: 0.7, sourceStrategy: "nlp" });
  });

  it("unions nutrients across strategies", () => {
    const merged = arbitrateCandidates({
      direct: partial("vitamin_d", 25, 0.9, "direct"),
      positional: partial("iron", 80, 0.6, "positional")
    });
    expect(Array.from(merged.keys())).toEqual(["vitamin_d", "iron"]);
  });

  it("returns nothing for no partials", () => {
    expect(arbitrateCandidates({}).size).toBe(0);
  });
});
