import { describe, expect, it } from "vitest";
import { extractReportDate } from "../reportDate";

const REFERENCE = new Date(2024, 5, 1);

describe("extractReportDate", () => {
  it("prefers the collection date over the report date", () => {
    expect(extractReportDate("Collected: 12/03/2024\nReported: 14/03/2024", REFERENCE)).toBe("2024-03-12");
  });

  it("reads ISO dates", () => {
    expect(extractReportDate("Date: 2024-01-15", REFERENCE)).toBe("2024-01-15");
  });

  it("reads slash dates day first unless the second number exceeds 12", () => {
    expect(extractReportDate("Sample date 05/04/2024", REFERENCE)).toBe("2024-04-05");
    expect(extractReportDate("Sample date 03/25/2024", REFERENCE)).toBe("2024-03-25");
  });

  it("reads month names", () => {
    expect(extractReportDate("Specimen drawn 15 Jan 2024", REFERENCE)).toBe("2024-01-15");
    expect(extractReportDate("Collection: March 5, 2024", REFERENCE)).toBe("2024-03-05");
  });

  it("ignores dates after the reference date", () => {
    expect(extractReportDate("Collected: 2030-01-01\nDate: 2024-02-02", REFERENCE)).toBe("2024-02-02");
  });

  it("rejects impossible dates and reference ranges", () => {
    expect(extractReportDate("Collected: 31/02/2024", REFERENCE)).toBeNull();
    expect(extractReportDate("Glucose 95 mg/dL 70-100", REFERENCE)).toBeNull();
    expect(extractReportDate("", REFERENCE)).toBeNull();
  });
});
