import { describe, expect, it } from "vitest";
import { validateRis } from "../../../src/services/RIS/index.js";

describe("validateRis", () => {
  it("accepts a well-formed file and counts warnings separately", () => {
    const report = validateRis("TY  - JOUR\nTI  - Title\nZZ  - custom\nER  - \n\nTY  - BOOK\nTI  - Other\nER  - \n");

    expect(report.wellFormed).toBe(true);
    expect(report.recordCount).toBe(2);
    expect(report.errorCount).toBe(0);
    expect(report.warningCount).toBe(1);
  });

  it("rejects a file without records", () => {
    const report = validateRis("TI  - Title without a record");

    expect(report.wellFormed).toBe(false);
    expect(report.recordCount).toBe(0);
    expect(report.errorCount).toBe(2);
    expect(report.issues.map((issue) => issue.code)).toEqual(["TAG_OUTSIDE_RECORD", "EMPTY_FILE"]);
  });

  it("rejects a record without ER", () => {
    const report = validateRis("TY  - JOUR\nTI  - Title\n");

    expect(report.wellFormed).toBe(false);
    expect(report.recordCount).toBe(1);
    expect(report.issues.map((issue) => issue.code)).toEqual(["MISSING_END_OF_RECORD"]);
  });
});
