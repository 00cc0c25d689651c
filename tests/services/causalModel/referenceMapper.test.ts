import { describe, expect, it } from "vitest";
import {
  referenceToRisRecord,
  risRecordToReference,
} from "../../../src/services/causalModel/index.js";
import { formatRis, parseRis, type RisRecord } from "../../../src/services/RIS/index.js";
import { BaseErrorCode, McpError } from "../../../src/types-global/errors.js";

const firstRecord = (text: string): RisRecord => {
  const [record] = parseRis(text).records;
  if (!record) throw new Error("record expected");
  return record;
};

describe("risRecordToReference", () => {
  it("maps title, authors, year, type and publisher", () => {
    const record = firstRecord(
      "TY  - JOUR\nTI  - Main title\nAU  - Doe, Jane\nAU  - Roe, Rick\nPY  - 2019/05/01/\nPB  - Test Press\nJO  - Test Journal\nER  - ",
    );

    expect(risRecordToReference(record, "doe2019")).toEqual({
      refId: "doe2019",
      title: "Main title",
      year: "2019",
      authors: ["Doe, Jane", "Roe, Rick"],
      publicationType: "JOUR",
      publisher: "Test Press",
    });
  });

  it("falls back to T1, A1, Y1 and JO", () => {
    const record = firstRecord(
      "TY  - JOUR\nT1  - Primary title\nA1  - Primary, Author\nY1  - 1987\nJO  - Test Journal\nER  - ",
    );

    expect(risRecordToReference(record, "r1")).toEqual({
      refId: "r1",
      title: "Primary title",
      year: "1987",
      authors: ["Primary, Author"],
      publicationType: "JOUR",
      publisher: "Test Journal",
    });
  });

  it("keeps a year without four leading digits as written", () => {
    const record = firstRecord("TY  - GEN\nTI  - Undated\nPY  - n.d.\nER  - ");

    expect(risRecordToReference(record, "r2").year).toBe("n.d.");
  });

  it("rejects a record without a title", () => {
    const record = firstRecord("TY  - JOUR\nAU  - Doe, Jane\nER  - ");

    expect(() => risRecordToReference(record, "r3")).toThrow(McpError);
    try {
      risRecordToReference(record, "r3");
    } catch (error) {
      expect(error).toBeInstanceOf(McpError);
      expect(error instanceof McpError ? error.code : undefined).toBe(BaseErrorCode.VALIDATION_ERROR);
    }
  });
});

describe("referenceToRisRecord", () => {
  it("writes the reference with its id and a GEN type by default", () => {
    const record = referenceToRisRecord({
      refId: "r1",
      title: "A report",
      authors: ["Doe, Jane"],
      year: "2020",
      publisher: "Test Press",
    });

    expect(formatRis([record])).toBe(
      "TY  - GEN\nID  - r1\nTI  - A report\nAU  - Doe, Jane\nPY  - 2020\nPB  - Test Press\nER  - \n",
    );
  });
});
