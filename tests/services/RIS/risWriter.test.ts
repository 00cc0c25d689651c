import { describe, expect, it } from "vitest";
import { formatRis, parseRis, type RisRecord } from "../../../src/services/RIS/index.js";

describe("formatRis", () => {
  it("writes canonical lines with a blank line between records", () => {
    const { records } = parseRis("TY - JOUR\nTI  - First\nAU  -   Doe, Jane\nER  -\nTY  - BOOK\nTI  - Second\nER  - ");

    expect(formatRis(records)).toBe(
      "TY  - JOUR\nTI  - First\nAU  - Doe, Jane\nER  - \n\nTY  - BOOK\nTI  - Second\nER  - \n",
    );
  });

  it("adds TY from the record type and flattens line breaks in values", () => {
    const record: RisRecord = {
      type: "RPRT",
      entries: [{ tag: "AB", value: "line one\n  line two", line: 0 }],
      startLine: 0,
    };

    expect(formatRis([record], { eol: "\r\n" })).toBe("TY  - RPRT\r\nAB  - line one line two\r\nER  - \r\n");
  });

  it("writes records that parse back to the same entries", () => {
    const source = "TY  - CHAP\nTI  - Chapter\nAU  - Doe, Jane\nAU  - Roe, Rick\nKW  - cough\nPY  - 2001\nER  - \n";
    const first = parseRis(source);
    const second = parseRis(formatRis(first.records));

    expect(second.issues).toEqual([]);
    expect(second.records[0]?.entries.map(({ tag, value }) => [tag, value])).toEqual(
      first.records[0]?.entries.map(({ tag, value }) => [tag, value]),
    );
  });
});
