/**
 * @fileoverview Lenient RIS parser. Every record found is returned, even a
 * malformed one, and each deviation from the `XX  - value` layout is
 * reported as a {@link RisIssue} carrying its line number.
 * @module src/services/RIS/parsing/risParser
 */

import { getTagDefinition, isKnownReferenceType } from "../core/risTagTable.js";
import type {
  RisFields,
  RisIssue,
  RisIssueCode,
  RisIssueSeverity,
  RisParseResult,
  RisRecord,
} from "../core/risTypes.js";

/** Tag, 1-3 blanks, hyphen, then blank + value or end of line. */
const TAG_LINE = /^([A-Z][A-Z0-9])[ \t]{1,3}-(?:[ \t]+(.*))?$/;
/** Exactly two spaces, a hyphen, then a space or end of line. */
const CANONICAL_TAG_LINE = /^[A-Z][A-Z0-9] {2}-(?: |$)/;
const LINE_BREAK = /\r\n|\n|\r/;

class IssueCollector {
  readonly issues: RisIssue[] = [];

  add(
    code: RisIssueCode,
    severity: RisIssueSeverity,
    line: number,
    message: string,
    tag?: string,
  ): void {
    this.issues.push(tag ? { code, severity, line, message, tag } : { code, severity, line, message });
  }
}

/**
 * Parses RIS text into records.
 *
 * Text that is not a tag line is appended to the previous entry when it
 * appears inside a record (wrapped values), otherwise it is skipped. A record
 * left open by a missing `ER` is closed by the next `TY` or by the end of
 * input.
 */
export function parseRis(text: string): RisParseResult {
  const collector = new IssueCollector();
  const records: RisRecord[] = [];
  const lines = text.replace(/^\uFEFF/, "").split(LINE_BREAK);

  let current: RisRecord | undefined;
  let seenTags = new Set<string>();
  let lastContentLine = 1;

  const closeUnterminated = (record: RisRecord, line: number, reason: string) => {
    collector.add(
      "MISSING_END_OF_RECORD",
      "error",
      line,
      `Record starting on line ${record.startLine} has no ER line ${reason}.`,
    );
    records.push(record);
  };

  for (const [index, rawLine] of lines.entries()) {
    const lineNumber = index + 1;
    if (rawLine.trim() === "") {
      continue;
    }
    lastContentLine = lineNumber;

    const match = TAG_LINE.exec(rawLine);
    if (!match) {
      const lastEntry = current?.entries[current.entries.length - 1];
      if (lastEntry) {
        collector.add(
          "MALFORMED_LINE",
          "error",
          lineNumber,
          `Line does not match 'XX  - value'; appended to the preceding ${lastEntry.tag} value.`,
          lastEntry.tag,
        );
        const continuation = rawLine.trim();
        lastEntry.value = lastEntry.value ? `${lastEntry.value} ${continuation}` : continuation;
      } else {
        collector.add("UNEXPECTED_TEXT", "error", lineNumber, "Text outside of a record.");
      }
      continue;
    }

    const tag = match[1] ?? "";
    const value = (match[2] ?? "").trim();
    if (!CANONICAL_TAG_LINE.test(rawLine)) {
      collector.add(
        "NON_STANDARD_SPACING",
        "warning",
        lineNumber,
        `Tag ${tag} is not followed by exactly two spaces, a hyphen and a space.`,
        tag,
      );
    }

    if (tag === "TY") {
      if (current) {
        closeUnterminated(current, lineNumber, `before the next TY on line ${lineNumber}`);
      }
      if (!value) {
        collector.add("MISSING_TYPE", "error", lineNumber, "TY line has no reference type.", tag);
      } else if (!isKnownReferenceType(value)) {
        collector.add(
          "UNKNOWN_REFERENCE_TYPE",
          "warning",
          lineNumber,
          `Unknown reference type '${value}'.`,
          tag,
        );
      }
      current = { type: value, entries: [{ tag, value, line: lineNumber }], startLine: lineNumber };
      seenTags = new Set([tag]);
      continue;
    }

    if (!current) {
      collector.add(
        "TAG_OUTSIDE_RECORD",
        "error",
        lineNumber,
        `Tag ${tag} appears before any TY line opened a record.`,
        tag,
      );
      continue;
    }

    if (tag === "ER") {
      current.endLine = lineNumber;
      records.push(current);
      current = undefined;
      continue;
    }

    const definition = getTagDefinition(tag);
    if (!definition) {
      collector.add("UNKNOWN_TAG", "warning", lineNumber, `Unknown tag '${tag}'.`, tag);
    } else if (!definition.repeatable && seenTags.has(tag)) {
      collector.add(
        "DUPLICATE_TAG",
        "warning",
        lineNumber,
        `Tag ${tag} is not repeatable but appears more than once in the record.`,
        tag,
      );
    }
    seenTags.add(tag);
    current.entries.push({ tag, value, line: lineNumber });
  }

  if (current) {
    closeUnterminated(current, lastContentLine, "before the end of the input");
  }
  if (records.length === 0) {
    collector.add("EMPTY_FILE", "error", 1, "No RIS record was found.");
  }

  return { records, issues: collector.issues };
}

/**
 * Builds the field-name keyed view of a record. Unknown tags keep the tag as
 * field name. Repeated values of a non-repeatable tag are joined by a newline.
 */
export function risRecordToFields(record: RisRecord): RisFields {
  const fields: RisFields = {};
  for (const { tag, value } of record.entries) {
    const definition = getTagDefinition(tag);
    const field = definition?.field ?? tag;
    const existing = fields[field];
    if (definition?.repeatable) {
      fields[field] = Array.isArray(existing) ? [...existing, value] : [value];
    } else if (typeof existing === "string") {
      fields[field] = `${existing}\n${value}`;
    } else {
      fields[field] = value;
    }
  }
  return fields;
}

/** Values of every entry with the given tag, in order. */
export function getTagValues(record: RisRecord, tag: string): string[] {
  return record.entries.filter((entry) => entry.tag === tag).map((entry) => entry.value);
}

/** First non-empty value of the first tag in `tags` that has one. */
export function getFirstTagValue(record: RisRecord, ...tags: string[]): string | undefined {
  for (const tag of tags) {
    const value = getTagValues(record, tag).find((v) => v !== "");
    if (value !== undefined) {
      return value;
    }
  }
  return undefined;
}
