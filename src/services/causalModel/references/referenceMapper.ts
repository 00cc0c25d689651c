/**
 * @fileoverview Conversion between RIS records and model references.
 * @module src/services/causalModel/references/referenceMapper
 */

import { BaseErrorCode, McpError } from "../../../types-global/errors.js";
import {
  getFirstTagValue,
  getTagValues,
  type RisEntry,
  type RisRecord,
} from "../../RIS/index.js";
import { type Reference, ReferenceSchema } from "../core/modelTypes.js";

const LEADING_YEAR = /^(\d{4})/;

/**
 * Maps one RIS record onto a reference.
 *
 * Title: TI, else T1. Authors: AU, else A1. Publisher: PB, else JO, else JF,
 * else OP. Year: PY, else Y1, cut to its leading four digits when present
 * (`2019/05/01/` becomes `2019`).
 *
 * @throws {McpError} VALIDATION_ERROR when the record has no title.
 */
export function risRecordToReference(record: RisRecord, refId: string): Reference {
  const title = getFirstTagValue(record, "TI", "T1");
  if (!title) {
    throw new McpError(
      BaseErrorCode.VALIDATION_ERROR,
      `RIS record starting on line ${record.startLine} has no title (TI or T1).`,
      { refId, startLine: record.startLine },
    );
  }

  let authors = getTagValues(record, "AU").filter(Boolean);
  if (authors.length === 0) {
    authors = getTagValues(record, "A1").filter(Boolean);
  }

  const rawYear = getFirstTagValue(record, "PY", "Y1");
  const year = rawYear ? (LEADING_YEAR.exec(rawYear)?.[1] ?? rawYear) : undefined;

  return ReferenceSchema.parse({
    refId,
    title,
    year,
    authors: authors.length > 0 ? authors : undefined,
    publicationType: record.type || undefined,
    publisher: getFirstTagValue(record, "PB", "JO", "JF", "OP"),
  });
}

/** Builds the RIS record written for a stored reference. */
export function referenceToRisRecord(reference: Reference): RisRecord {
  const type = reference.publicationType ?? "GEN";
  const entries: RisEntry[] = [
    { tag: "TY", value: type, line: 0 },
    { tag: "ID", value: reference.refId, line: 0 },
    { tag: "TI", value: reference.title, line: 0 },
  ];
  for (const author of reference.authors ?? []) {
    entries.push({ tag: "AU", value: author, line: 0 });
  }
  if (reference.year) {
    entries.push({ tag: "PY", value: reference.year, line: 0 });
  }
  if (reference.publisher) {
    entries.push({ tag: "PB", value: reference.publisher, line: 0 });
  }
  return { type, entries, startLine: 0 };
}
