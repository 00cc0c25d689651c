/**
 * @fileoverview Type definitions for RIS (Research Information Systems)
 * citation data as read from and written to tagged plain text.
 * @module src/services/RIS/core/risTypes
 */

/** One `XX  - value` line of a record. */
export interface RisEntry {
  tag: string;
  value: string;
  /** 1-based line number in the source text; 0 for entries built in code. */
  line: number;
}

/** One record, from its `TY` line up to (excluding) its `ER` line. */
export interface RisRecord {
  /** Value of the `TY` line. */
  type: string;
  /** Entries in source order, starting with the `TY` entry. */
  entries: RisEntry[];
  startLine: number;
  /** Line of the terminating `ER`; absent when the record was never closed. */
  endLine?: number;
}

export type RisIssueSeverity = "error" | "warning";

export type RisIssueCode =
  | "EMPTY_FILE"
  | "TAG_OUTSIDE_RECORD"
  | "UNEXPECTED_TEXT"
  | "MALFORMED_LINE"
  | "MISSING_END_OF_RECORD"
  | "MISSING_TYPE"
  | "NON_STANDARD_SPACING"
  | "UNKNOWN_TAG"
  | "UNKNOWN_REFERENCE_TYPE"
  | "DUPLICATE_TAG";

export interface RisIssue {
  code: RisIssueCode;
  severity: RisIssueSeverity;
  line: number;
  message: string;
  tag?: string;
}

export interface RisParseResult {
  records: RisRecord[];
  issues: RisIssue[];
}

export interface RisValidationReport {
  /** True when no issue of severity `error` was found. */
  wellFormed: boolean;
  recordCount: number;
  errorCount: number;
  warningCount: number;
  issues: RisIssue[];
}

/**
 * Field-name keyed view of a record: repeatable tags give arrays, the rest a
 * single string.
 */
export type RisFields = Record<string, string | string[]>;

export interface RisTagDefinition {
  field: string;
  repeatable: boolean;
  label: string;
}

export interface RisTagTable {
  tags: Record<string, RisTagDefinition>;
  /** Known `TY` values mapped to a human readable label. */
  referenceTypes: Record<string, string>;
}
