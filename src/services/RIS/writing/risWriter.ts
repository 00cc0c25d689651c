/**
 * @fileoverview Canonical RIS writer.
 * @module src/services/RIS/writing/risWriter
 */

import type { RisRecord } from "../core/risTypes.js";

export interface RisFormatOptions {
  /** Line terminator. Defaults to `\n`. */
  eol?: "\n" | "\r\n";
}

const formatLine = (tag: string, value: string): string =>
  `${tag}  - ${value.replace(/\s*[\r\n]+\s*/g, " ").trim()}`;

/**
 * Writes records as `XX  - value` lines, each record closed by `ER  - ` and
 * followed by a blank line. A record whose entries do not start with `TY`
 * gets one from its `type`. `ER` entries inside a record are not written.
 */
export function formatRis(records: RisRecord[], options: RisFormatOptions = {}): string {
  const eol = options.eol ?? "\n";
  return records
    .map((record) => {
      const lines: string[] = [];
      if (record.entries[0]?.tag !== "TY") {
        lines.push(formatLine("TY", record.type));
      }
      for (const entry of record.entries) {
        if (entry.tag !== "ER") {
          lines.push(formatLine(entry.tag, entry.value));
        }
      }
      lines.push("ER  - ");
      return lines.join(eol) + eol;
    })
    .join(eol);
}
