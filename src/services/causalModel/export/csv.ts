/**
 * @fileoverview RFC 4180 CSV serialization.
 * @module src/services/causalModel/export/csv
 */

export type CsvValue = string | number | boolean | null | undefined;

const NEEDS_QUOTING = /[",\r\n]/;

export function escapeCsvValue(value: CsvValue): string {
  if (value === null || value === undefined) return "";
  const text = String(value);
  return NEEDS_QUOTING.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

/** Header line plus one line per row, CRLF terminated. */
export function toCsv(header: readonly string[], rows: readonly CsvValue[][]): string {
  return [header, ...rows].map((row) => row.map(escapeCsvValue).join(",")).join("\r\n") + "\r\n";
}
