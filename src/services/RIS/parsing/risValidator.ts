/**
 * @fileoverview Well-formedness check for RIS text: every record opens with
 * `TY`, closes with `ER`, and every line follows `XX  - value`.
 * @module src/services/RIS/parsing/risValidator
 */

import type { RisValidationReport } from "../core/risTypes.js";
import { parseRis } from "./risParser.js";

export function validateRis(text: string): RisValidationReport {
  const { records, issues } = parseRis(text);
  const errorCount = issues.filter((issue) => issue.severity === "error").length;
  return {
    wellFormed: errorCount === 0,
    recordCount: records.length,
    errorCount,
    warningCount: issues.length - errorCount,
    issues,
  };
}
