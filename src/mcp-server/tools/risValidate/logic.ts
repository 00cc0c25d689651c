/**
 * @fileoverview Logic for the ris_validate MCP tool. Checks RIS text without
 * touching the model.
 * @module src/mcp-server/tools/risValidate/logic
 */

import { z } from "zod";
import {
  parseRis,
  type RisFields,
  risRecordToFields,
  type RisValidationReport,
  validateRis,
} from "../../../services/RIS/index.js";
import { logger, type RequestContext } from "../../../utils/index.js";

export const RisValidateInputSchema = z.object({
  risText: z.string().describe("RIS content to check."),
  includeRecords: z
    .boolean()
    .default(false)
    .describe("Also return every parsed record as a field-name keyed object."),
});

export type RisValidateInput = z.infer<typeof RisValidateInputSchema>;

export interface RisValidateOutput extends RisValidationReport {
  records?: Array<{ type: string; startLine: number; fields: RisFields }>;
}

export async function risValidateLogic(
  input: RisValidateInput,
  context: RequestContext,
): Promise<RisValidateOutput> {
  const report = validateRis(input.risText);
  logger.info("Executing ris_validate tool", {
    ...context,
    wellFormed: report.wellFormed,
    recordCount: report.recordCount,
  });
  if (!input.includeRecords) {
    return report;
  }
  const records = parseRis(input.risText).records.map((record) => ({
    type: record.type,
    startLine: record.startLine,
    fields: risRecordToFields(record),
  }));
  return { ...report, records };
}
