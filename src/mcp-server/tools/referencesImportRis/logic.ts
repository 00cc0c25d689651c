/**
 * @fileoverview Logic for the references_import_ris MCP tool.
 * @module src/mcp-server/tools/referencesImportRis/logic
 */

import { z } from "zod";
import {
  getCausalModelService,
  RefIdSchema,
  type Reference,
} from "../../../services/causalModel/index.js";
import type { RisIssue } from "../../../services/RIS/index.js";
import { logger, type RequestContext } from "../../../utils/index.js";

export const ReferencesImportRisInputSchema = z.object({
  risText: z.string().min(1).describe("Content of an RIS file holding one or more records."),
  refIds: z
    .array(RefIdSchema)
    .optional()
    .describe(
      "Ids for the imported references, one per record in file order. When omitted, a record's ID tag is used, else 'ref-<n>'.",
    ),
});

export type ReferencesImportRisInput = z.infer<typeof ReferencesImportRisInputSchema>;

export interface ReferencesImportRisOutput {
  importedCount: number;
  references: Reference[];
  warnings: RisIssue[];
}

export async function referencesImportRisLogic(
  input: ReferencesImportRisInput,
  context: RequestContext,
): Promise<ReferencesImportRisOutput> {
  logger.info("Executing references_import_ris tool", {
    ...context,
    risLength: input.risText.length,
    refIdCount: input.refIds?.length,
  });
  const { references, warnings } = getCausalModelService().importRis(input.risText, input.refIds, context);
  return { importedCount: references.length, references, warnings };
}
