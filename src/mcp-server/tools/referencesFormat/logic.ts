/**
 * @fileoverview Logic for the references_format MCP tool.
 * @module src/mcp-server/tools/referencesFormat/logic
 */

import { z } from "zod";
import {
  CITATION_STYLES,
  type FormattedCitations,
  formatReferences,
  getCausalModelService,
  RefIdSchema,
} from "../../../services/causalModel/index.js";
import { logger, type RequestContext } from "../../../utils/index.js";

export const ReferencesFormatInputSchema = z.object({
  refIds: z
    .array(RefIdSchema)
    .optional()
    .describe("References to format. Omit to format every stored reference."),
  styles: z
    .array(z.enum(CITATION_STYLES))
    .min(1)
    .default(["ris"])
    .describe("Output styles: 'ris', 'bibtex', 'apa_string', 'harvard_string', 'vancouver_string'."),
});

export type ReferencesFormatInput = z.infer<typeof ReferencesFormatInputSchema>;

export interface ReferencesFormatOutput {
  refIds: string[];
  citations: FormattedCitations;
}

export async function referencesFormatLogic(
  input: ReferencesFormatInput,
  context: RequestContext,
): Promise<ReferencesFormatOutput> {
  logger.info("Executing references_format tool", { ...context, styles: input.styles });
  const service = getCausalModelService();
  const references = input.refIds
    ? input.refIds.map((refId) => service.getReference(refId))
    : service.allReferences();

  return {
    refIds: references.map((reference) => reference.refId),
    citations: formatReferences(references, [...new Set(input.styles)], context),
  };
}
