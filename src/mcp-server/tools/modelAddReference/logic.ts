/**
 * @fileoverview Logic for the model_add_reference MCP tool.
 * @module src/mcp-server/tools/modelAddReference/logic
 */

import { z } from "zod";
import {
  getCausalModelService,
  RefIdSchema,
  type Reference,
} from "../../../services/causalModel/index.js";
import { logger, type RequestContext } from "../../../utils/index.js";

export const ModelAddReferenceInputSchema = z.object({
  refId: RefIdSchema,
  title: z.string().trim().min(1).describe("Title of the cited work."),
  year: z.string().trim().min(1).optional().describe("Publication year."),
  authors: z
    .array(z.string().trim().min(1))
    .optional()
    .describe("Authors, preferably as 'Last, First'."),
  publicationType: z.string().trim().min(1).optional().describe("RIS reference type, e.g. JOUR."),
  publisher: z.string().trim().min(1).optional().describe("Publisher or journal."),
});

export type ModelAddReferenceInput = z.infer<typeof ModelAddReferenceInputSchema>;

export interface ModelAddReferenceOutput {
  reference: Reference;
}

export async function modelAddReferenceLogic(
  input: ModelAddReferenceInput,
  context: RequestContext,
): Promise<ModelAddReferenceOutput> {
  logger.info("Executing model_add_reference tool", { ...context, refId: input.refId });
  return { reference: getCausalModelService().addReference(input) };
}
