/**
 * @fileoverview Logic for the model_export MCP tool.
 * @module src/mcp-server/tools/modelExport/logic
 */

import { z } from "zod";
import {
  getCausalModelService,
  type ModelExportSummary,
} from "../../../services/causalModel/index.js";
import { logger, type RequestContext } from "../../../utils/index.js";

export const ModelExportInputSchema = z.object({
  directoryName: z
    .string()
    .min(1)
    .describe("Directory inside the exports directory that receives the files; created when missing."),
});

export type ModelExportInput = z.infer<typeof ModelExportInputSchema>;

export type ModelExportOutput = ModelExportSummary;

export async function modelExportLogic(
  input: ModelExportInput,
  context: RequestContext,
): Promise<ModelExportOutput> {
  logger.info("Executing model_export tool", { ...context, directoryName: input.directoryName });
  return getCausalModelService().exportModel(input.directoryName, context);
}
