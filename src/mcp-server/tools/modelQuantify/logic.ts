/**
 * @fileoverview Logic for the model_quantify MCP tool: Monte Carlo
 * quantification of a node's noisy-OR conditional probability table.
 * @module src/mcp-server/tools/modelQuantify/logic
 */

import { mkdir } from "fs/promises";
import path from "path";
import { z } from "zod";
import {
  AGGREGATION_METHODS,
  getCausalModelService,
  NodeIdSchema,
  type QuantificationResult,
} from "../../../services/causalModel/index.js";
import { logger, type RequestContext } from "../../../utils/index.js";

export const ModelQuantifyInputSchema = z.object({
  nodeId: NodeIdSchema.describe("Node whose conditional probability table is computed."),
  aggregationMethod: z
    .enum(AGGREGATION_METHODS)
    .default("ARITHMETIC")
    .describe("How parallel links from one parent are combined: weighted mean or weighted geometric mean."),
  sampleSize: z
    .number()
    .int()
    .min(1)
    .max(1_000_000)
    .optional()
    .describe("Monte Carlo draws; defaults to the server setting."),
  seed: z.number().int().optional().describe("Seed for reproducible draws."),
  exportFileName: z
    .string()
    .optional()
    .describe("Also write the table as CSV to this path inside the exports directory."),
});

export type ModelQuantifyInput = z.infer<typeof ModelQuantifyInputSchema>;

export interface ModelQuantifyOutput extends QuantificationResult {
  exportedTo?: string;
}

export async function modelQuantifyLogic(
  input: ModelQuantifyInput,
  context: RequestContext,
): Promise<ModelQuantifyOutput> {
  logger.info("Executing model_quantify tool", {
    ...context,
    nodeId: input.nodeId,
    aggregationMethod: input.aggregationMethod,
  });
  const service = getCausalModelService();
  const quantifier = service.createQuantifier(input.nodeId, {
    sampleSize: input.sampleSize,
    seed: input.seed,
  });
  const result = quantifier.calculate(input.aggregationMethod);

  if (input.exportFileName === undefined) {
    return result;
  }
  const exportedTo = service.resolveExportPath(input.exportFileName);
  await mkdir(path.dirname(exportedTo), { recursive: true });
  await quantifier.exportResults(exportedTo);
  logger.info("Quantification results exported", { ...context, exportedTo });
  return { ...result, exportedTo };
}
