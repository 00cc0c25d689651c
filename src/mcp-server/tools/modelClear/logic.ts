/**
 * @fileoverview Logic for the model_clear MCP tool.
 * @module src/mcp-server/tools/modelClear/logic
 */

import { z } from "zod";
import { getCausalModelService, type ModelSummary } from "../../../services/causalModel/index.js";
import { logger, type RequestContext } from "../../../utils/index.js";

export const ModelClearInputSchema = z.object({
  confirm: z.literal(true).describe("Must be true; every node, link and reference is deleted."),
});

export type ModelClearInput = z.infer<typeof ModelClearInputSchema>;

export interface ModelClearOutput {
  cleared: true;
  removed: { nodes: number; links: number; references: number };
}

export async function modelClearLogic(
  _input: ModelClearInput,
  context: RequestContext,
): Promise<ModelClearOutput> {
  const service = getCausalModelService();
  const before: ModelSummary = service.summary();
  service.clear();

  const removed = {
    nodes: before.nodes.length,
    links: before.links.length,
    references: before.references.length,
  };
  logger.notice("Causal model cleared", { ...context, ...removed });
  return { cleared: true, removed };
}
