/**
 * @fileoverview Logic for the model_add_node MCP tool.
 * @module src/mcp-server/tools/modelAddNode/logic
 */

import { z } from "zod";
import {
  type CausalNode,
  getCausalModelService,
  NodeIdSchema,
} from "../../../services/causalModel/index.js";
import { logger, type RequestContext } from "../../../utils/index.js";

export const ModelAddNodeInputSchema = z.object({
  nodeId: NodeIdSchema,
  name: z.string().trim().min(1).max(200).optional().describe("Human readable name of the node."),
  keywords: z
    .string()
    .trim()
    .max(1000)
    .optional()
    .describe("Space separated keywords describing the node."),
});

export type ModelAddNodeInput = z.infer<typeof ModelAddNodeInputSchema>;

export interface ModelAddNodeOutput {
  node: CausalNode;
  nodeCount: number;
}

export async function modelAddNodeLogic(
  input: ModelAddNodeInput,
  context: RequestContext,
): Promise<ModelAddNodeOutput> {
  logger.info("Executing model_add_node tool", { ...context, nodeId: input.nodeId });
  const service = getCausalModelService();
  const node = service.addNode(input);
  return { node, nodeCount: service.nodes().length };
}
