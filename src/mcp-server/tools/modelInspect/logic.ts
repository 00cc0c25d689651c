/**
 * @fileoverview Logic for the model_inspect MCP tool. Without `kind` it lists
 * every element id; with `kind` and `id` it returns that element, and for a
 * node also its parents and incoming links.
 * @module src/mcp-server/tools/modelInspect/logic
 */

import { z } from "zod";
import {
  type CausalLink,
  type CausalNode,
  getCausalModelService,
  IdentifierSchema,
  type ModelSummary,
  type Reference,
} from "../../../services/causalModel/index.js";
import { BaseErrorCode, McpError } from "../../../types-global/errors.js";
import { logger, type RequestContext } from "../../../utils/index.js";

export const ModelInspectInputSchema = z.object({
  kind: z
    .enum(["node", "link", "reference"])
    .optional()
    .describe("Kind of element to inspect. Omit to list the whole model."),
  id: IdentifierSchema.optional().describe("Id of the element; required with 'kind'."),
  includeDot: z
    .boolean()
    .default(false)
    .describe("Also return the model graph in Graphviz DOT format."),
});

export type ModelInspectInput = z.infer<typeof ModelInspectInputSchema>;

export type ModelInspectOutput =
  | { summary: ModelSummary; dot?: string }
  | { node: CausalNode; parents: string[]; incomingLinks: string[]; dot?: string }
  | { link: CausalLink; dot?: string }
  | { reference: Reference; dot?: string };

export async function modelInspectLogic(
  input: ModelInspectInput,
  context: RequestContext,
): Promise<ModelInspectOutput> {
  logger.info("Executing model_inspect tool", { ...context, kind: input.kind, id: input.id });
  const service = getCausalModelService();
  const dot = input.includeDot ? service.toDot() : undefined;

  if (input.kind === undefined) {
    return { summary: service.summary(), dot };
  }
  if (input.id === undefined) {
    throw new McpError(BaseErrorCode.VALIDATION_ERROR, `An 'id' is required to inspect a ${input.kind}.`, {
      kind: input.kind,
    });
  }

  switch (input.kind) {
    case "node": {
      const node = service.getNode(input.id);
      const parents = service.predecessors(node.nodeId);
      const incomingLinks = parents.flatMap((parentId) =>
        service.linksBetween(parentId, node.nodeId).map((link) => link.linkId),
      );
      return { node, parents, incomingLinks, dot };
    }
    case "link":
      return { link: service.getLink(input.id), dot };
    case "reference":
      return { reference: service.getReference(input.id), dot };
  }
}
