/**
 * @fileoverview Logic for the model_remove_element MCP tool. Removing a node
 * removes its links; removing a reference removes the links citing it.
 * @module src/mcp-server/tools/modelRemoveElement/logic
 */

import { z } from "zod";
import {
  type CausalModelService,
  getCausalModelService,
  IdentifierSchema,
  type ModelElementKind,
} from "../../../services/causalModel/index.js";
import { logger, type RequestContext } from "../../../utils/index.js";

export const ModelRemoveElementInputSchema = z.object({
  kind: z.enum(["node", "link", "reference"]).describe("Kind of element to remove."),
  id: IdentifierSchema.describe("Id of the element."),
});

export type ModelRemoveElementInput = z.infer<typeof ModelRemoveElementInputSchema>;

export interface ModelRemoveElementOutput {
  kind: ModelElementKind;
  id: string;
  removedLinks: string[];
}

function removeElement(service: CausalModelService, input: ModelRemoveElementInput): string[] {
  switch (input.kind) {
    case "node":
      return service.removeNode(input.id);
    case "reference":
      return service.removeReference(input.id);
    case "link":
      service.removeLink(input.id);
      return [input.id];
  }
}

export async function modelRemoveElementLogic(
  input: ModelRemoveElementInput,
  context: RequestContext,
): Promise<ModelRemoveElementOutput> {
  logger.info("Executing model_remove_element tool", { ...context, kind: input.kind, id: input.id });
  const service = getCausalModelService();
  const removedLinks = removeElement(service, input);

  if (removedLinks.length > 0) {
    logger.debug("Links removed with element", { ...context, removedLinks });
  }
  return { kind: input.kind, id: input.id, removedLinks };
}
