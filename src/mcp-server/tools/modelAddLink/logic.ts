/**
 * @fileoverview Logic for the model_add_link MCP tool. The three estimates
 * describe the evidence behind the link: m1 how credible its source is, m2
 * how strong the stated causal relation is, m3 how confident the analyst is
 * in applying it to this model.
 * @module src/mcp-server/tools/modelAddLink/logic
 */

import { z } from "zod";
import {
  type CausalLink,
  EstimateSpecSchema,
  getCausalModelService,
  LinkIdSchema,
  NodeIdSchema,
  RefIdSchema,
} from "../../../services/causalModel/index.js";
import { logger, type RequestContext } from "../../../utils/index.js";

const MemoSchema = z.string().trim().max(2000).optional();

export const ModelAddLinkInputSchema = z.object({
  linkId: LinkIdSchema,
  parentId: NodeIdSchema.describe("Id of the cause node."),
  childId: NodeIdSchema.describe("Id of the effect node."),
  m1: EstimateSpecSchema.describe("Credibility of the source, as an interval in [0, 1]."),
  m2: EstimateSpecSchema.describe("Strength of the causal relation stated in the evidence."),
  m3: EstimateSpecSchema.describe("Analyst confidence that the evidence applies here."),
  m1Memo: MemoSchema.describe("Rationale for m1."),
  m2Memo: MemoSchema.describe("Rationale for m2."),
  m3Memo: MemoSchema.describe("Rationale for m3."),
  refId: RefIdSchema.optional().describe("Reference supporting the link; must already exist."),
});

export type ModelAddLinkInput = z.infer<typeof ModelAddLinkInputSchema>;

export interface ModelAddLinkOutput {
  link: CausalLink;
  parallelLinks: string[];
}

export async function modelAddLinkLogic(
  input: ModelAddLinkInput,
  context: RequestContext,
): Promise<ModelAddLinkOutput> {
  logger.info("Executing model_add_link tool", {
    ...context,
    linkId: input.linkId,
    parentId: input.parentId,
    childId: input.childId,
  });
  const service = getCausalModelService();
  const link = service.addLink(input);
  return {
    link,
    parallelLinks: service.linksBetween(link.parentId, link.childId).map((l) => l.linkId),
  };
}
