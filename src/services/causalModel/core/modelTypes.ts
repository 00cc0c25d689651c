/**
 * @fileoverview Entities of the causal evidence model and the Zod schemas
 * that validate them on the way in.
 * @module src/services/causalModel/core/modelTypes
 */

import { z } from "zod";

export const ESTIMATE_TYPES = ["UNIFORM", "NORMAL"] as const;
export type EstimateType = (typeof ESTIMATE_TYPES)[number];

export const IdentifierSchema = z
  .string()
  .trim()
  .min(1, "Identifiers must not be empty")
  .max(64, "Identifiers are at most 64 characters")
  .regex(/^[A-Za-z0-9._:-]+$/, "Identifiers may only contain letters, digits, '.', '_', ':' and '-'");

export const NodeIdSchema = IdentifierSchema.describe("Unique identifier of a node.");
export const LinkIdSchema = IdentifierSchema.describe("Unique identifier of a link.");
export const RefIdSchema = IdentifierSchema.describe("Unique identifier of a reference.");

/**
 * An analyst estimate for a value in [0, 1]. For UNIFORM, `a` and `b` bound
 * the range; for NORMAL they are the 95% interval.
 */
export const EstimateSpecSchema = z
  .object({
    type: z.enum(ESTIMATE_TYPES).describe("Distribution used to sample the estimate."),
    a: z.number().min(0).max(1).describe("Lower bound (UNIFORM) or lower 95% limit (NORMAL)."),
    b: z.number().min(0).max(1).describe("Upper bound (UNIFORM) or upper 95% limit (NORMAL)."),
  })
  .refine((estimate) => estimate.a <= estimate.b, {
    message: "Estimate lower bound 'a' must not exceed upper bound 'b'",
    path: ["a"],
  });
export type EstimateSpec = z.infer<typeof EstimateSpecSchema>;

export const CausalNodeSchema = z.object({
  nodeId: NodeIdSchema,
  name: z.string().trim().min(1).optional().describe("Full name of the node."),
  keywords: z.string().trim().optional().describe("Space separated keywords tagging the node."),
});
export type CausalNode = z.infer<typeof CausalNodeSchema>;

export const NewCausalLinkSchema = z.object({
  linkId: LinkIdSchema,
  parentId: NodeIdSchema.describe("Cause node."),
  childId: NodeIdSchema.describe("Effect node."),
  m1: EstimateSpecSchema.describe("Credibility of the supporting source."),
  m2: EstimateSpecSchema.describe("Strength of the causal relation stated in the evidence."),
  m3: EstimateSpecSchema.describe("Analyst confidence in the subject matter."),
  m1Memo: z.string().optional().describe("Reasoning behind m1."),
  m2Memo: z.string().optional().describe("Reasoning behind m2."),
  m3Memo: z.string().optional().describe("Reasoning behind m3."),
  refId: RefIdSchema.optional().describe("Reference supporting the link."),
});
export type NewCausalLink = z.infer<typeof NewCausalLinkSchema>;

/** A stored link; `edgeKey` tells parallel links between one pair apart. */
export interface CausalLink extends NewCausalLink {
  edgeKey: number;
}

export const ReferenceSchema = z.object({
  refId: RefIdSchema,
  title: z.string().trim().min(1, "A reference needs a non-empty title"),
  year: z.string().trim().min(1).optional(),
  authors: z.array(z.string().trim().min(1)).optional(),
  publicationType: z.string().trim().min(1).optional().describe("RIS TY value, e.g. JOUR."),
  publisher: z.string().trim().min(1).optional(),
});
export type Reference = z.infer<typeof ReferenceSchema>;

export type ModelElementKind = "node" | "link" | "reference";
