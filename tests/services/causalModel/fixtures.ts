import type { EstimateSpec, NewCausalLink } from "../../../src/services/causalModel/index.js";

/** A UNIFORM estimate pinned to one value, so sampling is deterministic. */
export const fixed = (value: number): EstimateSpec => ({ type: "UNIFORM", a: value, b: value });

export const link = (
  linkId: string,
  parentId: string,
  childId: string,
  m1 = 1,
  m2 = 0.5,
  m3 = 1,
  refId?: string,
): NewCausalLink => ({
  linkId,
  parentId,
  childId,
  m1: fixed(m1),
  m2: fixed(m2),
  m3: fixed(m3),
  refId,
});
