/**
 * @fileoverview Barrel file for the causal model service.
 * @module src/services/causalModel/index
 */

export * from "./core/modelTypes.js";
export { CausalGraph } from "./core/causalGraph.js";
export { ModelStore } from "./core/modelStore.js";
export * from "./causalModelService.js";
export * from "./export/csv.js";
export * from "./export/modelExporter.js";
export * from "./quantification/estimate.js";
export * from "./quantification/quantifier.js";
export * from "./quantification/random.js";
export * from "./references/citationFormatter.js";
export * from "./references/referenceMapper.js";
