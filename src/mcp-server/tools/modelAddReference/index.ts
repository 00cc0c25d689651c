/**
 * @fileoverview Barrel file for the model_add_reference tool.
 * @module src/mcp-server/tools/modelAddReference/index
 */

export { registerModelAddReferenceTool } from "./registration.js";
