/**
 * @fileoverview Barrel file for the model_clear tool.
 * @module src/mcp-server/tools/modelClear/index
 */

export { registerModelClearTool } from "./registration.js";
