/**
 * @fileoverview Barrel file for the model_quantify tool.
 * @module src/mcp-server/tools/modelQuantify/index
 */

export { registerModelQuantifyTool } from "./registration.js";
