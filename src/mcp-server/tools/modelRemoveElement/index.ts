/**
 * @fileoverview Barrel file for the model_remove_element tool.
 * @module src/mcp-server/tools/modelRemoveElement/index
 */

export { registerModelRemoveElementTool } from "./registration.js";
