/**
 * @fileoverview Barrel file for the model_add_link tool.
 * @module src/mcp-server/tools/modelAddLink/index
 */

export { registerModelAddLinkTool } from "./registration.js";
