/**
 * @fileoverview Barrel file for the model_add_node tool.
 * @module src/mcp-server/tools/modelAddNode/index
 */

export { registerModelAddNodeTool } from "./registration.js";
