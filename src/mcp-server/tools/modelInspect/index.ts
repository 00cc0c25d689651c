/**
 * @fileoverview Barrel file for the model_inspect tool.
 * @module src/mcp-server/tools/modelInspect/index
 */

export { registerModelInspectTool } from "./registration.js";
