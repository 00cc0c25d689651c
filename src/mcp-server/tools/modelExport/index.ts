/**
 * @fileoverview Barrel file for the model_export tool.
 * @module src/mcp-server/tools/modelExport/index
 */

export { registerModelExportTool } from "./registration.js";
