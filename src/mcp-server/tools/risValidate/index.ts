/**
 * @fileoverview Barrel file for the ris_validate tool.
 * @module src/mcp-server/tools/risValidate/index
 */

export { registerRisValidateTool } from "./registration.js";
