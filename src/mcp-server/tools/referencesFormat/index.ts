/**
 * @fileoverview Barrel file for the references_format tool.
 * @module src/mcp-server/tools/referencesFormat/index
 */

export { registerReferencesFormatTool } from "./registration.js";
