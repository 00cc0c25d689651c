/**
 * @fileoverview Barrel file for the references_import_ris tool.
 * @module src/mcp-server/tools/referencesImportRis/index
 */

export { registerReferencesImportRisTool } from "./registration.js";
