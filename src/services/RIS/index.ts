/**
 * @fileoverview Barrel file for the RIS codec.
 * @module src/services/RIS/index
 */

export * from "./core/risTypes.js";
export * from "./core/risTagTable.js";
export * from "./parsing/risParser.js";
export * from "./parsing/risValidator.js";
export * from "./writing/risWriter.js";
