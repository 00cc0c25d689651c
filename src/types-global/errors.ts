/**
 * @fileoverview Defines standardized error codes, a custom error class, and
 * related schemas for handling errors within the causal evidence server.
 * @module src/types-global/errors
 */

import { z } from "zod";

/**
 * Defines a set of standardized error codes for common issues within the
 * server or its tools.
 */
export enum BaseErrorCode {
  /** The requested resource or entity was not found. */
  NOT_FOUND = "NOT_FOUND",
  /** The request could not be completed due to a conflict with the current state. */
  CONFLICT = "CONFLICT",
  /** The request failed due to invalid input parameters or data. */
  VALIDATION_ERROR = "VALIDATION_ERROR",
  /** An error occurred while parsing input data (RIS text, CSV, JSON). */
  PARSING_ERROR = "PARSING_ERROR",
  /** An error occurred in the model database. */
  DATABASE_ERROR = "DATABASE_ERROR",
  /** A filesystem read or write failed. */
  FILE_SYSTEM_ERROR = "FILE_SYSTEM_ERROR",
  /** An operation was requested in a state that does not allow it. */
  INVALID_STATE = "INVALID_STATE",
  /** An unexpected error occurred within the server. */
  INTERNAL_ERROR = "INTERNAL_ERROR",
  /** An error occurred, but the specific cause is unknown or cannot be categorized. */
  UNKNOWN_ERROR = "UNKNOWN_ERROR",
  /** An error occurred during the loading or validation of configuration data. */
  CONFIGURATION_ERROR = "CONFIGURATION_ERROR",
  /** An error occurred during the initialization phase of a service or module. */
  INITIALIZATION_FAILED = "INITIALIZATION_FAILED",
}

/**
 * Custom error class carrying a {@link BaseErrorCode} and optional details.
 */
export class McpError extends Error {
  public readonly code: BaseErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(
    code: BaseErrorCode,
    message?: string,
    details?: Record<string, unknown>,
  ) {
    super(message);
    this.code = code;
    this.details = details;
    this.name = "McpError";
    Object.setPrototypeOf(this, McpError.prototype);
  }
}

/**
 * Zod schema for validating error objects returned to MCP clients.
 */
export const ErrorSchema = z
  .object({
    code: z.nativeEnum(BaseErrorCode),
    message: z.string().min(1),
    details: z.record(z.unknown()).optional(),
  })
  .describe("Standard error object returned by the causal evidence tools.");

export type ErrorResponse = z.infer<typeof ErrorSchema>;
