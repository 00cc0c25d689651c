/**
 * @fileoverview Centralized error classification, logging and wrapping.
 * Every error leaving a service or tool handler goes through
 * {@link ErrorHandler.handleError}, which turns it into an {@link McpError}
 * with a {@link BaseErrorCode} and logs it with its request context.
 * @module src/utils/internal/errorHandler
 */

import { ZodError } from "zod";
import { BaseErrorCode, McpError } from "../../types-global/errors.js";
import { sanitizeInputForLogging } from "../security/sanitization.js";
import { logger } from "./logger.js";
import type { RequestContext } from "./requestContext.js";

export interface ErrorHandlerOptions {
  /** Name of the operation that failed. */
  operation: string;
  context?: RequestContext | Record<string, unknown>;
  /** Input that led to the error; sanitized before logging. */
  input?: unknown;
  /** Throw the wrapped error instead of returning it. */
  rethrow?: boolean;
  /** Code used when the error cannot be classified. */
  errorCode?: BaseErrorCode;
  /** Marks the failure as one the process cannot continue after. */
  critical?: boolean;
}

/**
 * Classification of non-McpError errors by message. First match wins.
 */
const ERROR_MESSAGE_PATTERNS: ReadonlyArray<{
  pattern: RegExp;
  code: BaseErrorCode;
}> = [
  { pattern: /not found|does not exist|no such/i, code: BaseErrorCode.NOT_FOUND },
  { pattern: /already exists|duplicate|conflict/i, code: BaseErrorCode.CONFLICT },
  { pattern: /invalid|malformed|must be|required/i, code: BaseErrorCode.VALIDATION_ERROR },
  { pattern: /parse|unexpected token|syntax/i, code: BaseErrorCode.PARSING_ERROR },
];

const SQLITE_CONSTRAINT_CODES: Readonly<Record<string, BaseErrorCode>> = {
  SQLITE_CONSTRAINT_PRIMARYKEY: BaseErrorCode.CONFLICT,
  SQLITE_CONSTRAINT_UNIQUE: BaseErrorCode.CONFLICT,
  SQLITE_CONSTRAINT_FOREIGNKEY: BaseErrorCode.NOT_FOUND,
  SQLITE_CONSTRAINT_NOTNULL: BaseErrorCode.VALIDATION_ERROR,
};

function getErrorCodeProperty(error: Error): string | undefined {
  if ("code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

export class ErrorHandler {
  /**
   * Determines the {@link BaseErrorCode} for an arbitrary thrown value.
   */
  public static determineErrorCode(error: unknown): BaseErrorCode {
    if (error instanceof McpError) {
      return error.code;
    }
    if (error instanceof ZodError) {
      return BaseErrorCode.VALIDATION_ERROR;
    }
    if (!(error instanceof Error)) {
      return BaseErrorCode.UNKNOWN_ERROR;
    }

    const code = getErrorCodeProperty(error);
    if (code) {
      if (code.startsWith("SQLITE_")) {
        return SQLITE_CONSTRAINT_CODES[code] ?? BaseErrorCode.DATABASE_ERROR;
      }
      if (code === "ENOENT") {
        return BaseErrorCode.NOT_FOUND;
      }
      if (code === "EACCES" || code === "EEXIST" || code === "EISDIR") {
        return BaseErrorCode.FILE_SYSTEM_ERROR;
      }
    }

    for (const { pattern, code: mapped } of ERROR_MESSAGE_PATTERNS) {
      if (pattern.test(error.message)) {
        return mapped;
      }
    }
    return BaseErrorCode.INTERNAL_ERROR;
  }

  /**
   * Logs `error` and wraps it in an {@link McpError}. The wrapped error is
   * returned, or thrown when `options.rethrow` is set.
   */
  public static handleError(error: unknown, options: ErrorHandlerOptions): Error {
    const { operation, context, input, rethrow = false, critical = false } = options;

    const classified = ErrorHandler.determineErrorCode(error);
    const errorCode =
      classified === BaseErrorCode.INTERNAL_ERROR ||
      classified === BaseErrorCode.UNKNOWN_ERROR
        ? (options.errorCode ?? classified)
        : classified;
    const originalMessage = error instanceof Error ? error.message : String(error);

    let finalError: McpError;
    if (error instanceof McpError) {
      finalError = error;
    } else if (error instanceof ZodError) {
      finalError = new McpError(
        BaseErrorCode.VALIDATION_ERROR,
        `Error in ${operation}: ${error.issues.map((i) => `${i.path.join(".") || "input"}: ${i.message}`).join("; ")}`,
        { issues: error.issues },
      );
    } else {
      finalError = new McpError(errorCode, `Error in ${operation}: ${originalMessage}`, {
        originalErrorName: error instanceof Error ? error.name : typeof error,
        originalMessage,
      });
    }

    const logPayload: Record<string, unknown> = {
      ...context,
      operation,
      errorCode: finalError.code,
      critical,
    };
    if (input !== undefined) {
      logPayload.input = sanitizeInputForLogging(input);
    }
    logger.error(
      `Error in ${operation}: ${originalMessage}`,
      error instanceof Error ? error : new Error(originalMessage),
      logPayload,
    );

    if (rethrow) {
      throw finalError;
    }
    return finalError;
  }

  /**
   * Runs `fn`, routing any failure through {@link ErrorHandler.handleError}
   * and rethrowing the wrapped error.
   */
  public static async tryCatch<T>(
    fn: () => Promise<T> | T,
    options: Omit<ErrorHandlerOptions, "rethrow">,
  ): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      throw ErrorHandler.handleError(error, { ...options, rethrow: false });
    }
  }
}
