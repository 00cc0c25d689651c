/**
 * @fileoverview Input sanitization helpers: redaction of sensitive fields and
 * truncation of bulky payloads before logging, and confinement of
 * user-supplied paths to a root directory.
 * @module src/utils/security/sanitization
 */

import path from "path";
import { BaseErrorCode, McpError } from "../../types-global/errors.js";

const SENSITIVE_KEY_PATTERN = /pass(word)?|secret|token|api[-_]?key|authorization|credential/i;
const MAX_LOGGED_STRING_LENGTH = 500;
const MAX_DEPTH = 8;

export interface PathSanitizeOptions {
  /** Directory the result must stay within. */
  rootDir: string;
  /** Accept absolute input paths (still confined to `rootDir`). */
  allowAbsolute?: boolean;
}

function redact(value: unknown, depth: number, seen: WeakSet<object>): unknown {
  if (typeof value === "string") {
    return value.length > MAX_LOGGED_STRING_LENGTH
      ? `${value.slice(0, MAX_LOGGED_STRING_LENGTH)}... [${value.length - MAX_LOGGED_STRING_LENGTH} more chars]`
      : value;
  }
  if (value === null || typeof value !== "object") {
    return value;
  }
  if (depth >= MAX_DEPTH) {
    return "[MaxDepth]";
  }
  if (seen.has(value)) {
    return "[Circular]";
  }
  seen.add(value);

  if (Array.isArray(value)) {
    return value.map((item) => redact(item, depth + 1, seen));
  }
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }

  const result: Record<string, unknown> = {};
  for (const [key, child] of Object.entries(value)) {
    result[key] = SENSITIVE_KEY_PATTERN.test(key)
      ? "[REDACTED]"
      : redact(child, depth + 1, seen);
  }
  return result;
}

/**
 * Returns a copy of `input` that is safe to log: sensitive keys are redacted
 * and long strings (RIS payloads, memos) are truncated. The input is not
 * modified.
 */
export function sanitizeInputForLogging(input: unknown): unknown {
  return redact(input, 0, new WeakSet());
}

export const sanitization = {
  /**
   * Resolves `inputPath` against `options.rootDir` and rejects anything that
   * would leave it.
   * @returns The absolute, normalized path.
   * @throws {McpError} VALIDATION_ERROR for empty, null-byte, absolute (when
   * not allowed) or escaping paths.
   */
  sanitizePath(inputPath: string, options: PathSanitizeOptions): string {
    if (!inputPath || inputPath.trim() === "") {
      throw new McpError(BaseErrorCode.VALIDATION_ERROR, "Path must be a non-empty string.");
    }
    if (inputPath.includes("\0")) {
      throw new McpError(BaseErrorCode.VALIDATION_ERROR, "Path contains a null byte.");
    }
    if (path.isAbsolute(inputPath) && !options.allowAbsolute) {
      throw new McpError(BaseErrorCode.VALIDATION_ERROR, "Absolute paths are not allowed.", {
        inputPath,
      });
    }

    const root = path.resolve(options.rootDir);
    const resolved = path.resolve(root, inputPath);
    if (resolved !== root && !resolved.startsWith(root + path.sep)) {
      throw new McpError(
        BaseErrorCode.VALIDATION_ERROR,
        `Path '${inputPath}' resolves outside of the allowed directory.`,
        { inputPath, rootDir: root },
      );
    }
    return resolved;
  },
};
