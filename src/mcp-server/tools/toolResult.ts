/**
 * @fileoverview Shapes tool outcomes into MCP `CallToolResult`s. Successful
 * results are pretty-printed JSON; failures are a JSON `error` object.
 * @module src/mcp-server/tools/toolResult
 */

import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { BaseErrorCode, type ErrorResponse, McpError } from "../../types-global/errors.js";

export function toJsonResult(result: unknown): CallToolResult {
  return {
    content: [{ type: "text", text: JSON.stringify(result, null, 2) }],
    isError: false,
  };
}

/**
 * @param fallbackMessage - Used when `handledError` is not an `McpError`.
 */
export function toErrorResult(handledError: Error, fallbackMessage: string): CallToolResult {
  const mcpError =
    handledError instanceof McpError
      ? handledError
      : new McpError(BaseErrorCode.INTERNAL_ERROR, fallbackMessage, {
          originalErrorName: handledError.name,
          originalErrorMessage: handledError.message,
        });

  const error: ErrorResponse = {
    code: mcpError.code,
    message: mcpError.message || fallbackMessage,
    details: mcpError.details,
  };
  return {
    content: [{ type: "text", text: JSON.stringify({ error }) }],
    isError: true,
  };
}
