/**
 * @fileoverview Connects an MCP server to the process's stdin/stdout.
 * stdout carries protocol messages only; all logging goes to files or stderr.
 * @module src/mcp-server/transports/stdio/index
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { BaseErrorCode } from "../../../types-global/errors.js";
import { ErrorHandler, logger, type RequestContext } from "../../../utils/index.js";

export async function startStdioTransport(
  server: McpServer,
  parentContext: RequestContext,
): Promise<StdioServerTransport> {
  const operationContext = { ...parentContext, operation: "startStdioTransport", transportType: "stdio" };
  logger.info("Attempting to connect stdio transport...", operationContext);

  return ErrorHandler.tryCatch(
    async () => {
      const transport = new StdioServerTransport();
      await server.connect(transport);
      logger.info("MCP server connected over stdio.", operationContext);
      return transport;
    },
    {
      operation: "startStdioTransport",
      context: operationContext,
      errorCode: BaseErrorCode.INITIALIZATION_FAILED,
      critical: true,
    },
  );
}
