/**
 * @fileoverview Registration for the references_format MCP tool.
 * @module src/mcp-server/tools/referencesFormat/registration
 */

import { BaseErrorCode } from "../../../types-global/errors.js";
import {
  ErrorHandler,
  logger,
  measureToolExecution,
  type RequestContext,
  requestContextService,
} from "../../../utils/index.js";
import type { ManagedMcpServer } from "../../core/managedMcpServer.js";
import { toErrorResult, toJsonResult } from "../toolResult.js";
import { ReferencesFormatInputSchema, referencesFormatLogic } from "./logic.js";

export async function registerReferencesFormatTool(server: ManagedMcpServer): Promise<void> {
  const operation = "registerReferencesFormatTool";
  const toolName = "references_format";
  const toolDescription =
    "Formats stored references as RIS, BibTeX or APA, Harvard or Vancouver text bibliographies. Formats every stored reference when no ids are given.";
  const context = requestContextService.createRequestContext({ operation });

  await ErrorHandler.tryCatch(
    async () => {
      server.registerTool(
        toolName,
        {
          title: "Format References",
          description: toolDescription,
          inputSchema: ReferencesFormatInputSchema.shape,
          annotations: { readOnlyHint: true },
        },
        async (input, mcpProvidedContext) => {
          const richContext: RequestContext = requestContextService.createRequestContext({
            parentRequestId: context.requestId,
            operation: "referencesFormatToolHandler",
            mcpToolContext: { requestId: mcpProvidedContext.requestId },
          });

          try {
            const result = await measureToolExecution(
              () => referencesFormatLogic(input, richContext),
              { ...richContext, toolName },
              input,
            );
            return toJsonResult(result);
          } catch (error) {
            const handledError = ErrorHandler.handleError(error, {
              operation: "referencesFormatToolHandler",
              context: richContext,
              input,
              rethrow: false,
            });
            return toErrorResult(handledError, "An unexpected error occurred while formatting references.");
          }
        },
      );
      logger.notice(`Tool '${toolName}' registered.`, context);
    },
    {
      operation,
      context,
      errorCode: BaseErrorCode.INITIALIZATION_FAILED,
      critical: true,
    },
  );
}
