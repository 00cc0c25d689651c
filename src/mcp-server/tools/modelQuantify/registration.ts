/**
 * @fileoverview Registration for the model_quantify MCP tool.
 * @module src/mcp-server/tools/modelQuantify/registration
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
import { ModelQuantifyInputSchema, modelQuantifyLogic } from "./logic.js";

export async function registerModelQuantifyTool(server: ManagedMcpServer): Promise<void> {
  const operation = "registerModelQuantifyTool";
  const toolName = "model_quantify";
  const toolDescription =
    "Computes the conditional probability table of a node by Monte Carlo sampling of its incoming links' estimates. Link weights are m1*m3 normalised per parent, parallel links are aggregated arithmetically or geometrically, and parent combinations are combined by noisy-OR. Every value is reported as mean, 5th and 95th percentile. Optionally writes the table as CSV into the exports directory.";
  const context = requestContextService.createRequestContext({ operation });

  await ErrorHandler.tryCatch(
    async () => {
      server.registerTool(
        toolName,
        {
          title: "Quantify Node",
          description: toolDescription,
          inputSchema: ModelQuantifyInputSchema.shape,
        },
        async (input, mcpProvidedContext) => {
          const richContext: RequestContext = requestContextService.createRequestContext({
            parentRequestId: context.requestId,
            operation: "modelQuantifyToolHandler",
            mcpToolContext: { requestId: mcpProvidedContext.requestId },
          });

          try {
            const result = await measureToolExecution(
              () => modelQuantifyLogic(input, richContext),
              { ...richContext, toolName },
              input,
            );
            return toJsonResult(result);
          } catch (error) {
            const handledError = ErrorHandler.handleError(error, {
              operation: "modelQuantifyToolHandler",
              context: richContext,
              input,
              rethrow: false,
            });
            return toErrorResult(handledError, "An unexpected error occurred while quantifying the node.");
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
