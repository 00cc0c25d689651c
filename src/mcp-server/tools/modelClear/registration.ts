/**
 * @fileoverview Registration for the model_clear MCP tool.
 * @module src/mcp-server/tools/modelClear/registration
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
import { ModelClearInputSchema, modelClearLogic } from "./logic.js";

export async function registerModelClearTool(server: ManagedMcpServer): Promise<void> {
  const operation = "registerModelClearTool";
  const toolName = "model_clear";
  const toolDescription =
    "Deletes every node, link and reference from the causal model. Requires 'confirm: true'. Returns how many elements were removed.";
  const context = requestContextService.createRequestContext({ operation });

  await ErrorHandler.tryCatch(
    async () => {
      server.registerTool(
        toolName,
        {
          title: "Clear Model",
          description: toolDescription,
          inputSchema: ModelClearInputSchema.shape,
          annotations: { destructiveHint: true },
        },
        async (input, mcpProvidedContext) => {
          const richContext: RequestContext = requestContextService.createRequestContext({
            parentRequestId: context.requestId,
            operation: "modelClearToolHandler",
            mcpToolContext: { requestId: mcpProvidedContext.requestId },
          });

          try {
            const result = await measureToolExecution(
              () => modelClearLogic(input, richContext),
              { ...richContext, toolName },
              input,
            );
            return toJsonResult(result);
          } catch (error) {
            const handledError = ErrorHandler.handleError(error, {
              operation: "modelClearToolHandler",
              context: richContext,
              input,
              rethrow: false,
            });
            return toErrorResult(handledError, "An unexpected error occurred while clearing the model.");
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
