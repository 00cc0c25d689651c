/**
 * @fileoverview Registration for the model_remove_element MCP tool.
 * @module src/mcp-server/tools/modelRemoveElement/registration
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
import { ModelRemoveElementInputSchema, modelRemoveElementLogic } from "./logic.js";

export async function registerModelRemoveElementTool(server: ManagedMcpServer): Promise<void> {
  const operation = "registerModelRemoveElementTool";
  const toolName = "model_remove_element";
  const toolDescription =
    "Removes a node, link or reference by id. Removing a node also removes its links; removing a reference also removes every link citing it. Returns the ids of the removed links.";
  const context = requestContextService.createRequestContext({ operation });

  await ErrorHandler.tryCatch(
    async () => {
      server.registerTool(
        toolName,
        {
          title: "Remove Element",
          description: toolDescription,
          inputSchema: ModelRemoveElementInputSchema.shape,
          annotations: { destructiveHint: true },
        },
        async (input, mcpProvidedContext) => {
          const richContext: RequestContext = requestContextService.createRequestContext({
            parentRequestId: context.requestId,
            operation: "modelRemoveElementToolHandler",
            mcpToolContext: { requestId: mcpProvidedContext.requestId },
          });

          try {
            const result = await measureToolExecution(
              () => modelRemoveElementLogic(input, richContext),
              { ...richContext, toolName },
              input,
            );
            return toJsonResult(result);
          } catch (error) {
            const handledError = ErrorHandler.handleError(error, {
              operation: "modelRemoveElementToolHandler",
              context: richContext,
              input,
              rethrow: false,
            });
            return toErrorResult(handledError, "An unexpected error occurred while removing the element.");
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
