/**
 * @fileoverview Registration for the model_add_node MCP tool.
 * @module src/mcp-server/tools/modelAddNode/registration
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
import { ModelAddNodeInputSchema, modelAddNodeLogic } from "./logic.js";

export async function registerModelAddNodeTool(server: ManagedMcpServer): Promise<void> {
  const operation = "registerModelAddNodeTool";
  const toolName = "model_add_node";
  const toolDescription =
    "Adds a node (a cause or effect) to the causal model. Node ids must be unique among nodes. Returns the stored node and the node count.";
  const context = requestContextService.createRequestContext({ operation });

  await ErrorHandler.tryCatch(
    async () => {
      server.registerTool(
        toolName,
        {
          title: "Add Node",
          description: toolDescription,
          inputSchema: ModelAddNodeInputSchema.shape,
        },
        async (input, mcpProvidedContext) => {
          const richContext: RequestContext = requestContextService.createRequestContext({
            parentRequestId: context.requestId,
            operation: "modelAddNodeToolHandler",
            mcpToolContext: { requestId: mcpProvidedContext.requestId },
          });

          try {
            const result = await measureToolExecution(
              () => modelAddNodeLogic(input, richContext),
              { ...richContext, toolName },
              input,
            );
            return toJsonResult(result);
          } catch (error) {
            const handledError = ErrorHandler.handleError(error, {
              operation: "modelAddNodeToolHandler",
              context: richContext,
              input,
              rethrow: false,
            });
            return toErrorResult(handledError, "An unexpected error occurred while adding the node.");
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
