/**
 * @fileoverview Registration for the model_inspect MCP tool.
 * @module src/mcp-server/tools/modelInspect/registration
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
import { ModelInspectInputSchema, modelInspectLogic } from "./logic.js";

export async function registerModelInspectTool(server: ManagedMcpServer): Promise<void> {
  const operation = "registerModelInspectTool";
  const toolName = "model_inspect";
  const toolDescription =
    "Reads the causal model. Without 'kind' it lists every node, link and reference id; with 'kind' and 'id' it returns that element (for a node, also its parents and incoming links). Set 'includeDot' to receive the graph in Graphviz DOT format.";
  const context = requestContextService.createRequestContext({ operation });

  await ErrorHandler.tryCatch(
    async () => {
      server.registerTool(
        toolName,
        {
          title: "Inspect Model",
          description: toolDescription,
          inputSchema: ModelInspectInputSchema.shape,
          annotations: { readOnlyHint: true },
        },
        async (input, mcpProvidedContext) => {
          const richContext: RequestContext = requestContextService.createRequestContext({
            parentRequestId: context.requestId,
            operation: "modelInspectToolHandler",
            mcpToolContext: { requestId: mcpProvidedContext.requestId },
          });

          try {
            const result = await measureToolExecution(
              () => modelInspectLogic(input, richContext),
              { ...richContext, toolName },
              input,
            );
            return toJsonResult(result);
          } catch (error) {
            const handledError = ErrorHandler.handleError(error, {
              operation: "modelInspectToolHandler",
              context: richContext,
              input,
              rethrow: false,
            });
            return toErrorResult(handledError, "An unexpected error occurred while inspecting the model.");
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
