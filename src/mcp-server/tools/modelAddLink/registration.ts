/**
 * @fileoverview Registration for the model_add_link MCP tool.
 * @module src/mcp-server/tools/modelAddLink/registration
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
import { ModelAddLinkInputSchema, modelAddLinkLogic } from "./logic.js";

export async function registerModelAddLinkTool(server: ManagedMcpServer): Promise<void> {
  const operation = "registerModelAddLinkTool";
  const toolName = "model_add_link";
  const toolDescription =
    "Adds a directed causal link from a parent node to a child node. Each link carries three interval estimates in [0, 1] (m1 source credibility, m2 causal strength, m3 analyst confidence), each sampled UNIFORM or NORMAL, optional memos and an optional supporting reference. Parallel links between the same nodes are allowed and receive distinct edge keys; self links are rejected.";
  const context = requestContextService.createRequestContext({ operation });

  await ErrorHandler.tryCatch(
    async () => {
      server.registerTool(
        toolName,
        {
          title: "Add Link",
          description: toolDescription,
          inputSchema: ModelAddLinkInputSchema.shape,
        },
        async (input, mcpProvidedContext) => {
          const richContext: RequestContext = requestContextService.createRequestContext({
            parentRequestId: context.requestId,
            operation: "modelAddLinkToolHandler",
            mcpToolContext: { requestId: mcpProvidedContext.requestId },
          });

          try {
            const result = await measureToolExecution(
              () => modelAddLinkLogic(input, richContext),
              { ...richContext, toolName },
              input,
            );
            return toJsonResult(result);
          } catch (error) {
            const handledError = ErrorHandler.handleError(error, {
              operation: "modelAddLinkToolHandler",
              context: richContext,
              input,
              rethrow: false,
            });
            return toErrorResult(handledError, "An unexpected error occurred while adding the link.");
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
