/**
 * @fileoverview Registration for the model_add_reference MCP tool.
 * @module src/mcp-server/tools/modelAddReference/registration
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
import { ModelAddReferenceInputSchema, modelAddReferenceLogic } from "./logic.js";

export async function registerModelAddReferenceTool(server: ManagedMcpServer): Promise<void> {
  const operation = "registerModelAddReferenceTool";
  const toolName = "model_add_reference";
  const toolDescription =
    "Adds a bibliographic reference that links can cite. A title is required; the reference id must be unused.";
  const context = requestContextService.createRequestContext({ operation });

  await ErrorHandler.tryCatch(
    async () => {
      server.registerTool(
        toolName,
        {
          title: "Add Reference",
          description: toolDescription,
          inputSchema: ModelAddReferenceInputSchema.shape,
        },
        async (input, mcpProvidedContext) => {
          const richContext: RequestContext = requestContextService.createRequestContext({
            parentRequestId: context.requestId,
            operation: "modelAddReferenceToolHandler",
            mcpToolContext: { requestId: mcpProvidedContext.requestId },
          });

          try {
            const result = await measureToolExecution(
              () => modelAddReferenceLogic(input, richContext),
              { ...richContext, toolName },
              input,
            );
            return toJsonResult(result);
          } catch (error) {
            const handledError = ErrorHandler.handleError(error, {
              operation: "modelAddReferenceToolHandler",
              context: richContext,
              input,
              rethrow: false,
            });
            return toErrorResult(handledError, "An unexpected error occurred while adding the reference.");
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
