/**
 * @fileoverview Registration for the model_export MCP tool.
 * @module src/mcp-server/tools/modelExport/registration
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
import { ModelExportInputSchema, modelExportLogic } from "./logic.js";

export async function registerModelExportTool(server: ManagedMcpServer): Promise<void> {
  const operation = "registerModelExportTool";
  const toolName = "model_export";
  const toolDescription =
    "Exports the causal model into a directory under the exports directory: nodes.csv, links.csv, references.csv, references.ris, model.dot and a copy of the SQLite database.";
  const context = requestContextService.createRequestContext({ operation });

  await ErrorHandler.tryCatch(
    async () => {
      server.registerTool(
        toolName,
        {
          title: "Export Model",
          description: toolDescription,
          inputSchema: ModelExportInputSchema.shape,
        },
        async (input, mcpProvidedContext) => {
          const richContext: RequestContext = requestContextService.createRequestContext({
            parentRequestId: context.requestId,
            operation: "modelExportToolHandler",
            mcpToolContext: { requestId: mcpProvidedContext.requestId },
          });

          try {
            const result = await measureToolExecution(
              () => modelExportLogic(input, richContext),
              { ...richContext, toolName },
              input,
            );
            return toJsonResult(result);
          } catch (error) {
            const handledError = ErrorHandler.handleError(error, {
              operation: "modelExportToolHandler",
              context: richContext,
              input,
              rethrow: false,
            });
            return toErrorResult(handledError, "An unexpected error occurred while exporting the model.");
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
