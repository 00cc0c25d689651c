/**
 * @fileoverview Registration for the ris_validate MCP tool.
 * @module src/mcp-server/tools/risValidate/registration
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
import { RisValidateInputSchema, risValidateLogic } from "./logic.js";

export async function registerRisValidateTool(server: ManagedMcpServer): Promise<void> {
  const operation = "registerRisValidateTool";
  const toolName = "ris_validate";
  const toolDescription =
    "Checks RIS text for well-formedness without changing the model: every record opens with TY and closes with ER, and every line is 'XX  - value'. Reports each issue with its line, code and severity, and optionally the parsed records.";
  const context = requestContextService.createRequestContext({ operation });

  await ErrorHandler.tryCatch(
    async () => {
      server.registerTool(
        toolName,
        {
          title: "Validate RIS",
          description: toolDescription,
          inputSchema: RisValidateInputSchema.shape,
          annotations: { readOnlyHint: true },
        },
        async (input, mcpProvidedContext) => {
          const richContext: RequestContext = requestContextService.createRequestContext({
            parentRequestId: context.requestId,
            operation: "risValidateToolHandler",
            mcpToolContext: { requestId: mcpProvidedContext.requestId },
          });

          try {
            const result = await measureToolExecution(
              () => risValidateLogic(input, richContext),
              { ...richContext, toolName },
              input,
            );
            return toJsonResult(result);
          } catch (error) {
            const handledError = ErrorHandler.handleError(error, {
              operation: "risValidateToolHandler",
              context: richContext,
              input,
              rethrow: false,
            });
            return toErrorResult(handledError, "An unexpected error occurred while validating RIS.");
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
