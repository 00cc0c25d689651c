/**
 * @fileoverview Registration for the references_import_ris MCP tool.
 * @module src/mcp-server/tools/referencesImportRis/registration
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
import { ReferencesImportRisInputSchema, referencesImportRisLogic } from "./logic.js";

export async function registerReferencesImportRisTool(server: ManagedMcpServer): Promise<void> {
  const operation = "registerReferencesImportRisTool";
  const toolName = "references_import_ris";
  const toolDescription =
    "Imports every record of an RIS file as a reference, all or none. Title comes from TI or T1, authors from AU or A1, year from PY or Y1, publisher from PB, JO, JF or OP, and the reference type from TY. Malformed RIS is rejected with the list of issues; warnings are returned with the imported references.";
  const context = requestContextService.createRequestContext({ operation });

  await ErrorHandler.tryCatch(
    async () => {
      server.registerTool(
        toolName,
        {
          title: "Import RIS References",
          description: toolDescription,
          inputSchema: ReferencesImportRisInputSchema.shape,
        },
        async (input, mcpProvidedContext) => {
          const richContext: RequestContext = requestContextService.createRequestContext({
            parentRequestId: context.requestId,
            operation: "referencesImportRisToolHandler",
            mcpToolContext: { requestId: mcpProvidedContext.requestId },
          });

          try {
            const result = await measureToolExecution(
              () => referencesImportRisLogic(input, richContext),
              { ...richContext, toolName },
              input,
            );
            return toJsonResult(result);
          } catch (error) {
            const handledError = ErrorHandler.handleError(error, {
              operation: "referencesImportRisToolHandler",
              context: richContext,
              input,
              rethrow: false,
            });
            return toErrorResult(handledError, "An unexpected error occurred while importing RIS references.");
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
