/**
 * @fileoverview Builds the MCP server, registers the causal model tools and
 * connects it over stdio.
 * @module src/mcp-server/server
 */

import { config, environment } from "../config/index.js";
import { ErrorHandler, logger, requestContextService } from "../utils/index.js";
import { ManagedMcpServer } from "./core/managedMcpServer.js";
import { registerModelAddLinkTool } from "./tools/modelAddLink/index.js";
import { registerModelAddNodeTool } from "./tools/modelAddNode/index.js";
import { registerModelAddReferenceTool } from "./tools/modelAddReference/index.js";
import { registerModelClearTool } from "./tools/modelClear/index.js";
import { registerModelExportTool } from "./tools/modelExport/index.js";
import { registerModelInspectTool } from "./tools/modelInspect/index.js";
import { registerModelQuantifyTool } from "./tools/modelQuantify/index.js";
import { registerModelRemoveElementTool } from "./tools/modelRemoveElement/index.js";
import { registerReferencesFormatTool } from "./tools/referencesFormat/index.js";
import { registerReferencesImportRisTool } from "./tools/referencesImportRis/index.js";
import { registerRisValidateTool } from "./tools/risValidate/index.js";
import { startStdioTransport } from "./transports/stdio/index.js";

/**
 * Creates the server and registers every tool.
 * @throws {McpError} If a registration fails.
 */
export async function createMcpServerInstance(): Promise<ManagedMcpServer> {
  const context = requestContextService.createRequestContext({
    operation: "createMcpServerInstance",
  });
  logger.info("Initializing MCP server instance", context);

  requestContextService.configure({
    appName: config.mcpServerName,
    appVersion: config.mcpServerVersion,
    environment,
  });

  const server = new ManagedMcpServer(
    { name: config.mcpServerName, version: config.mcpServerVersion },
    {
      capabilities: {
        logging: {},
        tools: { listChanged: true },
      },
    },
  );

  try {
    logger.debug("Registering tools...", context);
    // Keep tool registrations in alphabetical order.
    await registerModelAddLinkTool(server);
    await registerModelAddNodeTool(server);
    await registerModelAddReferenceTool(server);
    await registerModelClearTool(server);
    await registerModelExportTool(server);
    await registerModelInspectTool(server);
    await registerModelQuantifyTool(server);
    await registerModelRemoveElementTool(server);
    await registerReferencesFormatTool(server);
    await registerReferencesImportRisTool(server);
    await registerRisValidateTool(server);
    logger.info("Tools registered successfully", {
      ...context,
      tools: server.getTools().map((tool) => tool.name),
    });
  } catch (err) {
    logger.error(
      "Failed to register tools",
      err instanceof Error ? err : new Error(String(err)),
      context,
    );
    throw err;
  }

  return server;
}

/** Starts the server over stdio; exits the process on a startup failure. */
export async function initializeAndStartServer(): Promise<ManagedMcpServer> {
  const context = requestContextService.createRequestContext({
    operation: "initializeAndStartServer",
  });
  logger.info("MCP Server initialization sequence started.", context);
  try {
    const server = await createMcpServerInstance();
    await startStdioTransport(server, context);
    logger.info("MCP Server initialization sequence completed successfully.", context);
    return server;
  } catch (err) {
    ErrorHandler.handleError(err, {
      operation: "initializeAndStartServer",
      context,
      critical: true,
    });
    logger.info("Exiting process due to critical initialization error.", context);
    process.exit(1);
  }
}
