#!/usr/bin/env node
/**
 * @fileoverview Process entry point: starts telemetry, the logger and the
 * stdio MCP server, and shuts them down in order on exit signals.
 * @module src/index
 */

// Must stay the first import so instrumentation patches modules before they load.
import { shutdownOpenTelemetry } from "./utils/telemetry/instrumentation.js";

import { config, environment } from "./config/index.js";
import type { ManagedMcpServer } from "./mcp-server/core/managedMcpServer.js";
import { initializeAndStartServer } from "./mcp-server/server.js";
import { closeCausalModelService } from "./services/causalModel/index.js";
import { logger, requestContextService } from "./utils/index.js";

let server: ManagedMcpServer | undefined;
let shuttingDown = false;

const shutdown = async (signal: string): Promise<void> => {
  if (shuttingDown) return;
  shuttingDown = true;

  const shutdownContext = requestContextService.createRequestContext({
    operation: "ServerShutdown",
    triggerEvent: signal,
  });
  logger.info(`Received ${signal}. Initiating graceful shutdown...`, shutdownContext);

  try {
    if (server) {
      await server.close();
      logger.info("MCP server closed.", shutdownContext);
    }
    closeCausalModelService();
    await shutdownOpenTelemetry();
    logger.info("Graceful shutdown completed.", shutdownContext);
    await logger.close();
    process.exit(0);
  } catch (error) {
    logger.error(
      "Error during shutdown",
      error instanceof Error ? error : new Error(String(error)),
      shutdownContext,
    );
    process.exit(1);
  }
};

const start = async (): Promise<void> => {
  logger.initialize();

  const startupContext = requestContextService.createRequestContext({
    operation: "ServerStartup",
    serverName: config.mcpServerName,
    serverVersion: config.mcpServerVersion,
    environment,
    modelDbPath: config.modelDbPath,
  });
  logger.info(`Starting ${config.mcpServerName} v${config.mcpServerVersion}...`, startupContext);

  server = await initializeAndStartServer();

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));
  process.stdin.on("close", () => void shutdown("stdin-close"));
  process.on("uncaughtException", (error) => {
    logger.fatal("Uncaught exception. Shutting down.", {
      ...startupContext,
      error: error.message,
      stack: error.stack,
    });
    void shutdown("uncaughtException");
  });
  process.on("unhandledRejection", (reason: unknown) => {
    logger.fatal("Unhandled promise rejection. Shutting down.", {
      ...startupContext,
      reason: reason instanceof Error ? reason.message : String(reason),
    });
    void shutdown("unhandledRejection");
  });
};

start().catch((error: unknown) => {
  logger.crit("Fatal error during startup", {
    error: error instanceof Error ? error.message : String(error),
  });
  process.exit(1);
});
