/**
 * @fileoverview Winston-based singleton logger using the RFC 5424 severity
 * levels that MCP clients understand. Log lines are JSON files under the
 * configured logs directory; console output goes to stderr and only when
 * stderr is interactive, because stdout carries the MCP protocol.
 * @module src/utils/internal/logger
 */

import path from "path";
import winston from "winston";
import { config } from "../../config/index.js";
import type { RequestContext } from "./requestContext.js";

/** Severity levels, most verbose first. */
export type McpLogLevel =
  | "debug"
  | "info"
  | "notice"
  | "warning"
  | "error"
  | "crit"
  | "alert"
  | "emerg";

const mcpLevels: Record<McpLogLevel, number> = {
  emerg: 0,
  alert: 1,
  crit: 2,
  error: 3,
  warning: 4,
  notice: 5,
  info: 6,
  debug: 7,
};

const isMcpLogLevel = (value: string): value is McpLogLevel =>
  Object.prototype.hasOwnProperty.call(mcpLevels, value);

/**
 * Maps loose level names ("warn", "fatal", upper case) onto {@link McpLogLevel}.
 */
export function normalizeLogLevel(level: string): McpLogLevel {
  const lowered = level.trim().toLowerCase();
  if (lowered === "warn") return "warning";
  if (lowered === "fatal") return "emerg";
  if (lowered === "critical") return "crit";
  return isMcpLogLevel(lowered) ? lowered : "info";
}

const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    const metaString = Object.keys(meta).length
      ? ` ${JSON.stringify(meta)}`
      : "";
    return `${String(timestamp)} ${level}: ${String(message)}${metaString}`;
  }),
);

export class Logger {
  private static readonly instance: Logger = new Logger();
  private winstonLogger?: winston.Logger;
  private initialized = false;
  private currentLevel: McpLogLevel = "info";

  private constructor() {}

  public static getInstance(): Logger {
    return Logger.instance;
  }

  /**
   * Creates the winston transports. Calls before this one are dropped, which
   * keeps library code and tests quiet.
   */
  public initialize(level: string = config.logLevel): void {
    if (this.initialized) {
      this.setLevel(level);
      return;
    }
    this.currentLevel = normalizeLogLevel(level);

    const transports: Array<
      | winston.transports.FileTransportInstance
      | winston.transports.ConsoleTransportInstance
    > = [];
    const fileFormat = winston.format.combine(
      winston.format.timestamp(),
      winston.format.errors({ stack: true }),
      winston.format.json(),
    );

    if (config.logsPath) {
      transports.push(
        new winston.transports.File({
          filename: path.join(config.logsPath, "error.log"),
          level: "error",
          format: fileFormat,
        }),
        new winston.transports.File({
          filename: path.join(config.logsPath, "combined.log"),
          format: fileFormat,
        }),
      );
    }

    if (process.stderr.isTTY) {
      transports.push(
        new winston.transports.Console({
          format: consoleFormat,
          stderrLevels: Object.keys(mcpLevels),
        }),
      );
    }

    this.winstonLogger = winston.createLogger({
      levels: mcpLevels,
      level: this.currentLevel,
      transports,
      silent: transports.length === 0,
    });
    this.initialized = true;
    this.info(`Logger initialized at level '${this.currentLevel}'.`, {
      requestId: "logger-init",
      timestamp: new Date().toISOString(),
      logsPath: config.logsPath,
    });
  }

  public setLevel(level: string): void {
    this.currentLevel = normalizeLogLevel(level);
    if (this.winstonLogger) {
      this.winstonLogger.level = this.currentLevel;
    }
  }

  public get level(): McpLogLevel {
    return this.currentLevel;
  }

  public async close(): Promise<void> {
    const winstonLogger = this.winstonLogger;
    if (!winstonLogger) return;
    await new Promise<void>((resolve) => {
      winstonLogger.on("finish", () => resolve());
      winstonLogger.end();
    });
    this.winstonLogger = undefined;
    this.initialized = false;
  }

  private log(
    level: McpLogLevel,
    message: string,
    context?: RequestContext | Record<string, unknown>,
    error?: Error,
  ): void {
    if (!this.initialized || !this.winstonLogger) return;
    const meta: Record<string, unknown> = { ...context };
    if (error) {
      meta.error = { name: error.name, message: error.message, stack: error.stack };
    }
    this.winstonLogger.log(level, message, meta);
  }

  public debug(message: string, context?: RequestContext | Record<string, unknown>): void {
    this.log("debug", message, context);
  }

  public info(message: string, context?: RequestContext | Record<string, unknown>): void {
    this.log("info", message, context);
  }

  public notice(message: string, context?: RequestContext | Record<string, unknown>): void {
    this.log("notice", message, context);
  }

  public warning(message: string, context?: RequestContext | Record<string, unknown>): void {
    this.log("warning", message, context);
  }

  /**
   * Logs at `error`. The second argument is either the error itself or the
   * context when there is no error object.
   */
  public error(
    message: string,
    errorOrContext?: Error | RequestContext | Record<string, unknown>,
    context?: RequestContext | Record<string, unknown>,
  ): void {
    if (errorOrContext instanceof Error) {
      this.log("error", message, context, errorOrContext);
    } else {
      this.log("error", message, errorOrContext);
    }
  }

  public crit(message: string, context?: RequestContext | Record<string, unknown>): void {
    this.log("crit", message, context);
  }

  public fatal(message: string, context?: RequestContext | Record<string, unknown>): void {
    this.log("emerg", message, context);
  }
}

export const logger = Logger.getInstance();
