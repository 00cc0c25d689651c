/**
 * @fileoverview McpServer subclass that records tool registrations so the
 * registered tool set can be listed without reaching into SDK internals.
 * @module src/mcp-server/core/managedMcpServer
 */

import {
  McpServer,
  type RegisteredTool,
  type ToolCallback,
} from "@modelcontextprotocol/sdk/server/mcp.js";
import type { ToolAnnotations } from "@modelcontextprotocol/sdk/types.js";
import type { ZodRawShape } from "zod";

type ServerIdentity = ConstructorParameters<typeof McpServer>[0];
type McpServerOptions = NonNullable<ConstructorParameters<typeof McpServer>[1]>;

export interface ToolConfig<InputArgs extends ZodRawShape, OutputArgs extends ZodRawShape> {
  title?: string;
  description?: string;
  inputSchema?: InputArgs;
  outputSchema?: OutputArgs;
  annotations?: ToolAnnotations;
  _meta?: Record<string, unknown>;
}

export interface RegisteredToolInfo {
  name: string;
  title?: string;
  description?: string;
  inputSchema?: ZodRawShape;
}

export class ManagedMcpServer extends McpServer {
  private readonly storedTools: RegisteredToolInfo[] = [];

  public readonly serverIdentity: ServerIdentity;
  public readonly serverOptions?: McpServerOptions;

  constructor(identity: ServerIdentity, options?: McpServerOptions) {
    super(identity, options);
    this.serverIdentity = identity;
    this.serverOptions = options;
  }

  override registerTool<InputArgs extends ZodRawShape, OutputArgs extends ZodRawShape>(
    name: string,
    toolConfig: ToolConfig<InputArgs, OutputArgs>,
    callback: ToolCallback<InputArgs>,
  ): RegisteredTool {
    this.storedTools.push({
      name,
      title: toolConfig.title,
      description: toolConfig.description,
      inputSchema: toolConfig.inputSchema,
    });
    return super.registerTool(name, toolConfig, callback);
  }

  /** Metadata of every tool registered so far, in registration order. */
  public getTools(): RegisteredToolInfo[] {
    return [...this.storedTools];
  }

  public get name(): string {
    return this.serverIdentity.name;
  }

  public get version(): string {
    return this.serverIdentity.version;
  }

  public get capabilities(): McpServerOptions["capabilities"] {
    return this.serverOptions?.capabilities;
  }
}
