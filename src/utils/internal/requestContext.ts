/**
 * @fileoverview Utilities for creating and managing request contexts.
 * A request context carries a unique request ID, a timestamp and any
 * operation-specific fields, and is threaded through logging and error
 * handling so that one tool call can be followed across modules.
 * @module src/utils/internal/requestContext
 */

import { randomUUID } from "node:crypto";

/**
 * Context attached to every log line and error report.
 */
export interface RequestContext {
  /** Unique identifier of the operation or request. */
  requestId: string;
  /** ISO 8601 creation time. */
  timestamp: string;
  [key: string]: unknown;
}

/**
 * Static values merged into every context created after `configure`.
 */
export interface ContextConfig {
  appName?: string;
  appVersion?: string;
  environment?: string;
  [key: string]: unknown;
}

let contextConfig: ContextConfig = {};

/**
 * Service creating {@link RequestContext} objects.
 */
export const requestContextService = {
  /**
   * Merges `configUpdates` into the static context configuration.
   * @returns The resulting configuration.
   */
  configure(configUpdates: Partial<ContextConfig>): ContextConfig {
    contextConfig = { ...contextConfig, ...configUpdates };
    return { ...contextConfig };
  },

  /**
   * Creates a new request context from the configured static values, a fresh
   * id and timestamp, and `additionalContext`. Later fields win, so spreading
   * a parent context keeps its `requestId`.
   */
  createRequestContext(
    additionalContext: Record<string, unknown> = {},
  ): RequestContext {
    return {
      ...contextConfig,
      requestId: randomUUID(),
      timestamp: new Date().toISOString(),
      ...additionalContext,
    };
  },
};
