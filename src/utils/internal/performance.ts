/**
 * @fileoverview Wraps tool logic in an OpenTelemetry span and logs a
 * metrics line (duration, payload sizes, error code) when it settles.
 * @module src/utils/internal/performance
 */

import { SpanStatusCode, trace } from "@opentelemetry/api";
import {
  ATTR_CODE_FUNCTION,
  ATTR_CODE_NAMESPACE,
} from "../telemetry/semconv.js";
import { config } from "../../config/index.js";
import { ErrorHandler } from "./errorHandler.js";
import { logger } from "./logger.js";
import type { RequestContext } from "./requestContext.js";

/** UTF-8 size of the payload's JSON form. */
function getPayloadSize(payload: unknown): number {
  if (payload === undefined || payload === null) return 0;
  if (typeof payload === "string") return Buffer.byteLength(payload, "utf8");
  try {
    return Buffer.byteLength(JSON.stringify(payload) ?? "", "utf8");
  } catch {
    // Circular structures are not measured.
    return 0;
  }
}

/**
 * Runs `toolLogicFn` inside a `tool_execution:<toolName>` span.
 * Errors are recorded on the span and rethrown unchanged.
 */
export async function measureToolExecution<T>(
  toolLogicFn: () => Promise<T>,
  context: RequestContext & { toolName: string },
  inputPayload: unknown,
): Promise<T> {
  const tracer = trace.getTracer(
    config.openTelemetry.serviceName,
    config.openTelemetry.serviceVersion,
  );
  const { toolName } = context;

  return tracer.startActiveSpan(`tool_execution:${toolName}`, async (span) => {
    span.setAttributes({
      [ATTR_CODE_FUNCTION]: toolName,
      [ATTR_CODE_NAMESPACE]: "causal-evidence-tools",
      "mcp.tool.input_bytes": getPayloadSize(inputPayload),
    });

    const startTime = process.hrtime.bigint();
    let isSuccess = false;
    let errorCode: string | undefined;
    let outputPayload: T | undefined;

    try {
      const result = await toolLogicFn();
      isSuccess = true;
      outputPayload = result;
      span.setStatus({ code: SpanStatusCode.OK });
      span.setAttribute("mcp.tool.output_bytes", getPayloadSize(outputPayload));
      return result;
    } catch (error) {
      errorCode = ErrorHandler.determineErrorCode(error);

      if (error instanceof Error) {
        span.recordException(error);
      }
      span.setStatus({
        code: SpanStatusCode.ERROR,
        message: error instanceof Error ? error.message : String(error),
      });

      throw error;
    } finally {
      const endTime = process.hrtime.bigint();
      const durationMs = Number(endTime - startTime) / 1_000_000;

      span.setAttributes({
        "mcp.tool.duration_ms": parseFloat(durationMs.toFixed(2)),
        "mcp.tool.success": isSuccess,
      });
      if (errorCode) {
        span.setAttribute("mcp.tool.error_code", errorCode);
      }

      span.end();

      logger.info("Tool execution finished.", {
        ...context,
        metrics: {
          durationMs: parseFloat(durationMs.toFixed(2)),
          isSuccess,
          errorCode,
          inputBytes: getPayloadSize(inputPayload),
          outputBytes: getPayloadSize(outputPayload),
        },
      });
    }
  });
}
