/**
 * @fileoverview OpenTelemetry SDK start-up and shutdown. Imported first by
 * `src/index.ts` so that instrumented modules are patched before they load.
 * Nothing starts unless `OTEL_ENABLED` is true.
 * @module src/utils/telemetry/instrumentation
 */
import { DiagConsoleLogger, DiagLogLevel, diag } from "@opentelemetry/api";
import { getNodeAutoInstrumentations } from "@opentelemetry/auto-instrumentations-node";
import { OTLPMetricExporter } from "@opentelemetry/exporter-metrics-otlp-http";
import { OTLPTraceExporter } from "@opentelemetry/exporter-trace-otlp-http";
import { WinstonInstrumentation } from "@opentelemetry/instrumentation-winston";
import { resourceFromAttributes } from "@opentelemetry/resources";
import { PeriodicExportingMetricReader } from "@opentelemetry/sdk-metrics";
import { NodeSDK } from "@opentelemetry/sdk-node";
import {
  BatchSpanProcessor,
  type ReadableSpan,
  type SpanProcessor,
  TraceIdRatioBasedSampler,
} from "@opentelemetry/sdk-trace-node";
import {
  ATTR_SERVICE_NAME,
  ATTR_SERVICE_VERSION,
} from "@opentelemetry/semantic-conventions";
import path from "path";
import winston from "winston";
import { config } from "../../config/index.js";

export let sdk: NodeSDK | null = null;

/** Routes OpenTelemetry diagnostics to `opentelemetry.log`, never to stdout. */
class OtelDiagnosticLogger extends DiagConsoleLogger {
  private readonly winstonLogger: winston.Logger;

  constructor(logLevel: DiagLogLevel, logsDir: string | null) {
    super();
    const level = DiagLogLevel[logLevel].toLowerCase();
    this.winstonLogger = logsDir
      ? winston.createLogger({
          level,
          format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
          transports: [
            new winston.transports.File({
              filename: path.join(logsDir, "opentelemetry.log"),
              maxsize: 5 * 1024 * 1024,
              maxFiles: 3,
            }),
          ],
        })
      : winston.createLogger({ silent: true });
  }

  public override error = (message: string, ...args: unknown[]): void => {
    this.winstonLogger.error(message, { args });
  };
  public override warn = (message: string, ...args: unknown[]): void => {
    this.winstonLogger.warn(message, { args });
  };
  public override info = (message: string, ...args: unknown[]): void => {
    this.winstonLogger.info(message, { args });
  };
  public override debug = (message: string, ...args: unknown[]): void => {
    this.winstonLogger.debug(message, { args });
  };
  public override verbose = (message: string, ...args: unknown[]): void => {
    this.winstonLogger.verbose(message, { args });
  };
}

/** Writes ended spans to `traces.log` when no OTLP endpoint is configured. */
class FileSpanProcessor implements SpanProcessor {
  private readonly traceLogger: winston.Logger;

  constructor(logsDir: string | null) {
    if (!logsDir) {
      diag.error("[FileSpanProcessor] Cannot initialize: logsPath is not available.");
      this.traceLogger = winston.createLogger({ silent: true });
      return;
    }
    this.traceLogger = winston.createLogger({
      format: winston.format.json(),
      transports: [
        new winston.transports.File({
          filename: path.join(logsDir, "traces.log"),
          maxsize: 10 * 1024 * 1024,
          maxFiles: 5,
        }),
      ],
    });
  }

  forceFlush(): Promise<void> {
    return Promise.resolve();
  }

  onStart(): void {}

  onEnd(span: ReadableSpan): void {
    this.traceLogger.info({
      message: span.name,
      traceId: span.spanContext().traceId,
      spanId: span.spanContext().spanId,
      kind: span.kind,
      startTime: span.startTime,
      endTime: span.endTime,
      duration: span.duration,
      status: span.status,
      attributes: span.attributes,
      events: span.events,
    });
  }

  shutdown(): Promise<void> {
    return new Promise((resolve) => this.traceLogger.on("finish", resolve).end());
  }
}

if (config.openTelemetry.enabled) {
  try {
    const otelLogLevel = DiagLogLevel[config.openTelemetry.logLevel];
    diag.setLogger(new OtelDiagnosticLogger(otelLogLevel, config.logsPath), otelLogLevel);

    const resource = resourceFromAttributes({
      [ATTR_SERVICE_NAME]: config.openTelemetry.serviceName,
      [ATTR_SERVICE_VERSION]: config.openTelemetry.serviceVersion,
      "deployment.environment.name": config.environment,
    });

    let spanProcessor: SpanProcessor;
    if (config.openTelemetry.tracesEndpoint) {
      diag.info(`Using OTLP exporter for traces, endpoint: ${config.openTelemetry.tracesEndpoint}`);
      spanProcessor = new BatchSpanProcessor(
        new OTLPTraceExporter({ url: config.openTelemetry.tracesEndpoint }),
      );
    } else {
      diag.info("No OTLP endpoint configured. Using FileSpanProcessor for local trace logging.");
      spanProcessor = new FileSpanProcessor(config.logsPath);
    }

    const metricReader = config.openTelemetry.metricsEndpoint
      ? new PeriodicExportingMetricReader({
          exporter: new OTLPMetricExporter({ url: config.openTelemetry.metricsEndpoint }),
          exportIntervalMillis: 15000,
        })
      : undefined;

    sdk = new NodeSDK({
      resource,
      spanProcessors: [spanProcessor],
      metricReader,
      sampler: new TraceIdRatioBasedSampler(config.openTelemetry.samplingRatio),
      instrumentations: [
        // stdio transport only; fs spans stay off.
        getNodeAutoInstrumentations({
          "@opentelemetry/instrumentation-http": { enabled: false },
          "@opentelemetry/instrumentation-fs": { enabled: false },
        }),
        new WinstonInstrumentation({ enabled: true }),
      ],
    });

    sdk.start();
    diag.info(
      `OpenTelemetry initialized for ${config.openTelemetry.serviceName} v${config.openTelemetry.serviceVersion}`,
    );
  } catch (error) {
    diag.error("Error initializing OpenTelemetry", error);
    process.exit(1);
  }
}

/** Flushes and stops the SDK; called during shutdown. */
export async function shutdownOpenTelemetry(): Promise<void> {
  if (sdk) {
    await sdk
      .shutdown()
      .then(() => diag.info("OpenTelemetry terminated"))
      .catch((error: unknown) => diag.error("Error terminating OpenTelemetry", error));
  }
}
