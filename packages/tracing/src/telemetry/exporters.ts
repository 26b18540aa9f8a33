/**
 * @tracewright/tracing - Span Exporters
 * Exporter selection plus a logger-backed console exporter
 */

import { ExportResultCode, hrTimeToMilliseconds, type ExportResult } from "@opentelemetry/core";
import { OTLPTraceExporter } from "@opentelemetry/exporter-trace-otlp-http";
import {
  InMemorySpanExporter,
  type ReadableSpan,
  type SpanExporter,
} from "@opentelemetry/sdk-trace-base";
import { SpanKind, SpanStatusCode } from "@opentelemetry/api";
import {
  createLogger,
  err,
  ErrorCodes,
  ok,
  TelemetryError,
  type Logger,
  type Result,
} from "@tracewright/core";
import type { TelemetryConfig } from "./config.js";

// ============================================================================
// LOGGER EXPORTER
// ============================================================================

/**
 * Options for the logger exporter.
 */
export interface LoggerSpanExporterOptions {
  logger?: Logger;
  /** Include span attributes in each line (default: true) */
  includeAttributes?: boolean;
  /** Include span events in each line (default: true) */
  includeEvents?: boolean;
}

const KIND_NAMES: Record<SpanKind, string> = {
  [SpanKind.INTERNAL]: "internal",
  [SpanKind.SERVER]: "server",
  [SpanKind.CLIENT]: "client",
  [SpanKind.PRODUCER]: "producer",
  [SpanKind.CONSUMER]: "consumer",
};

const STATUS_NAMES: Record<SpanStatusCode, string> = {
  [SpanStatusCode.UNSET]: "unset",
  [SpanStatusCode.OK]: "ok",
  [SpanStatusCode.ERROR]: "error",
};

/**
 * Flatten a finished span into a log context object.
 */
export function spanToLogObject(span: ReadableSpan): Record<string, unknown> {
  const spanContext = span.spanContext();
  return {
    traceId: spanContext.traceId,
    spanId: spanContext.spanId,
    parentSpanId: span.parentSpanContext?.spanId,
    name: span.name,
    kind: KIND_NAMES[span.kind],
    status: STATUS_NAMES[span.status.code],
    statusMessage: span.status.message,
    durationMs: hrTimeToMilliseconds(span.duration),
  };
}

/**
 * Writes each finished span as one log line.
 * The default exporter for local development.
 */
export class LoggerSpanExporter implements SpanExporter {
  private readonly logger: Logger;
  private readonly includeAttributes: boolean;
  private readonly includeEvents: boolean;
  private stopped = false;

  constructor(options: LoggerSpanExporterOptions = {}) {
    this.logger = options.logger ?? createLogger({ name: "span-exporter" });
    this.includeAttributes = options.includeAttributes ?? true;
    this.includeEvents = options.includeEvents ?? true;
  }

  export(spans: ReadableSpan[], resultCallback: (result: ExportResult) => void): void {
    if (this.stopped) {
      resultCallback({
        code: ExportResultCode.FAILED,
        error: new Error("Exporter has been shut down"),
      });
      return;
    }

    for (const span of spans) {
      const line = spanToLogObject(span);
      if (this.includeAttributes && Object.keys(span.attributes).length > 0) {
        line["attributes"] = span.attributes;
      }
      if (this.includeEvents && span.events.length > 0) {
        line["events"] = span.events.map((e) => e.name);
      }
      this.logger.info(`Span: ${span.name}`, line);
    }
    resultCallback({ code: ExportResultCode.SUCCESS });
  }

  async shutdown(): Promise<void> {
    this.stopped = true;
  }

  async forceFlush(): Promise<void> {}
}

// ============================================================================
// NOOP EXPORTER
// ============================================================================

/**
 * Accepts and discards every span.
 */
export class NoopSpanExporter implements SpanExporter {
  export(_spans: ReadableSpan[], resultCallback: (result: ExportResult) => void): void {
    resultCallback({ code: ExportResultCode.SUCCESS });
  }

  async shutdown(): Promise<void> {}
}

// ============================================================================
// EXPORTER FACTORY
// ============================================================================

/**
 * Build the exporter a configuration asks for.
 * Construction failures come back as a TelemetryError instead of throwing.
 */
export function createExporter(
  config: Pick<TelemetryConfig, "exporter" | "endpoint">,
  logger?: Logger
): Result<SpanExporter, TelemetryError> {
  try {
    switch (config.exporter) {
      case "console":
        return ok(new LoggerSpanExporter(logger ? { logger } : {}));
      case "otlp":
        return ok(new OTLPTraceExporter(config.endpoint ? { url: config.endpoint } : {}));
      case "noop":
        return ok(new NoopSpanExporter());
      case "memory":
        return ok(new InMemorySpanExporter());
    }
  } catch (error) {
    return err(
      new TelemetryError(
        `Failed to create ${config.exporter} exporter`,
        ErrorCodes.EXPORTER_CREATION_FAILED.code,
        error
      )
    );
  }
}
