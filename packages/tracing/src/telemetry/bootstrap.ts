/**
 * @tracewright/tracing - Telemetry Bootstrap
 * Builds the provider, processor and propagator once per process
 *
 * @example
 * ```typescript
 * const result = initTelemetry({ serviceName: 'checkout', exporter: 'otlp' });
 * if (!result.success) {
 *   logger.error('Tracing disabled', result.error);
 * }
 *
 * process.on('SIGTERM', async () => {
 *   if (result.success) await result.data.shutdown();
 * });
 * ```
 */

import { propagation, trace, type TextMapPropagator } from "@opentelemetry/api";
import {
  CompositePropagator,
  W3CBaggagePropagator,
  W3CTraceContextPropagator,
} from "@opentelemetry/core";
import { resourceFromAttributes } from "@opentelemetry/resources";
import {
  BasicTracerProvider,
  BatchSpanProcessor,
  SimpleSpanProcessor,
  type SpanExporter,
  type SpanProcessor,
} from "@opentelemetry/sdk-trace-base";
import {
  createLogger,
  err,
  ErrorCodes,
  logError,
  ok,
  TelemetryError,
  type ConfigurationError,
  type Logger,
  type Result,
} from "@tracewright/core";
import type { PropagatorName } from "@tracewright/types";
import { validateTelemetryConfig, type TelemetryConfig } from "./config.js";
import { createExporter } from "./exporters.js";
import { createSampler } from "./sampling.js";
import type { Telemetry } from "./telemetry.js";

// ============================================================================
// TYPES
// ============================================================================

/**
 * Options for {@link initTelemetry}.
 */
export interface InitTelemetryOptions {
  logger?: Logger;
  /** Use this exporter instead of the one the config names */
  exporter?: SpanExporter;
  /** Install the provider and propagator as the process-wide defaults (default: true) */
  registerGlobal?: boolean;
}

/**
 * A running telemetry pipeline.
 */
export interface TelemetryHandle {
  readonly telemetry: Telemetry;
  readonly config: TelemetryConfig;
  /** Export every span ended so far */
  forceFlush(): Promise<void>;
  /**
   * Flush and stop the pipeline, then restore the engine's no-op globals where this
   * handle installed them.
   * Resolves even when the provider fails; the failure is logged.
   */
  shutdown(): Promise<void>;
}

// ============================================================================
// PROPAGATOR
// ============================================================================

const PROPAGATORS: Record<PropagatorName, () => TextMapPropagator> = {
  tracecontext: () => new W3CTraceContextPropagator(),
  baggage: () => new W3CBaggagePropagator(),
};

/**
 * Composite propagator over the named W3C formats, in the order given.
 */
export function createPropagator(
  names: readonly PropagatorName[] = ["tracecontext", "baggage"]
): TextMapPropagator {
  return new CompositePropagator({
    propagators: [...new Set(names)].map((name) => PROPAGATORS[name]()),
  });
}

// ============================================================================
// BOOTSTRAP
// ============================================================================

function createProcessor(config: TelemetryConfig, exporter: SpanExporter): SpanProcessor {
  if (config.exporter === "memory") {
    return new SimpleSpanProcessor(exporter);
  }
  return new BatchSpanProcessor(exporter, { scheduledDelayMillis: config.batchTimeout });
}

/**
 * Configure tracing for this process.
 * Never throws: invalid configuration and construction failures come back as errors.
 */
export function initTelemetry(
  input: unknown,
  options: InitTelemetryOptions = {}
): Result<TelemetryHandle, ConfigurationError | TelemetryError> {
  const logger = options.logger ?? createLogger({ name: "telemetry" });

  const validated = validateTelemetryConfig(input);
  if (!validated.success) {
    return validated;
  }
  const config = validated.data;

  let exporter: SpanExporter;
  if (options.exporter) {
    exporter = options.exporter;
  } else {
    const created = createExporter(config, logger);
    if (!created.success) {
      return created;
    }
    exporter = created.data;
  }

  let provider: BasicTracerProvider;
  let propagator: TextMapPropagator;
  try {
    provider = new BasicTracerProvider({
      resource: resourceFromAttributes({
        "service.name": config.serviceName,
        "service.version": config.serviceVersion,
        "deployment.environment.name": config.environment,
      }),
      sampler: createSampler(config.sampler),
      spanProcessors: [createProcessor(config, exporter)],
    });
    propagator = createPropagator(config.propagators);
  } catch (error) {
    return err(
      new TelemetryError("Failed to create tracer provider", ErrorCodes.TELEMETRY_INIT_FAILED.code, error)
    );
  }

  const registerGlobal = options.registerGlobal ?? true;
  let registered = false;
  let propagatorRegistered = false;
  if (registerGlobal) {
    registered = trace.setGlobalTracerProvider(provider);
    if (!registered) {
      logger.warn("A global tracer provider is already registered; keeping it");
    }
    propagatorRegistered = propagation.setGlobalPropagator(propagator);
    if (!propagatorRegistered) {
      logger.warn("A global propagator is already registered; keeping it");
    }
  }

  logger.info("Telemetry initialized", {
    service: config.serviceName,
    exporter: config.exporter,
    global: registered,
  });

  let stopped = false;

  return ok({
    telemetry: { tracerProvider: provider, propagator },
    config,

    async forceFlush(): Promise<void> {
      try {
        await provider.forceFlush();
      } catch (error) {
        throw new TelemetryError("Failed to flush spans", ErrorCodes.TELEMETRY_FLUSH_FAILED.code, error);
      }
    },

    async shutdown(): Promise<void> {
      if (stopped) return;
      stopped = true;

      try {
        await provider.shutdown();
      } catch (error) {
        logError(logger, error, "Error shutting down tracer provider", {
          code: ErrorCodes.TELEMETRY_SHUTDOWN_FAILED.code,
        });
      }

      // Only what this handle installed is torn down
      if (registered) trace.disable();
      if (propagatorRegistered) propagation.disable();
      logger.info("Telemetry shut down", { service: config.serviceName });
    },
  });
}
