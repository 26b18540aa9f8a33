/**
 * @tracewright/tracing - Telemetry Configuration
 * Defaults, merging, validation and environment loading
 */

import {
  ConfigurationError,
  err,
  getEnv,
  getEnvArray,
  getEnvFloat,
  getEnvNumber,
  ok,
  type Result,
} from "@tracewright/core";
import {
  telemetryConfig,
  type,
  type ExporterKind,
  type PropagatorName,
  type SamplerConfig,
  type TelemetryConfigInput,
} from "@tracewright/types";

// ============================================================================
// TYPES
// ============================================================================

/**
 * Fully resolved telemetry configuration
 */
export interface TelemetryConfig {
  /** Service name recorded on the resource */
  serviceName: string;
  serviceVersion: string;
  /** Deployment environment recorded on the resource */
  environment: string;
  exporter: ExporterKind;
  /** Collector URL for the OTLP exporter; empty uses the exporter's default */
  endpoint: string;
  /** Batch processor delay in milliseconds */
  batchTimeout: number;
  sampler: SamplerConfig;
  propagators: PropagatorName[];
}

// ============================================================================
// DEFAULTS
// ============================================================================

/**
 * Default telemetry configuration.
 * Samples everything and prints spans through the logger.
 */
export const DEFAULT_TELEMETRY_CONFIG: Omit<TelemetryConfig, "serviceName"> = {
  serviceVersion: "0.0.0",
  environment: "development",
  exporter: "console",
  endpoint: "",
  batchTimeout: 5_000,
  sampler: "always",
  propagators: ["tracecontext", "baggage"],
};

// ============================================================================
// CONFIG UTILITIES
// ============================================================================

/**
 * Fill in defaults for every field the input leaves out.
 */
export function mergeTelemetryConfig(input: TelemetryConfigInput): TelemetryConfig {
  const defaults = DEFAULT_TELEMETRY_CONFIG;
  return {
    serviceName: input.serviceName,
    serviceVersion: input.serviceVersion ?? defaults.serviceVersion,
    environment: input.environment ?? defaults.environment,
    exporter: input.exporter ?? defaults.exporter,
    endpoint: input.endpoint ?? defaults.endpoint,
    batchTimeout: input.batchTimeout ?? defaults.batchTimeout,
    sampler: input.sampler ?? defaults.sampler,
    propagators: [...(input.propagators ?? defaults.propagators)],
  };
}

/**
 * Validate raw input and resolve it against the defaults.
 *
 * @example
 * ```typescript
 * const result = validateTelemetryConfig({ serviceName: 'checkout', sampler: { ratio: 2 } });
 * if (!result.success) {
 *   console.error(result.error.issues);
 * }
 * ```
 */
export function validateTelemetryConfig(input: unknown): Result<TelemetryConfig, ConfigurationError> {
  const parsed = telemetryConfig(input);
  if (parsed instanceof type.errors) {
    return err(new ConfigurationError(parsed.map((e) => e.message), "Invalid telemetry configuration"));
  }
  return ok(mergeTelemetryConfig(parsed));
}

/**
 * Read telemetry settings from the environment.
 * Unset variables are left out so the defaults apply.
 *
 * | Variable | Field |
 * |---|---|
 * | OTEL_SERVICE_NAME | serviceName |
 * | OTEL_SERVICE_VERSION | serviceVersion |
 * | DEPLOYMENT_ENV | environment |
 * | TRACEWRIGHT_EXPORTER | exporter |
 * | OTEL_EXPORTER_OTLP_TRACES_ENDPOINT | endpoint |
 * | TRACEWRIGHT_BATCH_TIMEOUT_MS | batchTimeout |
 * | TRACEWRIGHT_SAMPLE_RATIO | sampler (as `{ ratio }`) |
 * | OTEL_PROPAGATORS | propagators (comma-separated) |
 *
 * The result is unvalidated; pass it to {@link validateTelemetryConfig}.
 */
export function telemetryConfigFromEnv(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  const fromEnv: Record<string, unknown> = {};

  const entries: Array<[string, unknown]> = [
    ["serviceName", getEnv("OTEL_SERVICE_NAME")],
    ["serviceVersion", getEnv("OTEL_SERVICE_VERSION")],
    ["environment", getEnv("DEPLOYMENT_ENV")],
    ["exporter", getEnv("TRACEWRIGHT_EXPORTER")],
    ["endpoint", getEnv("OTEL_EXPORTER_OTLP_TRACES_ENDPOINT")],
    ["batchTimeout", getEnvNumber("TRACEWRIGHT_BATCH_TIMEOUT_MS")],
    ["propagators", getEnvArray("OTEL_PROPAGATORS")],
  ];

  const ratio = getEnvFloat("TRACEWRIGHT_SAMPLE_RATIO");
  if (ratio !== undefined) {
    entries.push(["sampler", { ratio }]);
  }

  for (const [key, value] of entries) {
    if (value !== undefined && value !== "") {
      fromEnv[key] = value;
    }
  }

  return { ...fromEnv, ...overrides };
}
