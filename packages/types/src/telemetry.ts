/**
 * @module
 * Validation schemas for telemetry bootstrap configuration.
 *
 * @example
 * ```typescript
 * import { telemetryConfig } from '@tracewright/types';
 * import { type } from 'arktype';
 *
 * const result = telemetryConfig({ serviceName: 'checkout', exporter: 'otlp' });
 * if (result instanceof type.errors) {
 *   console.error(result.summary);
 * }
 * ```
 */

import { type } from "arktype";

// ============================================================================
// Building Blocks
// ============================================================================

/** Span exporter selection */
export const exporterKind = type("'console' | 'otlp' | 'noop' | 'memory'");

/** Head sampling strategy: fixed decision or ratio of new traces */
export const samplerConfig = type("'always' | 'never'").or({
  ratio: "0 <= number <= 1",
});

/** Propagation formats understood by the bootstrap */
export const propagatorName = type("'tracecontext' | 'baggage'");

// ============================================================================
// Telemetry Configuration
// ============================================================================

/** Telemetry bootstrap configuration */
export const telemetryConfig = type({
  serviceName: "string >= 1",
  "serviceVersion?": "string",
  "environment?": "string",
  "exporter?": exporterKind,
  "endpoint?": "string.url",
  "batchTimeout?": "number.integer >= 0",
  "sampler?": samplerConfig,
  "propagators?": propagatorName.array(),
});

// ============================================================================
// Type Exports
// ============================================================================

export type ExporterKind = typeof exporterKind.infer;
export type SamplerConfig = typeof samplerConfig.infer;
export type PropagatorName = typeof propagatorName.infer;
export type TelemetryConfigInput = typeof telemetryConfig.infer;
