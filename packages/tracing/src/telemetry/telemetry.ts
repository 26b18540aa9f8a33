/**
 * @tracewright/tracing - Telemetry Handle
 * The provider and propagator pair every trace and carrier operation reads
 */

import {
  propagation,
  trace,
  type TextMapPropagator,
  type TracerProvider,
} from "@opentelemetry/api";

/**
 * Tracer provider plus propagator.
 * Pass one explicitly (tests, multi-tenant processes) or use {@link globalTelemetry}.
 */
export interface Telemetry {
  readonly tracerProvider: TracerProvider;
  readonly propagator: TextMapPropagator;
}

const globalPropagator: TextMapPropagator = {
  inject: (context, carrier, setter) => propagation.inject(context, carrier, setter),
  extract: (context, carrier, getter) => propagation.extract(context, carrier, getter),
  fields: () => propagation.fields(),
};

const GLOBAL_TELEMETRY: Telemetry = {
  get tracerProvider(): TracerProvider {
    return trace.getTracerProvider();
  },
  propagator: globalPropagator,
};

/**
 * The process-wide provider and propagator.
 * Both are looked up on every use, so a later bootstrap or shutdown is seen immediately.
 * Before any bootstrap the engine's no-op implementations answer.
 */
export function globalTelemetry(): Telemetry {
  return GLOBAL_TELEMETRY;
}
