/**
 * @tracewright/tracing/testing - Test Helpers
 * In-memory telemetry that never touches process-wide state
 */

import {
  BasicTracerProvider,
  InMemorySpanExporter,
  SimpleSpanProcessor,
  type ReadableSpan,
  type Sampler,
} from "@opentelemetry/sdk-trace-base";
import { createPropagator } from "./telemetry/bootstrap.js";
import type { Telemetry } from "./telemetry/telemetry.js";

export interface TestTelemetryOptions {
  /** Defaults to the SDK's parent-based always-on sampler */
  sampler?: Sampler;
}

/**
 * Telemetry whose spans land in memory the moment they end.
 */
export interface TestTelemetry extends Telemetry {
  readonly tracerProvider: BasicTracerProvider;
  readonly exporter: InMemorySpanExporter;
  /** Spans ended so far, in end order */
  finishedSpans(): ReadableSpan[];
  reset(): void;
  shutdown(): Promise<void>;
}

/**
 * @example
 * ```typescript
 * const telemetry = createTestTelemetry();
 * newTrace(undefined, 'svc', withTelemetry(telemetry)).start('op').end();
 * expect(telemetry.finishedSpans()[0]?.name).toBe('svc.op');
 * ```
 */
export function createTestTelemetry(options: TestTelemetryOptions = {}): TestTelemetry {
  const exporter = new InMemorySpanExporter();
  const tracerProvider = new BasicTracerProvider({
    ...(options.sampler ? { sampler: options.sampler } : {}),
    spanProcessors: [new SimpleSpanProcessor(exporter)],
  });

  return {
    tracerProvider,
    propagator: createPropagator(),
    exporter,
    finishedSpans: () => exporter.getFinishedSpans(),
    reset: () => exporter.reset(),
    shutdown: () => tracerProvider.shutdown(),
  };
}
