/**
 * @module
 * Span lifecycle and trace-context propagation for Node.js services.
 *
 * @example
 * ```typescript
 * import { initTelemetry, newTrace, propagateKafka, stringAttr } from '@tracewright/tracing';
 *
 * initTelemetry({ serviceName: 'orders', exporter: 'otlp' });
 *
 * const trace = newTrace(ctx, 'orders')
 *   .kind()
 *   .producer()
 *   .addAttribute(stringAttr('order.id', id))
 *   .start('publish');
 * propagateKafka(trace.getContext(), headers);
 * trace.end();
 * ```
 */

// ============================================
// ATTRIBUTES
// ============================================

export {
  stringAttr,
  intAttr,
  floatAttr,
  boolAttr,
  stringSliceAttr,
  intSliceAttr,
  floatSliceAttr,
  boolSliceAttr,
  jsonAttr,
  inferAttribute,
  toAttributeRecord,
  attributesEqual,
  type Attribute,
  type AttributeValue,
  type AttributeType,
  type ScalarValue,
} from "./attributes.js";

export {
  SpanAttributes,
  httpRequestAttributes,
  httpResponseAttributes,
  httpHeaderAttributes,
  dbQueryAttributes,
  dbInfoAttributes,
  dbTableAttributes,
  dbTransactionAttributes,
  dbErrorAttributes,
  errorAttributes,
  exceptionAttributes,
  eventAttributes,
  taskAttributes,
  userAttributes,
  metricAttributes,
  hostAttributes,
  kubernetesAttributes,
  networkAttributes,
  type SpanAttributeKey,
  type HttpRequestInfo,
} from "./semantic.js";

export {
  cpuAttributes,
  memoryAttributes,
  diskAttributes,
  hostInfoAttributes,
  processAttributes,
  containerAttributes,
  concurrencyAttributes,
  parseContainerId,
  primaryIpAddress,
} from "./system.js";

// ============================================
// TRACE
// ============================================

export {
  Trace,
  newTrace,
  newDetachedTrace,
  startTrace,
  findTraceId,
  findSpanId,
  type TraceOption,
  type TraceState,
} from "./trace.js";

export { SpanHandle, type StatusName } from "./span-handle.js";
export { SpanKindSelector, toEngineKind, type SpanKindName, type KindTarget } from "./span-kind.js";

export {
  withTelemetry,
  withLogger,
  withKindOption,
  withAttributes,
  withSystemInfo,
  withHostInfo,
  withProcessInfo,
  withContainerInfo,
  withConcurrencyInfo,
  withEnvVars,
  withCarrier,
  withHttpHeaders,
  withHttpContext,
} from "./options.js";

// ============================================
// PROPAGATION
// ============================================

export * from "./propagation/index.js";

// ============================================
// TELEMETRY
// ============================================

export { globalTelemetry, type Telemetry } from "./telemetry/telemetry.js";
export {
  DEFAULT_TELEMETRY_CONFIG,
  mergeTelemetryConfig,
  validateTelemetryConfig,
  telemetryConfigFromEnv,
  type TelemetryConfig,
} from "./telemetry/config.js";
export {
  initTelemetry,
  createPropagator,
  type InitTelemetryOptions,
  type TelemetryHandle,
} from "./telemetry/bootstrap.js";
export {
  createExporter,
  LoggerSpanExporter,
  NoopSpanExporter,
  spanToLogObject,
  type LoggerSpanExporterOptions,
} from "./telemetry/exporters.js";
export { createSampler } from "./telemetry/sampling.js";

// ============================================
// INTEGRATIONS
// ============================================

export { traceLogger, traceLogContext } from "./logging.js";
export {
  traceMiddleware,
  type TraceEnv,
  type TraceVariables,
  type TraceMiddlewareOptions,
} from "./http/middleware.js";
