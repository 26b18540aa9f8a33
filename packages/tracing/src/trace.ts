/**
 * @tracewright/tracing - Trace
 * Staged span decorations committed at start
 *
 * @example
 * ```typescript
 * const trace = newTrace(ctx, 'orders', withProcessInfo())
 *   .kind()
 *   .server()
 *   .addAttribute(stringAttr('order.id', orderId))
 *   .start('create');
 * try {
 *   await createOrder(trace.getContext(), input);
 * } catch (error) {
 *   trace.recordFailure(error, 'order creation failed');
 *   throw error;
 * } finally {
 *   trace.end();
 * }
 * ```
 */

import {
  isSpanContextValid,
  ROOT_CONTEXT,
  trace as traceApi,
  type Context,
  type Link,
  type SpanContext,
  type SpanOptions,
} from "@opentelemetry/api";
import { createLogger, TraceNotStartedError, type Logger } from "@tracewright/core";
import {
  inferAttribute,
  toAttributeRecord,
  type Attribute,
  type ScalarValue,
} from "./attributes.js";
import type { Carrier } from "./propagation/carrier.js";
import { extract, propagate } from "./propagation/gateway.js";
import { SpanHandle, type StatusName } from "./span-handle.js";
import {
  SpanKindSelector,
  toEngineKind,
  type KindTarget,
  type SpanKindName,
} from "./span-kind.js";
import { globalTelemetry, type Telemetry } from "./telemetry/telemetry.js";

// ============================================================================
// TYPES
// ============================================================================

/** Lifecycle state of a trace's current span */
export type TraceState = "unstarted" | "started" | "ended";

/**
 * Configuration applied at construction, in argument order.
 * Later options see what earlier ones changed.
 */
export type TraceOption = (trace: Trace) => void;

const defaultLogger = createLogger({ name: "tracing" });

// ============================================================================
// CONTEXT QUERIES
// ============================================================================

/**
 * Trace id of the span carried by `context`, or an empty string.
 * Used to correlate log lines with traces.
 */
export function findTraceId(context: Context): string {
  const spanContext = traceApi.getSpanContext(context);
  return spanContext && isSpanContextValid(spanContext) ? spanContext.traceId : "";
}

/** Span id of the span carried by `context`, or an empty string */
export function findSpanId(context: Context): string {
  const spanContext = traceApi.getSpanContext(context);
  return spanContext && isSpanContextValid(spanContext) ? spanContext.spanId : "";
}

// ============================================================================
// TRACE
// ============================================================================

/**
 * Span-lifecycle builder for one logical operation.
 *
 * Attributes, links and the span kind are staged and handed to the engine in one
 * call at `start()`; attributes and links are then cleared, the kind is kept.
 * A Trace belongs to the task that created it: pass `getContext()` to child
 * operations, never the Trace itself.
 */
export class Trace implements KindTarget<Trace> {
  private ctx: Context;
  private readonly serviceName: string;
  private readonly parentSpanId: string;
  private telemetry: Telemetry = globalTelemetry();
  private logger: Logger = defaultLogger;
  private attrs: Attribute[] = [];
  private links: Link[] = [];
  private spanKind: SpanKindName = "internal";
  private selector: SpanKindSelector<Trace> | undefined;
  private current: SpanHandle | undefined;

  constructor(context: Context | undefined, serviceName: string, ...options: TraceOption[]) {
    this.ctx = context ?? ROOT_CONTEXT;
    this.serviceName = serviceName;

    for (const option of options) {
      option(this);
    }

    // Captured after the options so carrier options can supply the parent
    this.parentSpanId = findSpanId(this.ctx);
  }

  // ==========================================================================
  // Collaborators
  // ==========================================================================

  /** Provider and propagator used by `start`, `extract` and `inject` */
  useTelemetry(telemetry: Telemetry): Trace {
    this.telemetry = telemetry;
    return this;
  }

  useLogger(logger: Logger): Trace {
    this.logger = logger;
    return this;
  }

  // ==========================================================================
  // Decoration
  // ==========================================================================

  withKind(kind: SpanKindName): Trace {
    this.spanKind = kind;
    return this;
  }

  /** Kind selector: `trace.kind().server()` */
  kind(): SpanKindSelector<Trace> {
    this.selector ??= new SpanKindSelector<Trace>(this);
    return this.selector;
  }

  addAttribute(...attrs: Attribute[]): Trace {
    this.attrs.push(...attrs);
    return this;
  }

  /**
   * Stage an attribute only when `condition` holds.
   * The attribute type follows the runtime type of `value`.
   */
  addAttributeIf(condition: boolean, key: string, value: ScalarValue): Trace {
    if (condition) {
      this.attrs.push(inferAttribute(key, value));
    }
    return this;
  }

  /** Relate the next span to another span without making it a parent */
  addLink(spanContext: SpanContext, attrs: readonly Attribute[] = []): Trace {
    this.links.push(
      attrs.length > 0
        ? { context: spanContext, attributes: toAttributeRecord(attrs) }
        : { context: spanContext }
    );
    return this;
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  /**
   * Start a span named `<service>.<name>` as a child of the trace's context.
   *
   * Calling `start` again before `end` abandons the open span (logged at WARN)
   * and parents the new span on it.
   */
  start(name: string): Trace {
    const spanName = `${this.serviceName}.${name}`;
    const previous = this.current;
    if (previous && !previous.isEnded) {
      this.logger.warn("Span restarted before end; previous span abandoned", {
        previous: previous.name,
        next: spanName,
      });
    }

    const options: SpanOptions = { kind: toEngineKind(this.spanKind) };
    if (this.attrs.length > 0) {
      options.attributes = toAttributeRecord(this.attrs);
    }
    if (this.links.length > 0) {
      options.links = this.links;
    }

    const tracer = this.telemetry.tracerProvider.getTracer(this.serviceName);
    const span = tracer.startSpan(spanName, options, this.ctx);
    this.ctx = traceApi.setSpan(this.ctx, span);
    this.current = new SpanHandle(spanName, span, this.ctx);

    this.attrs = [];
    this.links = [];
    return this;
  }

  /** End the current span. Safe before `start()` and when repeated. */
  end(): void {
    this.current?.end();
  }

  get state(): TraceState {
    if (!this.current) return "unstarted";
    return this.current.isEnded ? "ended" : "started";
  }

  /** The current span, or undefined before `start()` */
  handle(): SpanHandle | undefined {
    return this.current;
  }

  private requireHandle(operation: string): SpanHandle {
    if (!this.current) {
      throw new TraceNotStartedError(operation, { service: this.serviceName });
    }
    return this.current;
  }

  // ==========================================================================
  // Status
  // ==========================================================================

  /**
   * Record an error on the current span and mark it failed.
   * `null` and `undefined` are ignored.
   * @throws TraceNotStartedError when called before `start()`
   */
  recordError(error: unknown): void {
    if (error === null || error === undefined) return;
    this.requireHandle("recordError").recordError(error);
  }

  /**
   * Record `error` as the cause and `message` as the status description.
   * @throws TraceNotStartedError when called before `start()`
   */
  recordFailure(error: unknown, message: string): void {
    const handle = this.requireHandle("recordFailure");
    handle.recordError(error);
    handle.setStatus("error", message);
  }

  /** @throws TraceNotStartedError when called before `start()` */
  setStatus(status: StatusName, message?: string): void {
    this.requireHandle("setStatus").setStatus(status, message);
  }

  /** @throws TraceNotStartedError when called before `start()` */
  setSuccess(message: string): void {
    this.requireHandle("setSuccess").setStatus("ok", message);
  }

  // ==========================================================================
  // Queries
  // ==========================================================================

  /** Trace id of the most recently started span, or an empty string */
  getTraceId(): string {
    return this.current?.traceId ?? "";
  }

  /** Span id of the most recently started span, or an empty string */
  getSpanId(): string {
    return this.current?.spanId ?? "";
  }

  /** Span id of the caller's span, fixed at construction */
  getParentId(): string {
    return this.parentSpanId;
  }

  /** Context to hand to child operations and carriers */
  getContext(): Context {
    return this.ctx;
  }

  getServiceName(): string {
    return this.serviceName;
  }

  pendingAttributes(): readonly Attribute[] {
    return [...this.attrs];
  }

  pendingLinks(): readonly Link[] {
    return [...this.links];
  }

  pendingKind(): SpanKindName {
    return this.spanKind;
  }

  // ==========================================================================
  // Propagation
  // ==========================================================================

  /**
   * Adopt the trace context found in `carrier`; the next span becomes its child.
   * The parent id captured at construction is left as it was.
   */
  extract(carrier: Carrier): Trace {
    this.ctx = extract(this.ctx, carrier, this.telemetry);
    return this;
  }

  /** Write the trace's context into `carrier` */
  inject(carrier: Carrier): Trace {
    propagate(this.ctx, carrier, this.telemetry);
    return this;
  }
}

// ============================================================================
// CONSTRUCTORS
// ============================================================================

/**
 * Create a trace on `context`. A span already in `context` becomes the parent.
 */
export function newTrace(
  context: Context | undefined,
  serviceName: string,
  ...options: TraceOption[]
): Trace {
  return new Trace(context, serviceName, ...options);
}

/**
 * Create a trace that starts a new causal chain, whatever the caller's context holds.
 */
export function newDetachedTrace(serviceName: string, ...options: TraceOption[]): Trace {
  return new Trace(ROOT_CONTEXT, serviceName, ...options);
}

/**
 * Create and start a trace in one call.
 *
 * @example
 * ```typescript
 * const trace = startTrace(ctx, 'billing', 'charge', withAttributes(intAttr('amount', 1200)));
 * try {
 *   await charge(trace.getContext());
 * } finally {
 *   trace.end();
 * }
 * ```
 */
export function startTrace(
  context: Context | undefined,
  serviceName: string,
  operation: string,
  ...options: TraceOption[]
): Trace {
  return new Trace(context, serviceName, ...options).start(operation);
}
