/**
 * @tracewright/tracing - Span Handle
 * A started span, ended at most once
 */

import {
  isSpanContextValid,
  SpanStatusCode,
  type Context,
  type Span,
  type SpanContext,
} from "@opentelemetry/api";
import { toError } from "@tracewright/core";
import { toAttributeRecord, type Attribute } from "./attributes.js";

/** Span status names */
export type StatusName = "unset" | "ok" | "error";

const STATUS_CODES: Record<StatusName, SpanStatusCode> = {
  unset: SpanStatusCode.UNSET,
  ok: SpanStatusCode.OK,
  error: SpanStatusCode.ERROR,
};

/**
 * The live half of a trace: created by `Trace.start()`, terminal after `end()`.
 * Every call after `end()` is ignored.
 */
export class SpanHandle {
  private ended = false;

  constructor(
    /** Full span name, `<service>.<operation>` */
    readonly name: string,
    private readonly span: Span,
    /** Context carrying this span; hand this to child operations */
    readonly context: Context
  ) {}

  /** 32 hex characters, or empty for a span without a valid context */
  get traceId(): string {
    const spanContext = this.span.spanContext();
    return isSpanContextValid(spanContext) ? spanContext.traceId : "";
  }

  /** 16 hex characters, or empty for a span without a valid context */
  get spanId(): string {
    const spanContext = this.span.spanContext();
    return isSpanContextValid(spanContext) ? spanContext.spanId : "";
  }

  get isEnded(): boolean {
    return this.ended;
  }

  /** False for spans dropped by sampling or created without a provider */
  get isRecording(): boolean {
    return this.span.isRecording();
  }

  spanContext(): SpanContext {
    return this.span.spanContext();
  }

  setStatus(status: StatusName, message?: string): void {
    if (this.ended) return;
    const code = STATUS_CODES[status];
    this.span.setStatus(message === undefined ? { code } : { code, message });
  }

  /**
   * Record an exception event and mark the span as failed with its message.
   * `null` and `undefined` are ignored.
   */
  recordError(error: unknown): void {
    if (this.ended || error === null || error === undefined) return;
    const cause = toError(error);
    this.span.recordException(cause);
    this.span.setStatus({ code: SpanStatusCode.ERROR, message: cause.message });
  }

  /** Attributes known only after the span started (response status, row counts) */
  setAttributes(attrs: readonly Attribute[]): void {
    if (this.ended || attrs.length === 0) return;
    this.span.setAttributes(toAttributeRecord(attrs));
  }

  addEvent(name: string, attrs: readonly Attribute[] = []): void {
    if (this.ended) return;
    this.span.addEvent(name, toAttributeRecord(attrs));
  }

  end(): void {
    if (this.ended) return;
    this.ended = true;
    this.span.end();
  }
}
