/**
 * @tracewright/tracing - Span Kind
 * Kind names and the chainable kind selector
 */

import { SpanKind } from "@opentelemetry/api";

/** Categorical role of a span */
export type SpanKindName = "internal" | "server" | "client" | "producer" | "consumer";

const ENGINE_KINDS: Record<SpanKindName, SpanKind> = {
  internal: SpanKind.INTERNAL,
  server: SpanKind.SERVER,
  client: SpanKind.CLIENT,
  producer: SpanKind.PRODUCER,
  consumer: SpanKind.CONSUMER,
};

export function toEngineKind(kind: SpanKindName): SpanKind {
  return ENGINE_KINDS[kind];
}

/** Anything whose pending kind a selector can set */
export interface KindTarget<T> {
  withKind(kind: SpanKindName): T;
}

/**
 * Sets the pending kind and hands back the owner, so
 * `trace.kind().server().start("handle")` reads left to right.
 */
export class SpanKindSelector<T> {
  constructor(private readonly owner: KindTarget<T>) {}

  server(): T {
    return this.owner.withKind("server");
  }

  client(): T {
    return this.owner.withKind("client");
  }

  producer(): T {
    return this.owner.withKind("producer");
  }

  consumer(): T {
    return this.owner.withKind("consumer");
  }

  internal(): T {
    return this.owner.withKind("internal");
  }
}
