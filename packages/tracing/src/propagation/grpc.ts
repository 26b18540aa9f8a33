/**
 * @tracewright/tracing - gRPC Carrier
 * Metadata carrier, metadata inject/extract and a tracing client interceptor
 */

import { context as contextApi, type Context } from "@opentelemetry/api";
import {
  InterceptingCall,
  RequesterBuilder,
  type Interceptor,
  type Metadata,
  type Requester,
} from "@grpc/grpc-js";
import type { Telemetry } from "../telemetry/telemetry.js";
import { HeaderCarrier, MapCarrier, type HeaderStrategy } from "./carrier.js";
import { extract, propagate } from "./gateway.js";

function metadataText(value: string | Buffer | undefined): string | undefined {
  if (value === undefined) return undefined;
  return typeof value === "string" ? value : value.toString("utf8");
}

/** First value wins; `set` replaces every value of the key */
const metadataStrategy: HeaderStrategy<Metadata> = {
  get: (metadata, key) => metadataText(metadata.get(key)[0]),
  set: (metadata, key, value) => metadata.set(key, value),
  keys: (metadata) => Object.keys(metadata.getMap()),
};

/**
 * Carrier over gRPC metadata.
 */
export class GrpcMetadataCarrier extends HeaderCarrier<Metadata> {
  constructor(metadata: Metadata) {
    super(metadata, metadataStrategy);
  }
}

/**
 * Single-value view of metadata: first value per key, binary entries left out.
 */
export function flattenMetadata(metadata: Metadata): Record<string, string> {
  const flat: Record<string, string> = {};
  for (const [key, value] of Object.entries(metadata.getMap())) {
    if (typeof value === "string") flat[key] = value;
  }
  return flat;
}

/**
 * Inject trace context into outgoing call metadata.
 * Injection runs against the flattened view; only keys the propagator wrote or
 * changed are copied back, so unrelated multi-value entries survive.
 */
export function injectGrpcMetadata(
  context: Context,
  metadata: Metadata,
  telemetry?: Telemetry
): Metadata {
  const before = flattenMetadata(metadata);
  const flat = new MapCarrier({ ...before });
  propagate(context, flat, telemetry);

  for (const key of flat.keys()) {
    const value = flat.get(key);
    if (before[key] !== value) {
      metadata.set(key, value);
    }
  }
  return metadata;
}

/**
 * Extract trace context from incoming call metadata, reading the first value per key.
 */
export function extractGrpcMetadata(
  context: Context,
  metadata: Metadata,
  telemetry?: Telemetry
): Context {
  return extract(context, new GrpcMetadataCarrier(metadata), telemetry);
}

// ============================================================================
// CLIENT INTERCEPTOR
// ============================================================================

/**
 * Where an interceptor finds the context to send:
 * a fixed context, anything exposing `getContext()` (a Trace), or a function called per call.
 */
export type ContextSource = Context | ContextHolder | (() => Context);

/** Anything exposing its current context, such as a Trace */
export interface ContextHolder {
  getContext(): Context;
}

function isContextHolder(source: Context | ContextHolder): source is ContextHolder {
  return "getContext" in source;
}

function resolveContext(source: ContextSource): Context {
  if (typeof source === "function") return source();
  return isContextHolder(source) ? source.getContext() : source;
}

/**
 * Requester that injects trace context into the metadata of every outgoing call.
 */
export function createTracingRequester(source: ContextSource, telemetry?: Telemetry): Requester {
  return new RequesterBuilder()
    .withStart((metadata, listener, next) => {
      injectGrpcMetadata(resolveContext(source), metadata, telemetry);
      next(metadata, listener);
    })
    .build();
}

/**
 * Client interceptor that propagates trace context on every call.
 * Without a source the engine's active context is sent.
 *
 * @example
 * ```typescript
 * const trace = newTrace(ctx, 'billing').kind().client().start('charge');
 * const client = new PaymentsClient(address, credentials, {
 *   interceptors: [createTraceInterceptor(trace)],
 * });
 * ```
 */
export function createTraceInterceptor(
  source: ContextSource = () => contextApi.active(),
  telemetry?: Telemetry
): Interceptor {
  const requester = createTracingRequester(source, telemetry);
  return (options, nextCall) => new InterceptingCall(nextCall(options), requester);
}
