/**
 * @tracewright/tracing - Trace Options
 * Construction-time configuration for `newTrace`
 *
 * @example
 * ```typescript
 * const trace = newTrace(ctx, 'worker',
 *   withTelemetry(telemetry),
 *   withCarrier(new KafkaHeadersCarrier(message.headers ?? {})),
 *   withProcessInfo(),
 *   withEnvVars(['CLOUD_REGION', 'SERVICE_VERSION']),
 * );
 * ```
 */

import { pickEnv, type Logger } from "@tracewright/core";
import { stringAttr, type Attribute } from "./attributes.js";
import type { Carrier } from "./propagation/carrier.js";
import { HttpHeadersCarrier, type HttpHeaders } from "./propagation/http.js";
import type { SpanKindName } from "./span-kind.js";
import {
  concurrencyAttributes,
  containerAttributes,
  cpuAttributes,
  diskAttributes,
  hostInfoAttributes,
  memoryAttributes,
  processAttributes,
} from "./system.js";
import type { Telemetry } from "./telemetry/telemetry.js";
import type { TraceOption } from "./trace.js";

// ============================================================================
// COLLABORATORS
// ============================================================================

/**
 * Use an explicit provider and propagator instead of the process-wide ones.
 * Put it before any carrier option so extraction uses the same propagator.
 */
export function withTelemetry(telemetry: Telemetry): TraceOption {
  return (trace) => {
    trace.useTelemetry(telemetry);
  };
}

/** Logger for lifecycle warnings */
export function withLogger(logger: Logger): TraceOption {
  return (trace) => {
    trace.useLogger(logger);
  };
}

export function withKindOption(kind: SpanKindName): TraceOption {
  return (trace) => {
    trace.withKind(kind);
  };
}

// ============================================================================
// ATTRIBUTES
// ============================================================================

export function withAttributes(...attrs: Attribute[]): TraceOption {
  return (trace) => {
    trace.addAttribute(...attrs);
  };
}

/** CPU, memory and disk of the host */
export function withSystemInfo(): TraceOption {
  return (trace) => {
    trace.addAttribute(...cpuAttributes(), ...memoryAttributes(), ...diskAttributes());
  };
}

/** Hostname, primary IPv4 address and environment */
export function withHostInfo(): TraceOption {
  return (trace) => {
    trace.addAttribute(...hostInfoAttributes());
  };
}

export function withProcessInfo(): TraceOption {
  return (trace) => {
    trace.addAttribute(...processAttributes());
  };
}

export function withContainerInfo(): TraceOption {
  return (trace) => {
    trace.addAttribute(...containerAttributes());
  };
}

export function withConcurrencyInfo(): TraceOption {
  return (trace) => {
    trace.addAttribute(...concurrencyAttributes());
  };
}

/**
 * One string attribute per variable, keyed by the variable name.
 * Unset and empty variables are skipped.
 */
export function withEnvVars(keys: readonly string[]): TraceOption {
  return (trace) => {
    trace.addAttribute(...pickEnv(keys).map(([key, value]) => stringAttr(key, value)));
  };
}

// ============================================================================
// INBOUND CONTEXT
// ============================================================================

/**
 * Continue the trace carried by any carrier.
 * The carried span becomes the trace's parent.
 */
export function withCarrier(carrier: Carrier): TraceOption {
  return (trace) => {
    trace.extract(carrier);
  };
}

/** Continue the trace carried by incoming HTTP headers */
export function withHttpHeaders(headers: HttpHeaders): TraceOption {
  return withCarrier(new HttpHeadersCarrier(headers));
}

/**
 * Continue the trace carried by an incoming request.
 * Accepts a fetch `Request` or a Node `IncomingMessage`.
 */
export function withHttpContext(request: { headers: HttpHeaders }): TraceOption {
  return withHttpHeaders(request.headers);
}
