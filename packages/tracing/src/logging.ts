/**
 * @tracewright/tracing - Trace-Aware Logging
 */

import type { Context } from "@opentelemetry/api";
import type { Logger, LogContext } from "@tracewright/core";
import { findSpanId, findTraceId } from "./trace.js";

/**
 * Ids of the span carried by `context`; fields without a value are left out.
 */
export function traceLogContext(context: Context): LogContext {
  const fields: LogContext = {};
  const traceId = findTraceId(context);
  const spanId = findSpanId(context);
  if (traceId) fields["traceId"] = traceId;
  if (spanId) fields["spanId"] = spanId;
  return fields;
}

/**
 * Child logger whose lines carry the trace and span id found in `context`.
 *
 * @example
 * ```typescript
 * const log = traceLogger(logger, trace.getContext());
 * log.info('Payment captured', { amount });
 * ```
 */
export function traceLogger(logger: Logger, context: Context): Logger {
  return logger.child(traceLogContext(context));
}
