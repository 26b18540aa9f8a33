/**
 * @tracewright/tracing - HTTP Middleware
 * Server spans for Hono requests
 */

import { ROOT_CONTEXT } from "@opentelemetry/api";
import type { Context, MiddlewareHandler } from "hono";
import type { Logger } from "@tracewright/core";
import {
  withHttpHeaders,
  withKindOption,
  withLogger,
  withTelemetry,
} from "../options.js";
import { httpHeaderAttributes, httpRequestAttributes, httpResponseAttributes } from "../semantic.js";
import type { Telemetry } from "../telemetry/telemetry.js";
import { newTrace, type Trace, type TraceOption } from "../trace.js";

/** Context variables set by {@link traceMiddleware} */
export interface TraceVariables {
  trace: Trace;
}

export interface TraceEnv {
  Variables: TraceVariables;
}

/**
 * Trace middleware options
 */
export interface TraceMiddlewareOptions {
  /** Provider and propagator; defaults to the process-wide ones */
  telemetry?: Telemetry;
  logger?: Logger;
  /** Skip tracing for certain requests */
  skip?: (c: Context<TraceEnv>) => boolean;
  /** Record request headers as `http.header.*` attributes (default: false) */
  recordHeaders?: boolean;
}

/**
 * Start a server span per request, continuing any trace the caller sent.
 *
 * The span is named `<service>.<METHOD> <path>`, records the response status,
 * and is marked failed for 5xx responses and thrown errors.
 *
 * @example
 * ```typescript
 * const app = new Hono<TraceEnv>();
 * app.use('*', traceMiddleware('orders', {
 *   skip: (c) => c.req.path === '/health',
 * }));
 *
 * app.get('/orders/:id', async (c) => {
 *   const trace = c.get('trace');
 *   const order = await loadOrder(trace.getContext(), c.req.param('id'));
 *   return c.json(order);
 * });
 * ```
 */
export function traceMiddleware(
  serviceName: string,
  options: TraceMiddlewareOptions = {}
): MiddlewareHandler<TraceEnv> {
  const { telemetry, logger, skip, recordHeaders = false } = options;

  return async (c, next) => {
    if (skip?.(c)) {
      return next();
    }

    const headers = c.req.raw.headers;
    const traceOptions: TraceOption[] = [];
    if (telemetry) traceOptions.push(withTelemetry(telemetry));
    if (logger) traceOptions.push(withLogger(logger));
    traceOptions.push(withHttpHeaders(headers), withKindOption("server"));

    const trace = newTrace(ROOT_CONTEXT, serviceName, ...traceOptions).addAttribute(
      ...httpRequestAttributes({
        method: c.req.method,
        url: c.req.url,
        userAgent: headers.get("user-agent") ?? undefined,
      })
    );
    if (recordHeaders) {
      trace.addAttribute(...httpHeaderAttributes(headers));
    }

    trace.start(`${c.req.method} ${c.req.path}`);
    c.set("trace", trace);

    try {
      await next();

      const status = c.res.status;
      trace.handle()?.setAttributes(httpResponseAttributes(status));
      if (c.error) {
        trace.recordError(c.error);
      } else if (status >= 500) {
        trace.setStatus("error", `HTTP ${status}`);
      }
    } catch (error) {
      trace.recordError(error);
      throw error;
    } finally {
      trace.end();
    }
  };
}
