/**
 * Tracewright Basic Example
 *
 * A Hono route continues the caller's trace, runs a child operation and hands
 * its context to a queue message.
 */

import { Hono } from "hono";
import { createLogger } from "@tracewright/core";
import {
  initTelemetry,
  MapCarrier,
  startTrace,
  traceLogger,
  traceMiddleware,
  withAttributes,
  stringAttr,
  type TraceEnv,
} from "@tracewright/tracing";

const logger = createLogger({ name: "basic-example" });

const telemetry = initTelemetry({ serviceName: "orders", exporter: "console" }, { logger });
if (!telemetry.success) {
  logger.error("Tracing disabled", telemetry.error);
  process.exit(1);
}

// ============================================================================
// HTTP
// ============================================================================

const app = new Hono<TraceEnv>();

app.use("*", traceMiddleware("orders", { skip: (c) => c.req.path === "/health" }));

app.get("/health", (c) => c.json({ status: "ok" }));

app.post("/orders/:id/pay", (c) => {
  const request = c.get("trace");
  const id = c.req.param("id");

  const payment = startTrace(request.getContext(), "orders", "capturePayment", withAttributes(stringAttr("order.id", id)));
  traceLogger(logger, payment.getContext()).info("Payment captured", { id });
  payment.setSuccess("captured");
  payment.end();

  // Headers for the outgoing message
  const carrier = new MapCarrier();
  request.inject(carrier);

  return c.json({ id, headers: carrier.container });
});

// ============================================================================
// RUN
// ============================================================================

const response = await app.request("/orders/42/pay", {
  method: "POST",
  headers: { traceparent: "00-0af7651916cd43dd8448eb211c80319c-b7ad6b7169203331-01" },
});
console.log(response.status, await response.json());

await telemetry.data.shutdown();
