import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { SpanKind, SpanStatusCode } from "@opentelemetry/api";
import { Hono } from "hono";
import { createTestTelemetry, type TestTelemetry } from "../testing.js";
import { traceMiddleware, type TraceEnv } from "./middleware.js";

const TRACEPARENT = "00-0af7651916cd43dd8448eb211c80319c-b7ad6b7169203331-01";

describe("@tracewright/tracing - traceMiddleware", () => {
  let telemetry: TestTelemetry;

  beforeEach(() => {
    telemetry = createTestTelemetry();
  });

  afterEach(async () => {
    await telemetry.shutdown();
  });

  function createApp(recordHeaders = false) {
    const app = new Hono<TraceEnv>();
    app.use(
      "*",
      traceMiddleware("orders", {
        telemetry,
        recordHeaders,
        skip: (c) => c.req.path === "/health",
      })
    );
    app.get("/orders/:id", (c) => c.json({ id: c.req.param("id"), traceId: c.get("trace").getTraceId() }));
    app.get("/boom", () => {
      throw new Error("exploded");
    });
    app.get("/busy", (c) => c.text("busy", 503));
    app.get("/health", (c) => c.text("ok"));
    return app;
  }

  it("should continue the caller's trace with a server span", async () => {
    const res = await createApp().request("/orders/7", {
      headers: { traceparent: TRACEPARENT, "user-agent": "test-agent" },
    });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ id: "7", traceId: "0af7651916cd43dd8448eb211c80319c" });

    const [span] = telemetry.finishedSpans();
    expect(span?.name).toBe("orders.GET /orders/7");
    expect(span?.kind).toBe(SpanKind.SERVER);
    expect(span?.spanContext().traceId).toBe("0af7651916cd43dd8448eb211c80319c");
    expect(span?.parentSpanContext?.spanId).toBe("b7ad6b7169203331");
    expect(span?.attributes).toEqual({
      "http.method": "GET",
      "http.url": "http://localhost/orders/7",
      "http.user_agent": "test-agent",
      "http.status_code": 200,
    });
    expect(span?.status.code).toBe(SpanStatusCode.UNSET);
  });

  it("should start a new trace without incoming headers", async () => {
    await createApp().request("/orders/8");

    const [span] = telemetry.finishedSpans();
    expect(span?.parentSpanContext).toBeUndefined();
    expect(span?.attributes["http.user_agent"]).toBeUndefined();
  });

  it("should mark thrown errors as failures", async () => {
    const res = await createApp().request("/boom");

    expect(res.status).toBe(500);
    const [span] = telemetry.finishedSpans();
    expect(span?.status).toEqual({ code: SpanStatusCode.ERROR, message: "exploded" });
    expect(span?.events.map((e) => e.name)).toEqual(["exception"]);
    expect(span?.attributes["http.status_code"]).toBe(500);
  });

  it("should mark server error responses as failures", async () => {
    await createApp().request("/busy");

    const [span] = telemetry.finishedSpans();
    expect(span?.status).toEqual({ code: SpanStatusCode.ERROR, message: "HTTP 503" });
    expect(span?.events).toEqual([]);
  });

  it("should not trace skipped requests", async () => {
    const res = await createApp().request("/health");

    expect(await res.text()).toBe("ok");
    expect(telemetry.finishedSpans()).toEqual([]);
  });

  it("should record request headers except credentials", async () => {
    await createApp(true).request("/orders/9", {
      headers: { authorization: "Bearer test-token", "x-tenant": "acme" },
    });

    const [span] = telemetry.finishedSpans();
    expect(span?.attributes["http.header.x-tenant"]).toBe("acme");
    expect(span?.attributes["http.header.authorization"]).toBeUndefined();
  });
});
