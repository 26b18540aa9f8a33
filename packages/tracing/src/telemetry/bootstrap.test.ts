import { describe, it, expect, afterEach } from "vitest";
import { propagation, ROOT_CONTEXT, trace } from "@opentelemetry/api";
import { W3CTraceContextPropagator } from "@opentelemetry/core";
import {
  BasicTracerProvider,
  InMemorySpanExporter,
  SimpleSpanProcessor,
} from "@opentelemetry/sdk-trace-base";
import {
  ConfigurationError,
  createLogger,
  type LogEntry,
  type LogTransport,
} from "@tracewright/core";
import { MapCarrier } from "../propagation/carrier.js";
import { extract, propagate } from "../propagation/gateway.js";
import { newTrace } from "../trace.js";
import { withTelemetry } from "../options.js";
import { createPropagator, initTelemetry, type TelemetryHandle } from "./bootstrap.js";

function memoryTransport(): LogTransport & { entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  return {
    name: "memory",
    entries,
    log(entry) {
      entries.push(entry);
    },
  };
}

class FailingExporter extends InMemorySpanExporter {
  override shutdown(): Promise<void> {
    return Promise.reject(new Error("collector unreachable"));
  }
}

describe("@tracewright/tracing - Telemetry Bootstrap", () => {
  let handle: TelemetryHandle | undefined;

  afterEach(async () => {
    await handle?.shutdown();
    handle = undefined;
    trace.disable();
    propagation.disable();
  });

  function start(input: unknown, exporter: InMemorySpanExporter, registerGlobal = true) {
    const transport = memoryTransport();
    const logger = createLogger({ transports: [transport], timestamp: false });
    const result = initTelemetry(input, { logger, exporter, registerGlobal });
    if (!result.success) throw result.error;
    handle = result.data;
    return { handle: result.data, transport };
  }

  it("should reject invalid configuration without throwing", () => {
    const result = initTelemetry(
      { serviceName: "" },
      { logger: createLogger({ transports: [memoryTransport()] }) }
    );

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toBeInstanceOf(ConfigurationError);
    }
  });

  it("should register the provider process-wide", () => {
    const exporter = new InMemorySpanExporter();
    start({ serviceName: "checkout", exporter: "memory" }, exporter);

    newTrace(undefined, "checkout").start("pay").end();

    const spans = exporter.getFinishedSpans();
    expect(spans.map((s) => s.name)).toEqual(["checkout.pay"]);
    expect(spans[0]?.resource.attributes["service.name"]).toBe("checkout");
    expect(spans[0]?.resource.attributes["service.version"]).toBe("0.0.0");
    expect(spans[0]?.resource.attributes["deployment.environment.name"]).toBe("development");
  });

  it("should register the propagator process-wide", () => {
    start({ serviceName: "checkout", exporter: "memory" }, new InMemorySpanExporter());
    const source = newTrace(undefined, "checkout").start("pay");
    const carrier = new MapCarrier();

    propagate(source.getContext(), carrier);

    expect(carrier.get("traceparent")).toBe(`00-${source.getTraceId()}-${source.getSpanId()}-01`);
  });

  it("should log the initialization", () => {
    const { transport } = start({ serviceName: "checkout", exporter: "memory" }, new InMemorySpanExporter());

    expect(transport.entries[0]?.message).toBe("Telemetry initialized");
    expect(transport.entries[0]?.context).toEqual({ service: "checkout", exporter: "memory", global: true });
  });

  it("should leave globals alone when asked", () => {
    const exporter = new InMemorySpanExporter();
    const { handle: local } = start({ serviceName: "checkout", exporter: "memory" }, exporter, false);

    expect(newTrace(undefined, "checkout").start("global").getTraceId()).toBe("");

    newTrace(undefined, "checkout", withTelemetry(local.telemetry)).start("local").end();
    expect(exporter.getFinishedSpans().map((s) => s.name)).toEqual(["checkout.local"]);
  });

  it("should restore the no-op globals on shutdown", async () => {
    const { handle: running } = start({ serviceName: "checkout", exporter: "memory" }, new InMemorySpanExporter());

    await running.shutdown();

    expect(newTrace(undefined, "checkout").start("late").getTraceId()).toBe("");
    expect(propagation.fields()).toEqual([]);
  });

  it("should keep a tracer provider registered by someone else", async () => {
    const ownerExporter = new InMemorySpanExporter();
    trace.setGlobalTracerProvider(
      new BasicTracerProvider({ spanProcessors: [new SimpleSpanProcessor(ownerExporter)] })
    );
    const exporter = new InMemorySpanExporter();
    const { handle: running, transport } = start({ serviceName: "checkout", exporter: "memory" }, exporter);

    expect(transport.entries.map((e) => e.message)).toContain(
      "A global tracer provider is already registered; keeping it"
    );
    expect(transport.entries.find((e) => e.message === "Telemetry initialized")?.context).toEqual({
      service: "checkout",
      exporter: "memory",
      global: false,
    });

    newTrace(undefined, "checkout").start("pay").end();
    expect(ownerExporter.getFinishedSpans().map((s) => s.name)).toEqual(["checkout.pay"]);
    expect(exporter.getFinishedSpans()).toEqual([]);

    await running.shutdown();
    expect(newTrace(undefined, "checkout").start("after").getTraceId()).not.toBe("");
  });

  it("should keep a propagator registered by someone else", async () => {
    propagation.setGlobalPropagator(new W3CTraceContextPropagator());
    const { handle: running, transport } = start(
      { serviceName: "checkout", exporter: "memory", propagators: ["baggage"] },
      new InMemorySpanExporter()
    );

    expect(transport.entries.map((e) => e.message)).toContain(
      "A global propagator is already registered; keeping it"
    );
    expect(propagation.fields()).toEqual(["traceparent", "tracestate"]);

    await running.shutdown();

    expect(propagation.fields()).toEqual(["traceparent", "tracestate"]);
  });

  it("should resolve shutdown twice", async () => {
    const { handle: running, transport } = start(
      { serviceName: "checkout", exporter: "memory" },
      new InMemorySpanExporter()
    );

    await running.shutdown();
    await running.shutdown();

    expect(transport.entries.filter((e) => e.message === "Telemetry shut down")).toHaveLength(1);
  });

  it("should log provider failures during shutdown", async () => {
    const { handle: running, transport } = start(
      { serviceName: "checkout", exporter: "memory" },
      new FailingExporter()
    );

    await expect(running.shutdown()).resolves.toBeUndefined();

    const failure = transport.entries.find((e) => e.message === "Error shutting down tracer provider");
    expect(failure?.level).toBe("ERROR");
    expect(failure?.error?.message).toBe("collector unreachable");
    expect(failure?.context).toEqual({ code: "TELEMETRY_SHUTDOWN_FAILED" });
  });

  it("should flush ended spans", async () => {
    const exporter = new InMemorySpanExporter();
    const { handle: running } = start({ serviceName: "checkout", exporter: "memory" }, exporter);

    newTrace(undefined, "checkout", withTelemetry(running.telemetry)).start("pay").end();

    await expect(running.forceFlush()).resolves.toBeUndefined();
    expect(exporter.getFinishedSpans()).toHaveLength(1);
  });
});

describe("@tracewright/tracing - createPropagator", () => {
  it("should list the fields of the named formats", () => {
    expect(createPropagator().fields()).toEqual(["traceparent", "tracestate", "baggage"]);
    expect(createPropagator(["tracecontext"]).fields()).toEqual(["traceparent", "tracestate"]);
  });

  it("should ignore repeated names", () => {
    expect(createPropagator(["baggage", "baggage"]).fields()).toEqual(["baggage"]);
  });

  it("should leave the context alone when nothing is carried", () => {
    const telemetry = { tracerProvider: trace.getTracerProvider(), propagator: createPropagator() };

    expect(extract(ROOT_CONTEXT, new MapCarrier(), telemetry)).toBe(ROOT_CONTEXT);
  });
});
