import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { Metadata } from "@grpc/grpc-js";
import { ROOT_CONTEXT, trace } from "@opentelemetry/api";
import { withTelemetry } from "../options.js";
import { createTestTelemetry, type TestTelemetry } from "../testing.js";
import { startTrace } from "../trace.js";
import {
  createTraceInterceptor,
  createTracingRequester,
  extractGrpcMetadata,
  flattenMetadata,
  GrpcMetadataCarrier,
  injectGrpcMetadata,
} from "./grpc.js";

const TRACEPARENT = "00-0af7651916cd43dd8448eb211c80319c-b7ad6b7169203331-01";
const OTHER_TRACEPARENT = "00-4bf92f3577b34da6a3ce929d0e0e4736-00f067aa0ba902b7-01";

describe("@tracewright/tracing - gRPC Carrier", () => {
  let telemetry: TestTelemetry;

  beforeEach(() => {
    telemetry = createTestTelemetry();
  });

  afterEach(async () => {
    await telemetry.shutdown();
  });

  describe("GrpcMetadataCarrier", () => {
    it("should read the first value of a key", () => {
      const metadata = new Metadata();
      metadata.add("traceparent", TRACEPARENT);
      metadata.add("traceparent", OTHER_TRACEPARENT);

      expect(new GrpcMetadataCarrier(metadata).get("traceparent")).toBe(TRACEPARENT);
    });

    it("should decode binary values", () => {
      const metadata = new Metadata();
      metadata.add("tenant-bin", Buffer.from("acme"));

      expect(new GrpcMetadataCarrier(metadata).get("tenant-bin")).toBe("acme");
    });
  });

  describe("flattenMetadata", () => {
    it("should keep the first text value and drop binary entries", () => {
      const metadata = new Metadata();
      metadata.add("x-tenant", "acme");
      metadata.add("x-tenant", "globex");
      metadata.add("tenant-bin", Buffer.from("acme"));

      expect(flattenMetadata(metadata)).toEqual({ "x-tenant": "acme" });
    });
  });

  describe("injectGrpcMetadata / extractGrpcMetadata", () => {
    it("should round-trip trace and span ids", () => {
      const source = startTrace(undefined, "svc", "call", withTelemetry(telemetry));
      const metadata = injectGrpcMetadata(source.getContext(), new Metadata(), telemetry);

      const received = trace.getSpanContext(extractGrpcMetadata(ROOT_CONTEXT, metadata, telemetry));
      expect(received?.traceId).toBe(source.getTraceId());
      expect(received?.spanId).toBe(source.getSpanId());
    });

    it("should leave unrelated multi-value entries alone", () => {
      const source = startTrace(undefined, "svc", "call", withTelemetry(telemetry));
      const metadata = new Metadata();
      metadata.add("x-tenant", "acme");
      metadata.add("x-tenant", "globex");

      injectGrpcMetadata(source.getContext(), metadata, telemetry);

      expect(metadata.get("x-tenant")).toEqual(["acme", "globex"]);
      expect(metadata.get("traceparent")).toEqual([`00-${source.getTraceId()}-${source.getSpanId()}-01`]);
    });

    it("should replace every stale trace value with the new one", () => {
      const source = startTrace(undefined, "svc", "call", withTelemetry(telemetry));
      const metadata = new Metadata();
      metadata.add("traceparent", TRACEPARENT);
      metadata.add("traceparent", OTHER_TRACEPARENT);

      injectGrpcMetadata(source.getContext(), metadata, telemetry);

      expect(metadata.get("traceparent")).toEqual([`00-${source.getTraceId()}-${source.getSpanId()}-01`]);
    });

    it("should extract using the first value", () => {
      const metadata = new Metadata();
      metadata.add("traceparent", TRACEPARENT);
      metadata.add("traceparent", OTHER_TRACEPARENT);

      const received = trace.getSpanContext(extractGrpcMetadata(ROOT_CONTEXT, metadata, telemetry));
      expect(received?.traceId).toBe("0af7651916cd43dd8448eb211c80319c");
    });

    it("should return the same context without trace metadata", () => {
      const metadata = new Metadata();
      metadata.add("x-tenant", "acme");
      expect(extractGrpcMetadata(ROOT_CONTEXT, metadata, telemetry)).toBe(ROOT_CONTEXT);
    });
  });

  describe("client interceptor", () => {
    function listener() {
      return { onReceiveMetadata: vi.fn(), onReceiveMessage: vi.fn(), onReceiveStatus: vi.fn() };
    }

    it("should inject the trace's context before the call starts", () => {
      const source = startTrace(undefined, "svc", "call", withTelemetry(telemetry));
      const requester = createTracingRequester(source, telemetry);
      const metadata = new Metadata();
      const callListener = listener();
      const next = vi.fn();

      requester.start?.(metadata, callListener, next);

      expect(next).toHaveBeenCalledWith(metadata, callListener);
      expect(metadata.get("traceparent")).toEqual([`00-${source.getTraceId()}-${source.getSpanId()}-01`]);
    });

    it("should resolve a function source on every call", () => {
      const first = startTrace(undefined, "svc", "first", withTelemetry(telemetry));
      const second = startTrace(undefined, "svc", "second", withTelemetry(telemetry));
      let current = first.getContext();
      const requester = createTracingRequester(() => current, telemetry);

      const firstMetadata = new Metadata();
      requester.start?.(firstMetadata, listener(), vi.fn());
      current = second.getContext();
      const secondMetadata = new Metadata();
      requester.start?.(secondMetadata, listener(), vi.fn());

      expect(firstMetadata.get("traceparent")[0]).toContain(first.getSpanId());
      expect(secondMetadata.get("traceparent")[0]).toContain(second.getSpanId());
    });

    it("should accept a plain context", () => {
      const source = startTrace(undefined, "svc", "call", withTelemetry(telemetry));
      const requester = createTracingRequester(source.getContext(), telemetry);
      const metadata = new Metadata();

      requester.start?.(metadata, listener(), vi.fn());

      expect(metadata.get("traceparent")[0]).toContain(source.getTraceId());
    });

    it("should build an interceptor function", () => {
      expect(createTraceInterceptor()).toBeTypeOf("function");
    });
  });
});
