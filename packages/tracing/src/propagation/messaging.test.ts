import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { ROOT_CONTEXT, trace } from "@opentelemetry/api";
import type { MessagePropertyHeaders } from "amqplib";
import type { IHeaders } from "kafkajs";
import { headers as natsHeaders } from "nats";
import { withTelemetry } from "../options.js";
import { createTestTelemetry, type TestTelemetry } from "../testing.js";
import { startTrace } from "../trace.js";
import {
  AmqpHeadersCarrier,
  extractAmqp,
  extractKafka,
  extractNats,
  KafkaHeadersCarrier,
  NatsHeadersCarrier,
  propagateAmqp,
  propagateKafka,
  propagateNats,
} from "./messaging.js";

const TRACEPARENT = "00-0af7651916cd43dd8448eb211c80319c-b7ad6b7169203331-01";

describe("@tracewright/tracing - Messaging Carriers", () => {
  let telemetry: TestTelemetry;

  beforeEach(() => {
    telemetry = createTestTelemetry();
  });

  afterEach(async () => {
    await telemetry.shutdown();
  });

  function expectedTraceparent(source: { getTraceId(): string; getSpanId(): string }): string {
    return `00-${source.getTraceId()}-${source.getSpanId()}-01`;
  }

  describe("Kafka", () => {
    it("should round-trip trace and span ids", () => {
      const source = startTrace(undefined, "svc", "publish", withTelemetry(telemetry));
      const headers: IHeaders = {};

      propagateKafka(source.getContext(), headers, telemetry);
      const received = trace.getSpanContext(extractKafka(ROOT_CONTEXT, headers, telemetry));

      expect(received?.traceId).toBe(source.getTraceId());
      expect(received?.spanId).toBe(source.getSpanId());
    });

    it("should keep one value per key across repeated injects", () => {
      const source = startTrace(undefined, "svc", "publish", withTelemetry(telemetry));
      const headers: IHeaders = { traceparent: ["stale-a", "stale-b"] };

      propagateKafka(source.getContext(), headers, telemetry);
      propagateKafka(source.getContext(), headers, telemetry);

      expect(headers).toEqual({ traceparent: expectedTraceparent(source) });
    });

    it("should decode Buffer values and read the first of a list", () => {
      expect(new KafkaHeadersCarrier({ traceparent: Buffer.from(TRACEPARENT) }).get("traceparent")).toBe(
        TRACEPARENT
      );
      expect(new KafkaHeadersCarrier({ k: [Buffer.from("first"), "second"] }).get("k")).toBe("first");
    });

    it("should return the same context without trace headers", () => {
      expect(extractKafka(ROOT_CONTEXT, { "content-type": "application/json" }, telemetry)).toBe(
        ROOT_CONTEXT
      );
    });
  });

  describe("AMQP", () => {
    it("should round-trip trace and span ids", () => {
      const source = startTrace(undefined, "svc", "publish", withTelemetry(telemetry));
      const headers: MessagePropertyHeaders = {};

      propagateAmqp(source.getContext(), headers, telemetry);
      const received = trace.getSpanContext(extractAmqp(ROOT_CONTEXT, headers, telemetry));

      expect(received?.traceId).toBe(source.getTraceId());
      expect(received?.spanId).toBe(source.getSpanId());
    });

    it("should replace an existing entry", () => {
      const source = startTrace(undefined, "svc", "publish", withTelemetry(telemetry));
      const headers: MessagePropertyHeaders = { traceparent: "stale", "x-retry": 2 };

      propagateAmqp(source.getContext(), headers, telemetry);

      expect(headers).toEqual({ "x-retry": 2, traceparent: expectedTraceparent(source) });
    });

    it("should read Buffers and treat other values as empty", () => {
      const carrier = new AmqpHeadersCarrier({ traceparent: Buffer.from(TRACEPARENT), "x-retry": 2 });
      expect(carrier.get("traceparent")).toBe(TRACEPARENT);
      expect(carrier.get("x-retry")).toBe("");
    });

    it("should return the same context without trace headers", () => {
      expect(extractAmqp(ROOT_CONTEXT, { "x-retry": 1 }, telemetry)).toBe(ROOT_CONTEXT);
    });
  });

  describe("NATS", () => {
    it("should round-trip trace and span ids", () => {
      const source = startTrace(undefined, "svc", "publish", withTelemetry(telemetry));
      const headers = natsHeaders();

      propagateNats(source.getContext(), headers, telemetry);
      const received = trace.getSpanContext(extractNats(ROOT_CONTEXT, headers, telemetry));

      expect(received?.traceId).toBe(source.getTraceId());
      expect(received?.spanId).toBe(source.getSpanId());
    });

    it("should replace values through the native header type", () => {
      const source = startTrace(undefined, "svc", "publish", withTelemetry(telemetry));
      const headers = natsHeaders();
      headers.append("traceparent", "stale");

      propagateNats(source.getContext(), headers, telemetry);

      expect(headers.values("traceparent")).toEqual([expectedTraceparent(source)]);
      expect(new NatsHeadersCarrier(headers).keys()).toEqual(["traceparent"]);
    });

    it("should answer an empty string for a missing key", () => {
      expect(new NatsHeadersCarrier(natsHeaders()).get("traceparent")).toBe("");
    });

    it("should return the same context without trace headers", () => {
      const headers = natsHeaders();
      headers.set("content-type", "application/json");
      expect(extractNats(ROOT_CONTEXT, headers, telemetry)).toBe(ROOT_CONTEXT);
    });
  });
});
