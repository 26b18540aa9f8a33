/**
 * @tracewright/tracing - Messaging Carriers
 * Kafka, AMQP and NATS header carriers
 */

import type { Context } from "@opentelemetry/api";
import type { IHeaders } from "kafkajs";
import type { MessagePropertyHeaders } from "amqplib";
import type { MsgHdrs } from "nats";
import type { Telemetry } from "../telemetry/telemetry.js";
import { HeaderCarrier, type HeaderStrategy } from "./carrier.js";
import { extract, propagate } from "./gateway.js";

function decode(value: unknown): string | undefined {
  if (typeof value === "string") return value;
  if (Buffer.isBuffer(value)) return value.toString("utf8");
  return undefined;
}

// ============================================================================
// KAFKA
// ============================================================================

/** One value per key; an existing entry is removed before the new one is appended */
const kafkaStrategy: HeaderStrategy<IHeaders> = {
  get: (headers, key) => {
    const value = headers[key];
    return decode(Array.isArray(value) ? value[0] : value);
  },
  set: (headers, key, value) => {
    delete headers[key];
    headers[key] = value;
  },
  keys: (headers) => Object.keys(headers).filter((k) => headers[k] !== undefined),
};

/**
 * Carrier over kafkajs message headers.
 */
export class KafkaHeadersCarrier extends HeaderCarrier<IHeaders> {
  constructor(headers: IHeaders) {
    super(headers, kafkaStrategy);
  }
}

/**
 * Inject trace context into the headers of an outgoing Kafka message.
 *
 * @example
 * ```typescript
 * const headers: IHeaders = {};
 * propagateKafka(trace.getContext(), headers);
 * await producer.send({ topic: 'orders', messages: [{ value, headers }] });
 * ```
 */
export function propagateKafka(context: Context, headers: IHeaders, telemetry?: Telemetry): void {
  propagate(context, new KafkaHeadersCarrier(headers), telemetry);
}

export function extractKafka(context: Context, headers: IHeaders, telemetry?: Telemetry): Context {
  return extract(context, new KafkaHeadersCarrier(headers), telemetry);
}

// ============================================================================
// AMQP
// ============================================================================

/** One value per key; non-text values read as absent */
const amqpStrategy: HeaderStrategy<MessagePropertyHeaders> = {
  get: (headers, key) => {
    const value: unknown = headers[key];
    return decode(value);
  },
  set: (headers, key, value) => {
    delete headers[key];
    headers[key] = value;
  },
  keys: (headers) => Object.keys(headers),
};

/**
 * Carrier over an AMQP message header table.
 */
export class AmqpHeadersCarrier extends HeaderCarrier<MessagePropertyHeaders> {
  constructor(headers: MessagePropertyHeaders) {
    super(headers, amqpStrategy);
  }
}

/**
 * Inject trace context into an AMQP header table.
 *
 * @example
 * ```typescript
 * const headers: MessagePropertyHeaders = {};
 * propagateAmqp(trace.getContext(), headers);
 * channel.publish('events', 'order.created', body, { headers });
 * ```
 */
export function propagateAmqp(
  context: Context,
  headers: MessagePropertyHeaders,
  telemetry?: Telemetry
): void {
  propagate(context, new AmqpHeadersCarrier(headers), telemetry);
}

export function extractAmqp(
  context: Context,
  headers: MessagePropertyHeaders,
  telemetry?: Telemetry
): Context {
  return extract(context, new AmqpHeadersCarrier(headers), telemetry);
}

// ============================================================================
// NATS
// ============================================================================

/** Delegates to the native header type, which already replaces on `set` */
const natsStrategy: HeaderStrategy<MsgHdrs> = {
  get: (headers, key) => (headers.has(key) ? headers.get(key) : undefined),
  set: (headers, key, value) => headers.set(key, value),
  keys: (headers) => headers.keys(),
};

/**
 * Carrier over NATS message headers.
 */
export class NatsHeadersCarrier extends HeaderCarrier<MsgHdrs> {
  constructor(headers: MsgHdrs) {
    super(headers, natsStrategy);
  }
}

/**
 * Inject trace context into NATS headers.
 *
 * @example
 * ```typescript
 * const hdrs = headers();
 * propagateNats(trace.getContext(), hdrs);
 * nc.publish('orders.created', payload, { headers: hdrs });
 * ```
 */
export function propagateNats(context: Context, headers: MsgHdrs, telemetry?: Telemetry): void {
  propagate(context, new NatsHeadersCarrier(headers), telemetry);
}

export function extractNats(context: Context, headers: MsgHdrs, telemetry?: Telemetry): Context {
  return extract(context, new NatsHeadersCarrier(headers), telemetry);
}
