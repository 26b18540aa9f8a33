/**
 * @tracewright/tracing - HTTP Carrier
 * Fetch `Headers` and Node header records, matched case-insensitively
 */

import type { Context } from "@opentelemetry/api";
import type { Telemetry } from "../telemetry/telemetry.js";
import { HeaderCarrier, type HeaderStrategy } from "./carrier.js";
import { extract, propagate } from "./gateway.js";

/** Node-style header record (`IncomingHttpHeaders`, `OutgoingHttpHeaders`) */
export type HttpHeaderRecord = Record<string, string | string[] | number | undefined>;

export type HttpHeaders = Headers | HttpHeaderRecord;

function firstValue(value: string | string[] | number | undefined): string | undefined {
  if (value === undefined) return undefined;
  if (Array.isArray(value)) return value[0];
  return String(value);
}

function matchingKeys(record: HttpHeaderRecord, key: string): string[] {
  const lower = key.toLowerCase();
  return Object.keys(record).filter((k) => k.toLowerCase() === lower);
}

const fetchHeadersStrategy: HeaderStrategy<Headers> = {
  get: (headers, key) => headers.get(key) ?? undefined,
  set: (headers, key, value) => headers.set(key, value),
  keys: (headers) => {
    const keys: string[] = [];
    headers.forEach((_value, key) => keys.push(key));
    return keys;
  },
};

const headerRecordStrategy: HeaderStrategy<HttpHeaderRecord> = {
  get: (record, key) => {
    for (const k of matchingKeys(record, key)) {
      const value = firstValue(record[k]);
      if (value !== undefined) return value;
    }
    return undefined;
  },
  set: (record, key, value) => {
    for (const k of matchingKeys(record, key)) {
      delete record[k];
    }
    record[key] = value;
  },
  keys: (record) => Object.keys(record).filter((k) => record[k] !== undefined),
};

const httpHeadersStrategy: HeaderStrategy<HttpHeaders> = {
  get: (headers, key) =>
    headers instanceof Headers
      ? fetchHeadersStrategy.get(headers, key)
      : headerRecordStrategy.get(headers, key),
  set: (headers, key, value) => {
    if (headers instanceof Headers) fetchHeadersStrategy.set(headers, key, value);
    else headerRecordStrategy.set(headers, key, value);
  },
  keys: (headers) =>
    headers instanceof Headers
      ? fetchHeadersStrategy.keys(headers)
      : headerRecordStrategy.keys(headers),
};

/**
 * Carrier over HTTP headers.
 * One current value per key; `set` replaces any differently-cased duplicate.
 */
export class HttpHeadersCarrier extends HeaderCarrier<HttpHeaders> {
  constructor(headers: HttpHeaders) {
    super(headers, httpHeadersStrategy);
  }
}

/**
 * Inject trace context into outgoing request headers.
 *
 * @example
 * ```typescript
 * const headers: Record<string, string> = {};
 * propagateHttp(trace.getContext(), headers);
 * await fetch(url, { headers });
 * ```
 */
export function propagateHttp(context: Context, headers: HttpHeaders, telemetry?: Telemetry): void {
  propagate(context, new HttpHeadersCarrier(headers), telemetry);
}

/**
 * Extract trace context from incoming request headers.
 */
export function extractHttp(context: Context, headers: HttpHeaders, telemetry?: Telemetry): Context {
  return extract(context, new HttpHeadersCarrier(headers), telemetry);
}
