/**
 * @tracewright/tracing - Propagation Gateway
 * Inject and extract trace context through any carrier
 */

import type { Context, TextMapGetter, TextMapSetter } from "@opentelemetry/api";
import { globalTelemetry, type Telemetry } from "../telemetry/telemetry.js";
import type { Carrier } from "./carrier.js";

const carrierGetter: TextMapGetter<Carrier> = {
  get(carrier, key) {
    const value = carrier.get(key);
    return value === "" ? undefined : value;
  },
  keys(carrier) {
    return carrier.keys();
  },
};

const carrierSetter: TextMapSetter<Carrier> = {
  set(carrier, key, value) {
    carrier.set(key, value);
  },
};

/**
 * Write the trace context and baggage held by `context` into `carrier`.
 * `context` itself is left untouched.
 */
export function propagate(
  context: Context,
  carrier: Carrier,
  telemetry: Telemetry = globalTelemetry()
): void {
  telemetry.propagator.inject(context, carrier, carrierSetter);
}

/**
 * Read trace context and baggage from `carrier` into a context derived from `context`.
 * A carrier without valid trace data yields `context` itself.
 */
export function extract(
  context: Context,
  carrier: Carrier,
  telemetry: Telemetry = globalTelemetry()
): Context {
  return telemetry.propagator.extract(context, carrier, carrierGetter);
}
