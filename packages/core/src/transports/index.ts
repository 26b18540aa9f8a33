/**
 * @tracewright/core - Transports
 * Log transport implementations
 */

export type { LogTransport, BaseTransportOptions } from "./types.js";

export { ConsoleTransport, type ConsoleTransportOptions } from "./console.js";

export {
  LogtapeTransport,
  createLogtapeTransport,
  type LogtapeTransportOptions,
  type LogtapeLogger,
} from "./logtape.js";
