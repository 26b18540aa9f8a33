/**
 * @tracewright/core - Transport Types
 * Interfaces for log transports
 */

import type { LogEntry, LogLevelName } from "../logger.js";

/**
 * Log transport interface
 * Implement this to create custom log destinations
 */
export interface LogTransport {
  /** Transport name for identification */
  readonly name: string;

  /**
   * Log an entry
   * Can be sync or async - async transports should handle their own buffering
   */
  log(entry: LogEntry): void | Promise<void>;

  /**
   * Flush any buffered logs
   */
  flush?(): Promise<void>;

  /**
   * Close the transport and release resources
   */
  close?(): Promise<void>;
}

/**
 * Options shared by all transports
 */
export interface BaseTransportOptions {
  /** Minimum log level to transport, on top of the logger's own level */
  minLevel?: Exclude<LogLevelName, "SILENT">;
  /** Enable/disable the transport */
  enabled?: boolean;
}
