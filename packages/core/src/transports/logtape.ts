/**
 * @tracewright/core - Logtape Transport
 * Forwards entries to Logtape (@logtape/logtape), one category per logger name.
 *
 * @example
 * ```typescript
 * import { configure, getConsoleSink } from '@logtape/logtape';
 *
 * await configure({
 *   sinks: { console: getConsoleSink() },
 *   loggers: [{ category: 'tracewright', sinks: ['console'], lowestLevel: 'info' }],
 * });
 *
 * // entries from createLogger({ name: 'telemetry' }) land in ["tracewright", "telemetry"]
 * const log = createLogger({ name: 'telemetry', transports: [new LogtapeTransport()] });
 * ```
 */

import { getLogger } from "@logtape/logtape";
import { LogLevel, type LogEntry, type LogLevelName } from "../logger.js";
import type { LogTransport, BaseTransportOptions } from "./types.js";

type Properties = Record<string, unknown>;

/**
 * The subset of a Logtape logger this transport calls.
 * Loggers returned by `getLogger()` satisfy it.
 */
export interface LogtapeLogger {
  trace(message: string, properties?: Properties): void;
  debug(message: string, properties?: Properties): void;
  info(message: string, properties?: Properties): void;
  warning(message: string, properties?: Properties): void;
  error(message: string, properties?: Properties): void;
  fatal(message: string, properties?: Properties): void;
}

type LogtapeMethod = keyof LogtapeLogger;

const METHODS: Record<Exclude<LogLevelName, "SILENT">, LogtapeMethod> = {
  TRACE: "trace",
  DEBUG: "debug",
  INFO: "info",
  WARN: "warning",
  ERROR: "error",
  FATAL: "fatal",
};

export interface LogtapeTransportOptions extends BaseTransportOptions {
  /** Send every entry to this logger instead of a per-module category */
  logger?: LogtapeLogger;
  /** First category segment (default: "tracewright") */
  category?: string;
  /** Copy the entry timestamp into the properties (default: false; Logtape stamps records itself) */
  includeTimestamp?: boolean;
}

/**
 * Logtape transport.
 * Without a fixed logger, the `module` field picks the category `[category, module]`
 * and is not repeated in the properties.
 */
export class LogtapeTransport implements LogTransport {
  readonly name = "logtape";

  private readonly fixed: LogtapeLogger | undefined;
  private readonly root: string;
  private readonly includeTimestamp: boolean;
  private readonly enabled: boolean;
  private readonly minLevel: number;
  private readonly byModule = new Map<string, LogtapeLogger>();

  constructor(options: LogtapeTransportOptions = {}) {
    this.fixed = options.logger;
    this.root = options.category ?? "tracewright";
    this.includeTimestamp = options.includeTimestamp ?? false;
    this.enabled = options.enabled !== false;
    this.minLevel = options.minLevel ? LogLevel[options.minLevel] : LogLevel.TRACE;
  }

  log(entry: LogEntry): void {
    if (!this.enabled || entry.level === "SILENT" || entry.levelValue < this.minLevel) return;

    const { module, ...context } = entry.context ?? {};
    const properties: Properties = this.fixed && module !== undefined ? { module, ...context } : context;
    if (this.includeTimestamp && entry.timestamp) {
      properties["timestamp"] = entry.timestamp;
    }
    if (entry.error) {
      properties["error"] = entry.error;
    }

    const target = this.fixed ?? this.loggerFor(typeof module === "string" ? module : undefined);
    target[METHODS[entry.level]](entry.message, properties);
  }

  private loggerFor(module: string | undefined): LogtapeLogger {
    const key = module ?? "";
    let logger = this.byModule.get(key);
    if (!logger) {
      logger = getLogger(module ? [this.root, module] : [this.root]);
      this.byModule.set(key, logger);
    }
    return logger;
  }
}

export function createLogtapeTransport(options?: LogtapeTransportOptions): LogtapeTransport {
  return new LogtapeTransport(options);
}
