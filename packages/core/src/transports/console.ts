/**
 * @tracewright/core - Console Transport
 *
 * Default log transport. Writes one JSON object per line, or in development a short
 * coloured line that leads with the trace id when the entry carries one.
 *
 * @example
 * ```typescript
 * import { ConsoleTransport } from '@tracewright/core';
 *
 * const transport = new ConsoleTransport({ pretty: true, colors: false });
 * // [10:30:00] INFO  (0af76519) Payment captured {"amount":12}
 * ```
 */

import { isDevelopment } from "../env.js";
import { LogLevel, type LogEntry, type LogLevelName } from "../logger.js";
import type { BaseTransportOptions, LogTransport } from "./types.js";

export interface ConsoleTransportOptions extends BaseTransportOptions {
  /** Enable pretty printing (default: true in development) */
  pretty?: boolean;
  /** Enable ANSI colors (default: true when stdout is a TTY) */
  colors?: boolean;
}

type ConsoleMethod = "debug" | "log" | "warn" | "error";

const STYLES: Record<LogLevelName, { color: string; method: ConsoleMethod }> = {
  TRACE: { color: "\x1b[90m", method: "debug" },
  DEBUG: { color: "\x1b[36m", method: "debug" },
  INFO: { color: "\x1b[32m", method: "log" },
  WARN: { color: "\x1b[33m", method: "warn" },
  ERROR: { color: "\x1b[31m", method: "error" },
  FATAL: { color: "\x1b[35m", method: "error" },
  SILENT: { color: "", method: "log" },
};

const RESET = "\x1b[0m";

/** Digits of the trace id shown in pretty lines */
const SHORT_TRACE_ID = 8;

export class ConsoleTransport implements LogTransport {
  readonly name = "console";

  private readonly pretty: boolean;
  private readonly colors: boolean;
  private readonly enabled: boolean;
  private readonly minLevel: number;

  constructor(options: ConsoleTransportOptions = {}) {
    this.pretty = options.pretty ?? isDevelopment();
    this.colors = options.colors ?? process.stdout.isTTY === true;
    this.enabled = options.enabled !== false;
    this.minLevel = options.minLevel ? LogLevel[options.minLevel] : LogLevel.TRACE;
  }

  log(entry: LogEntry): void {
    if (!this.enabled || entry.levelValue < this.minLevel) return;

    const { method } = STYLES[entry.level];
    console[method](this.pretty ? this.formatPretty(entry) : this.format(entry));
    if (this.pretty && entry.error?.stack && method === "error") {
      console.error(entry.error.stack);
    }
  }

  /** Render an entry as the single JSON line written in non-pretty mode */
  format(entry: LogEntry): string {
    return JSON.stringify({
      level: entry.level,
      time: entry.timestamp,
      msg: entry.message,
      ...entry.context,
      ...(entry.error ? { err: entry.error } : {}),
    });
  }

  /** Render an entry as a pretty line, without the stack */
  formatPretty(entry: LogEntry): string {
    const { level, message, timestamp, error } = entry;
    const { traceId, ...context } = entry.context ?? {};

    const color = this.colors ? STYLES[level].color : "";
    const reset = this.colors ? RESET : "";
    const time = timestamp.split("T")[1]?.slice(0, 8) ?? timestamp;

    const parts = [`${color}[${time}] ${level.padEnd(5)}${reset}`];
    if (typeof traceId === "string" && traceId !== "") {
      parts.push(`(${traceId.slice(0, SHORT_TRACE_ID)})`);
    }
    parts.push(message);
    if (Object.keys(context).length > 0) {
      parts.push(JSON.stringify(context));
    }
    if (error && !error.stack) {
      parts.push(`${error.name}: ${error.message}`);
    }
    return parts.join(" ");
  }
}
