/**
 * @module
 * Structured logging with pluggable transports and field redaction.
 *
 * @example
 * ```typescript
 * import { createLogger } from '@tracewright/core';
 *
 * const log = createLogger({ name: 'checkout', level: 'DEBUG' });
 *
 * log.info('Span exported', { count: 12 });
 * log.error('Export failed', error, { endpoint });
 *
 * const spanLog = log.child({ traceId, spanId });
 * ```
 */

import { getEnv } from "./env.js";
import { ConsoleTransport } from "./transports/console.js";
import type { LogTransport } from "./transports/types.js";

export { ConsoleTransport, type ConsoleTransportOptions } from "./transports/console.js";
export type { LogTransport } from "./transports/types.js";

/**
 * Log level constants mapping level names to numeric values.
 * Lower values are more verbose; higher values are more severe.
 */
export const LogLevel = {
  TRACE: 10,
  DEBUG: 20,
  INFO: 30,
  WARN: 40,
  ERROR: 50,
  FATAL: 60,
  SILENT: 100,
} as const;

/** Log level name string literal type */
export type LogLevelName = keyof typeof LogLevel;

/** Numeric log level value type */
export type LogLevelValue = (typeof LogLevel)[LogLevelName];

/** Context object attached to a log line */
export type LogContext = Record<string, unknown>;

/**
 * Structured error information included in log entries.
 */
export interface ErrorInfo {
  name: string;
  message: string;
  stack: string | undefined;
}

/**
 * Structured log entry passed to transports.
 */
export interface LogEntry {
  level: LogLevelName;
  levelValue: LogLevelValue;
  message: string;
  /** ISO 8601 timestamp, or empty when timestamps are disabled */
  timestamp: string;
  context: LogContext | undefined;
  error: ErrorInfo | undefined;
}

/**
 * Configuration options for creating a Logger instance.
 */
export interface LoggerConfig {
  /** Minimum log level; falls back to LOG_LEVEL, then INFO */
  level: LogLevelName | undefined;
  /** Logger name, emitted as the `module` field */
  name: string | undefined;
  /** Base context added to all logs */
  context: LogContext | undefined;
  transports: LogTransport[] | undefined;
  /** Pretty print (console transport only) */
  pretty: boolean | undefined;
  /** Extra field names or dotted paths to redact */
  redact: string[] | undefined;
  timestamp: boolean | (() => string) | undefined;
}

/**
 * Check whether a string names a log level
 */
export function isLogLevelName(value: string): value is LogLevelName {
  return Object.hasOwn(LogLevel, value);
}

function isRecord(value: unknown): value is LogContext {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Redact sensitive fields from context.
 * Dotted paths ("user.password") reach into nested objects, which are copied, not mutated.
 */
function redactFields(obj: LogContext, fields: readonly string[]): LogContext {
  const result: LogContext = { ...obj };
  for (const field of fields) {
    const parts = field.split(".");
    if (parts.length === 1) {
      if (field in result) result[field] = "[REDACTED]";
      continue;
    }
    redactPath(result, parts);
  }
  return result;
}

function redactPath(target: LogContext, parts: string[]): void {
  const [head, ...rest] = parts;
  if (head === undefined || !(head in target)) return;
  if (rest.length === 0) {
    target[head] = "[REDACTED]";
    return;
  }
  const next = target[head];
  if (!isRecord(next)) return;
  const copy: LogContext = { ...next };
  target[head] = copy;
  redactPath(copy, rest);
}

/**
 * Default redact fields
 */
const DEFAULT_REDACT_FIELDS = [
  "password",
  "secret",
  "token",
  "accessToken",
  "refreshToken",
  "apiKey",
  "authorization",
  "cookie",
];

/**
 * Structured logger with support for multiple transports and redaction.
 *
 * @example
 * ```typescript
 * const logger = new Logger({ name: 'propagation', level: 'DEBUG' });
 * logger.debug('Extracted context', { keys: carrier.keys() });
 * logger.error('Shutdown failed', new Error('timeout'));
 * ```
 */
export class Logger {
  private readonly levelName: LogLevelName;
  private readonly level: LogLevelValue;
  private readonly name: string | undefined;
  private readonly context: LogContext;
  private readonly transports: LogTransport[];
  private readonly redactList: string[];
  private readonly timestampFn: () => string;

  constructor(config: Partial<LoggerConfig> = {}) {
    const fromEnv = getEnv("LOG_LEVEL")?.toUpperCase();
    this.levelName =
      config.level ?? (fromEnv !== undefined && isLogLevelName(fromEnv) ? fromEnv : "INFO");
    this.level = LogLevel[this.levelName];
    this.name = config.name;
    this.context = config.context ?? {};
    this.transports = config.transports ?? [
      new ConsoleTransport(config.pretty !== undefined ? { pretty: config.pretty } : {}),
    ];
    this.redactList = [...new Set([...DEFAULT_REDACT_FIELDS, ...(config.redact ?? [])])];

    if (config.timestamp === false) {
      this.timestampFn = () => "";
    } else if (typeof config.timestamp === "function") {
      this.timestampFn = config.timestamp;
    } else {
      this.timestampFn = () => new Date().toISOString();
    }
  }

  /**
   * Create a child logger with additional context.
   * The child shares transports, level and redaction with its parent.
   */
  child(context: LogContext): Logger {
    return new Logger({
      level: this.levelName,
      name: this.name,
      context: { ...this.context, ...context },
      transports: this.transports,
      redact: this.redactList,
      timestamp: this.timestampFn,
    });
  }

  /** Whether a message at `level` would reach the transports */
  isLevelEnabled(level: LogLevelName): boolean {
    return LogLevel[level] >= this.level;
  }

  private log(level: LogLevelName, message: string, context?: LogContext, error?: Error): void {
    const levelValue = LogLevel[level];
    if (levelValue < this.level) return;

    let finalContext: LogContext = { ...this.context };
    if (this.name) {
      finalContext["module"] = this.name;
    }
    if (context) {
      finalContext = { ...finalContext, ...context };
    }

    finalContext = redactFields(finalContext, this.redactList);

    const entry: LogEntry = {
      level,
      levelValue,
      message,
      timestamp: this.timestampFn(),
      context: Object.keys(finalContext).length > 0 ? finalContext : undefined,
      error: error
        ? {
            name: error.name,
            message: error.message,
            stack: error.stack,
          }
        : undefined,
    };

    for (const transport of this.transports) {
      const pending = transport.log(entry);
      if (pending instanceof Promise) {
        pending.catch((cause: unknown) => {
          console.error(`[${transport.name}] transport failed:`, cause);
        });
      }
    }
  }

  trace(message: string, context?: LogContext): void {
    this.log("TRACE", message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.log("DEBUG", message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log("INFO", message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log("WARN", message, context);
  }

  /**
   * Log an error message.
   * @param error - An Error, or a context object when there is no Error to attach
   */
  error(message: string, error?: Error | LogContext, context?: LogContext): void {
    if (error instanceof Error) {
      this.log("ERROR", message, context, error);
    } else {
      this.log("ERROR", message, error ?? context);
    }
  }

  /**
   * Log a fatal error message.
   * @param error - An Error, or a context object when there is no Error to attach
   */
  fatal(message: string, error?: Error | LogContext, context?: LogContext): void {
    if (error instanceof Error) {
      this.log("FATAL", message, context, error);
    } else {
      this.log("FATAL", message, error ?? context);
    }
  }

  /**
   * Flush every transport that buffers.
   */
  async flush(): Promise<void> {
    await Promise.all(this.transports.map((t) => t.flush?.()));
  }
}

/**
 * Create a new Logger instance with the specified configuration.
 */
export function createLogger(config?: Partial<LoggerConfig>): Logger {
  return new Logger(config);
}

/**
 * Log an unknown thrown value.
 * Error instances keep their stack; anything else is logged by its string form.
 *
 * @example
 * ```typescript
 * try {
 *   await handle.shutdown();
 * } catch (error) {
 *   logError(logger, error, 'Shutdown failed', { service });
 * }
 * ```
 */
export function logError(log: Logger, error: unknown, message: string, context?: LogContext): void {
  if (error instanceof Error) {
    log.error(message, error, context);
  } else {
    log.error(message, { error: String(error), ...context });
  }
}
