/**
 * @module
 * Shared building blocks for tracewright packages: environment access,
 * structured logging, typed errors and the Result type.
 *
 * @example
 * ```typescript
 * import { createLogger, getEnv, TracewrightError, ok, err } from '@tracewright/core';
 *
 * const log = createLogger({ name: 'orders' });
 * log.info('Service started', { env: getEnv('NODE_ENV') });
 * ```
 */

// ============================================
// ENVIRONMENT
// ============================================

export {
  getEnv,
  getEnvNumber,
  getEnvFloat,
  getEnvArray,
  pickEnv,
  isDevelopment,
} from "./env.js";

// ============================================
// LOGGING
// ============================================

export {
  Logger,
  ConsoleTransport,
  LogLevel,
  createLogger,
  isLogLevelName,
  logError,
  type ConsoleTransportOptions,
  type LogTransport,
  type LogLevelName,
  type LogLevelValue,
  type LogContext,
  type LogEntry,
  type LoggerConfig,
  type ErrorInfo,
} from "./logger.js";

export {
  LogtapeTransport,
  createLogtapeTransport,
  type LogtapeTransportOptions,
  type LogtapeLogger,
} from "./transports/logtape.js";

// ============================================
// ERRORS
// ============================================

export {
  TracewrightError,
  ConfigurationError,
  TelemetryError,
  TraceNotStartedError,
  toError,
} from "./errors.js";

export {
  ErrorCodes,
  getErrorCode,
  getErrorCodesByCategory,
  isRetryableError,
  type ErrorCategory,
  type ErrorCode,
  type ErrorCodeDefinition,
} from "./error-codes.js";

// ============================================
// TYPES
// ============================================

export { ok, err, type Result } from "./types.js";
