/**
 * @module
 * Error classes for tracewright packages.
 *
 * @example
 * ```typescript
 * import { ConfigurationError, TraceNotStartedError } from '@tracewright/core';
 *
 * throw new ConfigurationError(['serviceName must be a non-empty string']);
 * throw new TraceNotStartedError('recordError');
 * ```
 */

import { ErrorCodes } from "./error-codes.js";

/**
 * Base error class for all tracewright errors.
 * Carries a machine-readable code and optional details.
 *
 * @example
 * ```typescript
 * throw new TracewrightError('Something went wrong', 'CUSTOM_ERROR', { extra: 'info' });
 * ```
 */
export class TracewrightError extends Error {
  public readonly code: string;
  public readonly details: Record<string, unknown> | undefined;

  constructor(
    message: string,
    code: string,
    details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "TracewrightError";
    this.code = code;
    this.details = details ?? undefined;
    Error.captureStackTrace?.(this, this.constructor);
  }

  toJSON() {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      details: this.details,
    };
  }
}

// ============================================
// CONFIGURATION ERRORS
// ============================================

/** Configuration failed validation; `issues` holds one message per problem */
export class ConfigurationError extends TracewrightError {
  constructor(
    public readonly issues: string[],
    message: string = "Invalid configuration",
    details?: Record<string, unknown>
  ) {
    super(message, ErrorCodes.INVALID_CONFIG.code, { ...details, issues });
    this.name = "ConfigurationError";
  }
}

// ============================================
// TELEMETRY ERRORS
// ============================================

/**
 * The telemetry pipeline could not be built or torn down.
 * The original failure is kept as `cause`.
 */
export class TelemetryError extends TracewrightError {
  constructor(
    message: string,
    code: string = ErrorCodes.TELEMETRY_INIT_FAILED.code,
    cause?: unknown,
    details?: Record<string, unknown>
  ) {
    super(message, code, details, cause === undefined ? undefined : { cause });
    this.name = "TelemetryError";
  }
}

// ============================================
// TRACE ERRORS
// ============================================

/** A span operation that needs a live span was called before `start()` */
export class TraceNotStartedError extends TracewrightError {
  constructor(
    /** Name of the operation that was attempted */
    public readonly operation: string,
    details?: Record<string, unknown>
  ) {
    super(
      `Cannot call ${operation}() before start()`,
      ErrorCodes.TRACE_NOT_STARTED.code,
      { ...details, operation }
    );
    this.name = "TraceNotStartedError";
  }
}

/**
 * Convert an unknown thrown value into an Error.
 * Errors pass through; anything else is wrapped with its string form as message.
 */
export function toError(value: unknown): Error {
  if (value instanceof Error) return value;
  return new Error(typeof value === "string" ? value : String(value));
}
