/**
 * @tracewright/core - Error Code Catalog
 * Centralized error code definitions
 */

/**
 * Error category for grouping and filtering
 */
export type ErrorCategory = "configuration" | "telemetry" | "tracing";

/**
 * Error code definition
 */
export interface ErrorCodeDefinition {
  readonly code: string;
  readonly category: ErrorCategory;
  readonly retryable?: boolean;
}

/**
 * Centralized error code catalog
 */
export const ErrorCodes = {
  // ============================================================================
  // Configuration Errors
  // ============================================================================
  INVALID_CONFIG: {
    code: "INVALID_CONFIG",
    category: "configuration",
  },

  // ============================================================================
  // Telemetry Pipeline Errors
  // ============================================================================
  TELEMETRY_INIT_FAILED: {
    code: "TELEMETRY_INIT_FAILED",
    category: "telemetry",
  },
  EXPORTER_CREATION_FAILED: {
    code: "EXPORTER_CREATION_FAILED",
    category: "telemetry",
  },
  TELEMETRY_FLUSH_FAILED: {
    code: "TELEMETRY_FLUSH_FAILED",
    category: "telemetry",
    retryable: true,
  },
  TELEMETRY_SHUTDOWN_FAILED: {
    code: "TELEMETRY_SHUTDOWN_FAILED",
    category: "telemetry",
  },

  // ============================================================================
  // Trace Lifecycle Errors
  // ============================================================================
  TRACE_NOT_STARTED: {
    code: "TRACE_NOT_STARTED",
    category: "tracing",
  },
} as const satisfies Record<string, ErrorCodeDefinition>;

/**
 * Error code type (union of all error code keys)
 */
export type ErrorCode = keyof typeof ErrorCodes;

function isErrorCode(code: string): code is ErrorCode {
  return Object.hasOwn(ErrorCodes, code);
}

/**
 * Get error code definition by code string
 */
export function getErrorCode(code: string): ErrorCodeDefinition | undefined {
  return isErrorCode(code) ? ErrorCodes[code] : undefined;
}

/**
 * Get all error codes by category
 */
export function getErrorCodesByCategory(category: ErrorCategory): ErrorCodeDefinition[] {
  const all: ErrorCodeDefinition[] = Object.values(ErrorCodes);
  return all.filter((e) => e.category === category);
}

/**
 * Check if an error code is retryable
 */
export function isRetryableError(code: string): boolean {
  return getErrorCode(code)?.retryable === true;
}
