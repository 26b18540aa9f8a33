/**
 * @tracewright/core - Type Definitions
 * Result type
 */

// ============================================
// RESULT TYPES
// ============================================

/**
 * A discriminated union type representing either success or failure.
 *
 * @example
 * ```typescript
 * const result = initTelemetry({ serviceName: 'checkout' });
 * if (result.success) {
 *   await result.data.shutdown();
 * } else {
 *   console.error(result.error.code);
 * }
 * ```
 */
export type Result<T, E = Error> =
  | { success: true; data: T }
  | { success: false; error: E };

/**
 * Create a successful Result.
 */
export function ok<T>(data: T): Result<T, never> {
  return { success: true, data };
}

/**
 * Create a failed Result.
 */
export function err<E>(error: E): Result<never, E> {
  return { success: false, error };
}
