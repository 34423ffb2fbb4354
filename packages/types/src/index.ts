/**
 * @braceconf/types — shared errors, result type and logging.
 *
 * @packageDocumentation
 */

// ─── Errors ─────────────────────────────────────────────────────────────────────

export { BraceconfErrorCode, BraceconfError, isBraceconfError, formatError } from './errors';
export type { BraceconfErrorOptions } from './errors';

// ─── Result type ────────────────────────────────────────────────────────────────

/**
 * A discriminated union representing either a successful value or an error.
 *
 *   - `{ ok: true, value: T }`
 *   - `{ ok: false, error: E }`
 */
export type Result<T, E = Error> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

/**
 * Construct a successful Result.
 *
 * @example
 * ```typescript
 * const result = ok(42);
 * if (result.ok) console.log(result.value); // 42
 * ```
 */
export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

/**
 * Construct a failed Result.
 *
 * @example
 * ```typescript
 * const result = err(new Error('not found'));
 * if (!result.ok) console.log(result.error.message); // 'not found'
 * ```
 */
export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

/**
 * Unwrap a Result, throwing its error when it failed.
 */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (result.ok) {
    return result.value;
  }
  throw result.error;
}

// ─── Structured logging ─────────────────────────────────────────────────────────

export { Logger, createLogger, LogLevel, jsonOutput, lineOutput, parseLogLevel } from './logger';
export type { LogEntry, LogOutput, LoggerOptions } from './logger';

// ─── Debug logging ──────────────────────────────────────────────────────────────

export { isDebugEnabled, createDebugLogger, DEBUG_NAMESPACE } from './debug';
export type { DebugLogger } from './debug';
