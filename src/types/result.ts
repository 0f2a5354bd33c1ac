// ═══════════════════════════════════════════════════════════════════════════════
// RESULT PATTERN — Type-Safe Error Handling
// Broker Resilience — Core Types
// ═══════════════════════════════════════════════════════════════════════════════

// ─────────────────────────────────────────────────────────────────────────────────
// CORE RESULT TYPE
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Success variant of Result.
 */
export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
  readonly error?: never;
}

/**
 * Failure variant of Result.
 */
export interface Err<E> {
  readonly ok: false;
  readonly error: E;
  readonly value?: never;
}

/**
 * Result type representing either success (Ok) or failure (Err).
 * 
 * @example
 * ```typescript
 * const result = await wrapper.executeWithResult(() => submitOrder(order));
 * if (result.ok) {
 *   console.log(result.value.orderId);
 * } else {
 *   console.error(result.error.kind, result.error.error.message);
 * }
 * ```
 */
export type Result<T, E = Error> = Ok<T> | Err<E>;

/**
 * Promise that resolves to a Result.
 */
export type AsyncResult<T, E = Error> = Promise<Result<T, E>>;

// ─────────────────────────────────────────────────────────────────────────────────
// CONSTRUCTORS
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Create a success Result.
 */
export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

/**
 * Create a failure Result.
 */
export function err<E>(error: E): Err<E> {
  return { ok: false, error };
}
