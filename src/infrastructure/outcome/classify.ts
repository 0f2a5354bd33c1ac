// ═══════════════════════════════════════════════════════════════════════════════
// OUTCOME CLASSIFICATION — Map Thrown Values to Outcomes
// Broker Resilience — Infrastructure
// ═══════════════════════════════════════════════════════════════════════════════
//
// Classified errors keep their kind. Anything else is classified by:
//   1. numeric `status` / `statusCode` against the retryable status set
//   2. abort / timeout error names
//   3. fallback: transient
//
// ═══════════════════════════════════════════════════════════════════════════════

import { isClassifiedError } from './errors.js';
import { failure, type FailureKind, type FailureOutcome } from './types.js';

// ─────────────────────────────────────────────────────────────────────────────────
// CONSTANTS
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Status codes worth retrying: rate limiting and upstream failures.
 */
export const DEFAULT_RETRYABLE_STATUS_CODES: ReadonlySet<number> = new Set([
  429,
  500,
  502,
  503,
  504,
]);

const TIMEOUT_ERROR_NAMES = new Set(['AbortError', 'TimeoutError']);

export interface ClassifyOptions {
  /** Status codes classified as transient; everything else is permanent */
  readonly retryableStatusCodes?: ReadonlySet<number>;
}

// ─────────────────────────────────────────────────────────────────────────────────
// HELPERS
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Read a numeric HTTP status from an error-like value.
 */
export function extractStatusCode(error: unknown): number | undefined {
  if (error === null || typeof error !== 'object') return undefined;
  
  for (const key of ['statusCode', 'status'] as const) {
    if (key in error) {
      const value: unknown = Reflect.get(error, key);
      if (typeof value === 'number' && Number.isInteger(value)) {
        return value;
      }
    }
  }
  return undefined;
}

/**
 * Classify an HTTP status code.
 */
export function classifyStatusCode(
  statusCode: number,
  retryable: ReadonlySet<number> = DEFAULT_RETRYABLE_STATUS_CODES
): Exclude<FailureKind, 'timeout'> {
  return retryable.has(statusCode) ? 'transient' : 'permanent';
}

/**
 * Normalize an unknown thrown value to an Error.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

// ─────────────────────────────────────────────────────────────────────────────────
// CLASSIFICATION
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Determine the failure kind of a thrown value.
 */
export function classifyErrorKind(error: unknown, options: ClassifyOptions = {}): FailureKind {
  if (isClassifiedError(error)) {
    return error.kind;
  }
  
  const statusCode = extractStatusCode(error);
  if (statusCode !== undefined) {
    return classifyStatusCode(statusCode, options.retryableStatusCodes);
  }
  
  if (error instanceof Error && TIMEOUT_ERROR_NAMES.has(error.name)) {
    return 'timeout';
  }
  
  return 'transient';
}

/**
 * Classify a thrown value into a failure outcome.
 */
export function classifyError(error: unknown, options: ClassifyOptions = {}): FailureOutcome {
  return failure(classifyErrorKind(error, options), toError(error));
}
