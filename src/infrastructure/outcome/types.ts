// ═══════════════════════════════════════════════════════════════════════════════
// OUTCOME TYPES — Classified Result of One Attempt
// Broker Resilience — Infrastructure
// ═══════════════════════════════════════════════════════════════════════════════
//
// Every attempt against the remote API resolves to exactly one outcome:
//   success    → the value
//   transient  → retryable (network blip, rate limit, 5xx)
//   permanent  → never retried (validation, auth, rejected order)
//   timeout    → retryable, and counted as a breaker failure
//
// ═══════════════════════════════════════════════════════════════════════════════

// ─────────────────────────────────────────────────────────────────────────────────
// KINDS
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Outcome discriminator.
 */
export type OutcomeKind = 'success' | 'transient' | 'permanent' | 'timeout';

/**
 * Outcome kinds that are failures.
 */
export type FailureKind = Exclude<OutcomeKind, 'success'>;

/**
 * Failure kinds a retry policy may opt into retrying.
 */
export type RetryableKind = Exclude<FailureKind, 'permanent'>;

export const FAILURE_KINDS: readonly FailureKind[] = ['transient', 'permanent', 'timeout'];

// ─────────────────────────────────────────────────────────────────────────────────
// OUTCOME
// ─────────────────────────────────────────────────────────────────────────────────

export interface SuccessOutcome<T> {
  readonly kind: 'success';
  readonly value: T;
}

export interface TransientOutcome {
  readonly kind: 'transient';
  readonly cause: Error;
}

export interface PermanentOutcome {
  readonly kind: 'permanent';
  readonly cause: Error;
}

export interface TimeoutOutcome {
  readonly kind: 'timeout';
  readonly cause: Error;
}

export type FailureOutcome = TransientOutcome | PermanentOutcome | TimeoutOutcome;

/**
 * Tagged result of one attempt.
 */
export type Outcome<T = unknown> = SuccessOutcome<T> | FailureOutcome;

// ─────────────────────────────────────────────────────────────────────────────────
// CONSTRUCTORS
// ─────────────────────────────────────────────────────────────────────────────────

export function success<T>(value: T): SuccessOutcome<T> {
  return { kind: 'success', value };
}

export function transientFailure(cause: Error): TransientOutcome {
  return { kind: 'transient', cause };
}

export function permanentFailure(cause: Error): PermanentOutcome {
  return { kind: 'permanent', cause };
}

export function timeout(cause: Error): TimeoutOutcome {
  return { kind: 'timeout', cause };
}

/**
 * Build a failure outcome of the given kind.
 */
export function failure(kind: FailureKind, cause: Error): FailureOutcome {
  switch (kind) {
    case 'transient': return transientFailure(cause);
    case 'permanent': return permanentFailure(cause);
    case 'timeout': return timeout(cause);
  }
}

export function isFailure<T>(outcome: Outcome<T>): outcome is FailureOutcome {
  return outcome.kind !== 'success';
}
