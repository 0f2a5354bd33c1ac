// ═══════════════════════════════════════════════════════════════════════════════
// RETRY TYPES — Retry Policy, Operation Contract and Errors
// Broker Resilience — Infrastructure
// ═══════════════════════════════════════════════════════════════════════════════

import {
  type RetryableKind,
  TimeoutFailureError,
} from '../outcome/index.js';
import type { CircuitOpenError, CircuitState } from '../circuit-breaker/index.js';

// ─────────────────────────────────────────────────────────────────────────────────
// CONFIGURATION
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Retry policy configuration.
 */
export interface RetryPolicy {
  /** Maximum number of attempts, including the first */
  readonly maxAttempts: number;
  
  /** Delay in ms before the first retry */
  readonly baseBackoffMs: number;
  
  /** Growth factor applied per attempt */
  readonly multiplier: number;
  
  /** Upper bound in ms for any single delay (before jitter) */
  readonly maxBackoffMs: number;
  
  /** Jitter spread as a fraction of the delay, 0..1 */
  readonly jitterFraction: number;
  
  /** Failure kinds that may be retried */
  readonly retryableOutcomes: readonly RetryableKind[];
  
  /** Timeout for individual attempts in ms (0 = no limit) */
  readonly attemptTimeoutMs: number;
}

/**
 * Default retry policy.
 */
export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 5,
  baseBackoffMs: 500,
  multiplier: 2,
  maxBackoffMs: 30000,
  jitterFraction: 0.5,
  retryableOutcomes: ['transient', 'timeout'],
  attemptTimeoutMs: 0,
};

/**
 * Uniform random source in [0, 1).
 */
export type RandomSource = () => number;

/**
 * Suspend the calling unit of work; rejects when the signal aborts.
 */
export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

// ─────────────────────────────────────────────────────────────────────────────────
// OPERATION
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Passed to every attempt of an operation.
 */
export interface AttemptContext {
  /** Attempt number (1-based) */
  readonly attempt: number;
  
  /** Aborted on caller cancel, overall deadline or attempt timeout */
  readonly signal: AbortSignal;
  
  /** Correlation tag of the call */
  readonly tag: string;
}

/**
 * A remote call that may succeed, fail or time out.
 */
export type Operation<T> = (context: AttemptContext) => Promise<T>;

/**
 * Per-call options.
 */
export interface ExecuteOptions {
  /** Correlation tag for logging; generated when omitted */
  readonly tag?: string;
  
  /** Caller cancellation */
  readonly signal?: AbortSignal;
  
  /** Overall deadline in ms, relative to the start of the call */
  readonly deadlineMs?: number;
  
  /** Policy override for this call */
  readonly policy?: RetryPolicy;
}

// ─────────────────────────────────────────────────────────────────────────────────
// ERRORS
// ─────────────────────────────────────────────────────────────────────────────────

export type ExhaustionReason = 'max_attempts' | 'deadline';

export interface ExhaustedDetails {
  /** Attempts made */
  readonly attempts: number;
  
  /** Cause of every failed attempt, oldest first */
  readonly causes: readonly Error[];
  
  /** Time spent in ms */
  readonly elapsedMs: number;
  
  readonly reason: ExhaustionReason;
}

/**
 * Error thrown when the retry budget runs out.
 */
export class ExhaustedError extends Error {
  readonly name = 'ExhaustedError';
  readonly attempts: number;
  readonly causes: readonly Error[];
  readonly elapsedMs: number;
  readonly reason: ExhaustionReason;
  
  constructor(details: ExhaustedDetails) {
    const last = details.causes[details.causes.length - 1];
    super(
      details.reason === 'deadline'
        ? `Deadline reached after ${details.attempts} attempts: ${last?.message ?? 'no attempt completed'}`
        : `Retry exhausted after ${details.attempts} attempts: ${last?.message ?? 'no attempt completed'}`,
      last ? { cause: last } : undefined
    );
    this.attempts = details.attempts;
    this.causes = details.causes;
    this.elapsedMs = details.elapsedMs;
    this.reason = details.reason;
  }
  
  /** Cause of the final attempt */
  get lastCause(): Error | undefined {
    return this.causes[this.causes.length - 1];
  }
}

/**
 * Error thrown when the caller cancels a call.
 */
export class RetryCancelledError extends Error {
  readonly name = 'RetryCancelledError';
  readonly attempts: number;
  
  constructor(attempts: number, reason: unknown) {
    super(`Call cancelled after ${attempts} attempts`, { cause: reason });
    this.attempts = attempts;
  }
}

/**
 * Error raised when a single attempt runs past its time limit.
 */
export class AttemptTimeoutError extends TimeoutFailureError {
  readonly name: string = 'AttemptTimeoutError';
  readonly attempt: number;
  readonly timeoutMs: number;
  
  constructor(attempt: number, timeoutMs: number) {
    super(`Attempt ${attempt} timed out after ${timeoutMs}ms`);
    this.attempt = attempt;
    this.timeoutMs = timeoutMs;
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// RESULT
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Why a call produced no value.
 */
export type RetryFailure =
  | { readonly kind: 'circuit_open'; readonly error: CircuitOpenError; readonly attempts: number }
  | { readonly kind: 'permanent'; readonly error: Error; readonly attempts: number }
  | { readonly kind: 'exhausted'; readonly error: ExhaustedError; readonly attempts: number }
  | { readonly kind: 'cancelled'; readonly error: RetryCancelledError; readonly attempts: number };

// ─────────────────────────────────────────────────────────────────────────────────
// STATISTICS
// ─────────────────────────────────────────────────────────────────────────────────

export interface RetryStats {
  /** Calls started through the wrapper */
  readonly callCount: number;
  
  /** Attempts executed (first attempts and retries) */
  readonly attemptCount: number;
  
  /** Attempts after the first */
  readonly retryCount: number;
  
  /** retryCount / callCount, rounded to 4 places */
  readonly retryRate: number;
  
  readonly successCount: number;
  readonly exhaustedCount: number;
  readonly permanentCount: number;
  
  /** Calls refused by the breaker */
  readonly rejectedCount: number;
  
  readonly cancelledCount: number;
  
  readonly circuitState: CircuitState;
  readonly circuitTrips: number;
}
