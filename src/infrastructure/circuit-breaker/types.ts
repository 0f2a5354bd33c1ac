// ═══════════════════════════════════════════════════════════════════════════════
// CIRCUIT BREAKER TYPES — States, Configuration, Permits, Snapshots
// Broker Resilience — Infrastructure
// ═══════════════════════════════════════════════════════════════════════════════
//
// Three-state machine guarding one remote resource:
//   CLOSED    → requests flow; failures are counted
//   OPEN      → requests are refused until the open duration elapses
//   HALF_OPEN → a single probe at a time tests recovery
//
// ═══════════════════════════════════════════════════════════════════════════════

import type { Outcome } from '../outcome/index.js';

// ─────────────────────────────────────────────────────────────────────────────────
// STATES
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Circuit breaker states.
 * 
 * CLOSED: Normal operation, requests pass through
 * OPEN: Failing fast, requests are rejected immediately
 * HALF_OPEN: Testing recovery, one probe in flight at a time
 */
export type CircuitState = 'CLOSED' | 'OPEN' | 'HALF_OPEN';

// ─────────────────────────────────────────────────────────────────────────────────
// CONFIGURATION
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * How failures are counted while CLOSED.
 * 
 * consecutive: plain counter, cleared by any success
 * sliding: failures older than windowMs expire; a success still clears
 */
export type FailureWindow =
  | { readonly kind: 'consecutive' }
  | { readonly kind: 'sliding'; readonly windowMs: number };

/**
 * Circuit breaker configuration.
 */
export interface CircuitBreakerConfig {
  /** Protected resource this breaker guards */
  readonly name: string;
  
  /** Failures (within the window) that trip CLOSED → OPEN */
  readonly failureThreshold: number;
  
  /** Time in ms to stay OPEN before a probe is allowed */
  readonly openDurationMs: number;
  
  /** Probe successes in HALF_OPEN required to close */
  readonly closeThreshold: number;
  
  /** Failure counting window */
  readonly failureWindow: FailureWindow;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CIRCUIT_CONFIG: Omit<CircuitBreakerConfig, 'name'> = {
  failureThreshold: 3,
  openDurationMs: 60000,        // 1 minute
  closeThreshold: 1,
  failureWindow: { kind: 'consecutive' },
};

/**
 * Monotonic-enough millisecond clock.
 */
export type Clock = () => number;

// ─────────────────────────────────────────────────────────────────────────────────
// PERMITS
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Proof that an attempt was admitted.
 * 
 * A permit is tied to the breaker generation that issued it. Outcomes
 * recorded with a permit from an older generation update lifetime counters
 * only; they cannot trip, close or free the probe slot.
 */
export interface AttemptPermit {
  /** Breaker that issued the permit */
  readonly circuitName: string;
  
  /** Generation at issue time (bumped on every transition) */
  readonly generation: number;
}

// ─────────────────────────────────────────────────────────────────────────────────
// SNAPSHOT
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Read-only view of a breaker, for dashboards and metric collectors.
 */
export interface CircuitSnapshot {
  readonly name: string;
  readonly state: CircuitState;
  
  /** Failures currently counted toward the trip threshold */
  readonly failureCount: number;
  
  /** Probe successes counted toward the close threshold */
  readonly successCount: number;
  
  /** Whether a HALF_OPEN probe is in flight */
  readonly probeInFlight: boolean;
  
  /** Clock reading of the most recent trip */
  readonly lastTripAt?: number;
  
  /** Number of CLOSED/HALF_OPEN → OPEN transitions */
  readonly tripCount: number;
  
  /** Transition counter */
  readonly generation: number;
  
  readonly lastStateChangeAt: number;
  readonly timeInStateMs: number;
  
  /** Remaining cooldown while OPEN, 0 otherwise */
  readonly retryAfterMs: number;
  
  // Lifetime counters
  readonly allowedRequests: number;
  readonly rejectedRequests: number;
  readonly successfulRequests: number;
  readonly failedRequests: number;
  readonly timedOutRequests: number;
  readonly staleRecords: number;
}

// ─────────────────────────────────────────────────────────────────────────────────
// ERRORS
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Refusal signal: the resource is considered down and no further attempt
 * was made.
 */
export class CircuitOpenError extends Error {
  readonly name = 'CircuitOpenError';
  readonly circuitName: string;
  readonly state: CircuitState;
  readonly retryAfterMs: number;
  
  /**
   * @param cause - Last attempt failure when the breaker tripped partway
   *   through a retried call
   */
  constructor(circuitName: string, state: CircuitState, retryAfterMs: number, cause?: Error) {
    super(
      state === 'HALF_OPEN'
        ? `Circuit breaker '${circuitName}' is half-open with a probe in flight`
        : `Circuit breaker '${circuitName}' is open. Retry after ${retryAfterMs}ms`,
      cause ? { cause } : undefined
    );
    this.circuitName = circuitName;
    this.state = state;
    this.retryAfterMs = retryAfterMs;
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// INTERFACES
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Circuit breaker interface.
 */
export interface CircuitBreaker {
  /** Protected resource name */
  readonly name: string;
  
  /** Whether a new attempt may proceed (may move OPEN → HALF_OPEN) */
  allow(): boolean;
  
  /** Admit an attempt and return its permit, or null when refused */
  tryAcquire(): AttemptPermit | null;
  
  /** Report the outcome of an admitted attempt */
  record(outcome: Outcome, permit?: AttemptPermit): void;
  
  /** Current state (read-only, never transitions) */
  getState(): CircuitState;
  
  /** Counters and timestamps (read-only) */
  getSnapshot(): CircuitSnapshot;
  
  /** Remaining cooldown while OPEN, 0 otherwise */
  retryAfterMs(): number;
  
  /** Configuration in effect */
  getConfig(): CircuitBreakerConfig;
  
  /** Return to CLOSED and clear all counters */
  reset(): void;
}

/**
 * Circuit breaker registry interface.
 */
export interface CircuitBreakerRegistry {
  /** Get or create the breaker for a resource */
  get(name: string): CircuitBreaker;
  
  /** Get a circuit breaker if it exists */
  find(name: string): CircuitBreaker | undefined;
  
  /** Get all circuit breakers */
  getAll(): CircuitBreaker[];
  
  /** Get snapshots for all breakers */
  getAllSnapshots(): CircuitSnapshot[];
  
  /** Reset all circuit breakers */
  resetAll(): void;
  
  /** Remove a circuit breaker */
  remove(name: string): boolean;
  
  /** Remove every circuit breaker */
  clear(): void;
}
