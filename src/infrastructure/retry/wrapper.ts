// ═══════════════════════════════════════════════════════════════════════════════
// RETRY WRAPPER — Retry with Backoff through a Circuit Breaker
// Broker Resilience — Infrastructure
// ═══════════════════════════════════════════════════════════════════════════════
//
// Per attempt:
//   1. Ask the breaker for a permit; refusal fails the call with
//      CircuitOpenError (no retry, no backoff)
//   2. Run the operation under the attempt signal
//   3. Classify the result and record it with the breaker
//   4. Success returns; permanent (or non-retryable) failures surface;
//      transient/timeout failures back off and retry while budget and
//      deadline allow, then fail with ExhaustedError
//   5. A failure that trips the breaker ends the call with CircuitOpenError
//      chained to it, unless it was the last attempt anyway
//
// The breaker always sees the outcome before the retry decision is made,
// including the final attempt and cancelled attempts.
//
// ═══════════════════════════════════════════════════════════════════════════════

import {
  type RetryPolicy,
  type RandomSource,
  type SleepFn,
  type Operation,
  type ExecuteOptions,
  type RetryFailure,
  type RetryStats,
  type ExhaustionReason,
  DEFAULT_RETRY_POLICY,
  ExhaustedError,
  RetryCancelledError,
  AttemptTimeoutError,
} from './types.js';
import { backoffDelay, sleep as defaultSleep, formatDelay, MAX_TIMER_MS } from './backoff.js';
import {
  type CircuitBreaker,
  type Clock,
  CircuitOpenError,
} from '../circuit-breaker/index.js';
import {
  type Outcome,
  type FailureKind,
  type RetryableKind,
  type ClassifyOptions,
  success,
  timeout,
  classifyError,
  toError,
} from '../outcome/index.js';
import { type Result, type AsyncResult, ok, err } from '../../types/result.js';
import {
  type ILogger,
  getLogger,
  generateCorrelationId,
  runWithContext,
  runWithExtendedContext,
} from '../../observability/logging/index.js';

// ─────────────────────────────────────────────────────────────────────────────────
// OPTIONS
// ─────────────────────────────────────────────────────────────────────────────────

export interface RetryWrapperOptions {
  /** Breaker guarding the remote resource */
  readonly breaker: CircuitBreaker;

  /** Default policy for calls without an override */
  readonly policy?: RetryPolicy;

  /** Jitter source; defaults to Math.random */
  readonly random?: RandomSource;

  /** Backoff sleep; defaults to a timer-based sleep */
  readonly sleep?: SleepFn;

  /** Time source; defaults to Date.now */
  readonly clock?: Clock;

  /** How thrown values are classified */
  readonly classify?: ClassifyOptions;

  readonly logger?: ILogger;
}

function isRetryable(kind: FailureKind, retryable: readonly RetryableKind[]): boolean {
  return kind !== 'permanent' && retryable.includes(kind);
}

// ─────────────────────────────────────────────────────────────────────────────────
// RETRY WRAPPER
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Runs remote operations with retry, backoff and jitter, admitted by a
 * circuit breaker.
 */
export class RetryWrapper {
  private readonly breaker: CircuitBreaker;
  private readonly policy: RetryPolicy;
  private readonly random: RandomSource;
  private readonly sleep: SleepFn;
  private readonly clock: Clock;
  private readonly classifyOptions: ClassifyOptions;
  private readonly logger: ILogger;

  // Statistics
  private callCount = 0;
  private attemptCount = 0;
  private retryCount = 0;
  private successCount = 0;
  private exhaustedCount = 0;
  private permanentCount = 0;
  private rejectedCount = 0;
  private cancelledCount = 0;

  constructor(options: RetryWrapperOptions) {
    this.breaker = options.breaker;
    this.policy = options.policy ?? DEFAULT_RETRY_POLICY;
    this.random = options.random ?? Math.random;
    this.sleep = options.sleep ?? defaultSleep;
    this.clock = options.clock ?? Date.now;
    this.classifyOptions = options.classify ?? {};
    this.logger = options.logger ?? getLogger({ component: 'retry' });
  }

  getPolicy(): RetryPolicy {
    return this.policy;
  }

  getBreaker(): CircuitBreaker {
    return this.breaker;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Execution
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Execute with retry, throwing on failure.
   *
   * Throws CircuitOpenError, ExhaustedError, RetryCancelledError, or the
   * cause of a permanent failure as-is.
   */
  async execute<T>(operation: Operation<T>, options: ExecuteOptions = {}): Promise<T> {
    const result = await this.executeWithResult(operation, options);

    if (result.ok) {
      return result.value;
    }

    throw result.error.error;
  }

  /**
   * Execute with retry, returning a Result.
   */
  executeWithResult<T>(
    operation: Operation<T>,
    options: ExecuteOptions = {}
  ): AsyncResult<T, RetryFailure> {
    const tag = options.tag ?? generateCorrelationId();
    this.callCount++;

    return runWithContext(
      { correlationId: tag, resource: this.breaker.name },
      () => this.run(operation, tag, options)
    );
  }

  private async run<T>(
    operation: Operation<T>,
    tag: string,
    options: ExecuteOptions
  ): Promise<Result<T, RetryFailure>> {
    const policy = options.policy ?? this.policy;
    const startedAt = this.clock();
    const deadlineAt = options.deadlineMs !== undefined ? startedAt + options.deadlineMs : undefined;
    const causes: Error[] = [];
    let attempt = 0;

    while (true) {
      if (options.signal?.aborted) {
        return this.cancelled(attempt, options.signal.reason);
      }

      const permit = this.breaker.tryAcquire();
      if (!permit) {
        return this.circuitOpen(attempt, causes);
      }

      attempt++;
      this.attemptCount++;
      if (attempt > 1) this.retryCount++;

      const current = attempt;
      const outcome = await runWithExtendedContext(
        { attempt: current },
        () => this.runAttempt(operation, current, tag, policy, options.signal, deadlineAt)
      );

      this.breaker.record(outcome, permit);

      if (outcome.kind === 'success') {
        this.successCount++;
        this.logger.debug('Call succeeded', { attempt, retried: attempt > 1 });
        return ok(outcome.value);
      }

      causes.push(outcome.cause);

      if (options.signal?.aborted) {
        return this.cancelled(attempt, options.signal.reason);
      }

      if (!isRetryable(outcome.kind, policy.retryableOutcomes)) {
        this.permanentCount++;
        this.logger.warn('Non-retryable failure', {
          attempt,
          outcome: outcome.kind,
          error: outcome.cause.message,
        });
        return err<RetryFailure>({ kind: 'permanent', error: outcome.cause, attempts: attempt });
      }

      if (attempt >= policy.maxAttempts) {
        return this.exhausted('max_attempts', attempt, causes, startedAt);
      }

      // This attempt tripped the breaker: the next permit would be refused
      if (this.breaker.getState() === 'OPEN') {
        return this.circuitOpen(attempt, causes);
      }

      const delayMs = backoffDelay(attempt, policy, this.random);

      if (deadlineAt !== undefined && this.clock() + delayMs >= deadlineAt) {
        return this.exhausted('deadline', attempt, causes, startedAt);
      }

      this.logger.debug('Retrying', {
        attempt,
        maxAttempts: policy.maxAttempts,
        outcome: outcome.kind,
        error: outcome.cause.message,
        delay: formatDelay(delayMs),
      });

      try {
        await this.sleep(delayMs, options.signal);
      } catch (error) {
        if (options.signal?.aborted) {
          return this.cancelled(attempt, options.signal.reason);
        }
        throw error;
      }
    }
  }

  /**
   * Run one attempt, resolving to its classified outcome.
   *
   * Caller cancellation, the per-attempt timeout and the overall deadline
   * abort the attempt signal and resolve to a timeout outcome.
   */
  private runAttempt<T>(
    operation: Operation<T>,
    attempt: number,
    tag: string,
    policy: RetryPolicy,
    callerSignal: AbortSignal | undefined,
    deadlineAt: number | undefined
  ): Promise<Outcome<T>> {
    const controller = new AbortController();
    const timers: ReturnType<typeof setTimeout>[] = [];

    return new Promise<Outcome<T>>((resolve) => {
      let settled = false;

      const settle = (outcome: Outcome<T>, abortWith?: Error): void => {
        if (settled) return;
        settled = true;
        for (const timer of timers) clearTimeout(timer);
        callerSignal?.removeEventListener('abort', onCallerAbort);
        if (abortWith) controller.abort(abortWith);
        resolve(outcome);
      };

      const onCallerAbort = (): void => {
        const reason = toError(callerSignal?.reason ?? new Error('Aborted'));
        settle(timeout(reason), reason);
      };

      const expire = (timeoutMs: number): void => {
        const error = new AttemptTimeoutError(attempt, timeoutMs);
        settle(timeout(error), error);
      };

      if (callerSignal?.aborted) {
        onCallerAbort();
        return;
      }
      callerSignal?.addEventListener('abort', onCallerAbort, { once: true });

      if (policy.attemptTimeoutMs > 0) {
        timers.push(setTimeout(() => expire(policy.attemptTimeoutMs), policy.attemptTimeoutMs));
      }

      // A deadline past the timer range is only checked between attempts
      if (deadlineAt !== undefined) {
        const remainingMs = Math.max(0, deadlineAt - this.clock());
        if (remainingMs <= MAX_TIMER_MS) {
          timers.push(setTimeout(() => expire(remainingMs), remainingMs));
        }
      }

      // Untyped callers may hand back a plain value or throw synchronously
      const pending = new Promise<T>((resolveValue) => {
        resolveValue(operation({ attempt, signal: controller.signal, tag }));
      });

      void pending.then(
        value => settle(success(value)),
        (error: unknown) => settle(classifyError(error, this.classifyOptions))
      );
    });
  }

  /**
   * Fail the call with CircuitOpenError, chained to the last attempt
   * failure when there was one.
   */
  private circuitOpen<T>(attempts: number, causes: readonly Error[]): Result<T, RetryFailure> {
    this.rejectedCount++;
    const error = new CircuitOpenError(
      this.breaker.name,
      this.breaker.getState(),
      this.breaker.retryAfterMs(),
      causes[causes.length - 1]
    );

    this.logger.debug('Call refused by circuit breaker', {
      attempt: attempts + 1,
      state: error.state,
      retryAfterMs: error.retryAfterMs,
      error: error.cause instanceof Error ? error.cause.message : undefined,
    });

    return err<RetryFailure>({ kind: 'circuit_open', error, attempts });
  }

  private exhausted<T>(
    reason: ExhaustionReason,
    attempts: number,
    causes: Error[],
    startedAt: number
  ): Result<T, RetryFailure> {
    this.exhaustedCount++;
    const error = new ExhaustedError({
      attempts,
      causes: [...causes],
      elapsedMs: this.clock() - startedAt,
      reason,
    });

    this.logger.warn('Retry exhausted', {
      attempts,
      reason,
      elapsedMs: error.elapsedMs,
      error: error.lastCause?.message,
    });

    return err<RetryFailure>({ kind: 'exhausted', error, attempts });
  }

  private cancelled<T>(attempts: number, reason: unknown): Result<T, RetryFailure> {
    this.cancelledCount++;
    this.logger.info('Call cancelled by caller', { attempts });
    return err<RetryFailure>({ kind: 'cancelled', error: new RetryCancelledError(attempts, reason), attempts });
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Statistics
  // ─────────────────────────────────────────────────────────────────────────────

  getStats(): RetryStats {
    const snapshot = this.breaker.getSnapshot();

    return {
      callCount: this.callCount,
      attemptCount: this.attemptCount,
      retryCount: this.retryCount,
      retryRate: this.callCount === 0
        ? 0
        : Math.round((this.retryCount / this.callCount) * 10000) / 10000,
      successCount: this.successCount,
      exhaustedCount: this.exhaustedCount,
      permanentCount: this.permanentCount,
      rejectedCount: this.rejectedCount,
      cancelledCount: this.cancelledCount,
      circuitState: snapshot.state,
      circuitTrips: snapshot.tripCount,
    };
  }

  resetStats(): void {
    this.callCount = 0;
    this.attemptCount = 0;
    this.retryCount = 0;
    this.successCount = 0;
    this.exhaustedCount = 0;
    this.permanentCount = 0;
    this.rejectedCount = 0;
    this.cancelledCount = 0;
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// CONVENIENCE FUNCTIONS
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Create a retrying version of an async function.
 */
export function withRetry<TArgs extends unknown[], TResult>(
  fn: (...args: TArgs) => Promise<TResult>,
  wrapper: RetryWrapper,
  options?: Omit<ExecuteOptions, 'tag'>
): (...args: TArgs) => Promise<TResult> {
  return async (...args: TArgs): Promise<TResult> => {
    return wrapper.execute(() => fn(...args), options);
  };
}
