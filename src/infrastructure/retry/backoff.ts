// ═══════════════════════════════════════════════════════════════════════════════
// BACKOFF — Exponential Backoff with Jitter
// Broker Resilience — Infrastructure
// ═══════════════════════════════════════════════════════════════════════════════
//
// delay(n)  = min(base * multiplier^(n-1), cap)
// jittered  = delay + U(-1, 1) * jitterFraction * delay, never below 0
//
// The random source is a parameter so tests can pin it.
//
// ═══════════════════════════════════════════════════════════════════════════════

import type { RetryPolicy, RandomSource } from './types.js';

/** Longest delay setTimeout honours; larger values fire after 1ms */
export const MAX_TIMER_MS = 2_147_483_647;

// ─────────────────────────────────────────────────────────────────────────────────
// BACKOFF CALCULATION
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Delay before the retry that follows attempt `attempt` (1-based), without jitter.
 */
export function computeBackoff(
  attempt: number,
  policy: Pick<RetryPolicy, 'baseBackoffMs' | 'multiplier' | 'maxBackoffMs'>
): number {
  const exponent = Math.max(0, attempt - 1);
  const delay = policy.baseBackoffMs * Math.pow(policy.multiplier, exponent);
  return Math.min(delay, policy.maxBackoffMs);
}

/**
 * Spread a delay uniformly within ± fraction * delay.
 */
export function applyJitter(delay: number, fraction: number, random: RandomSource): number {
  if (fraction <= 0 || delay <= 0) return delay;
  
  const offset = (random() * 2 - 1) * fraction * delay;
  return Math.max(0, delay + offset);
}

/**
 * Jittered delay for the retry that follows `attempt`.
 */
export function backoffDelay(
  attempt: number,
  policy: Pick<RetryPolicy, 'baseBackoffMs' | 'multiplier' | 'maxBackoffMs' | 'jitterFraction'>,
  random: RandomSource = Math.random
): number {
  return applyJitter(computeBackoff(attempt, policy), policy.jitterFraction, random);
}

/**
 * Sum of un-jittered delays for a whole call that exhausts its attempts.
 */
export function calculateMaxRetryTime(
  policy: Pick<RetryPolicy, 'maxAttempts' | 'baseBackoffMs' | 'multiplier' | 'maxBackoffMs'>
): number {
  let total = 0;
  for (let attempt = 1; attempt < policy.maxAttempts; attempt++) {
    total += computeBackoff(attempt, policy);
  }
  return total;
}

// ─────────────────────────────────────────────────────────────────────────────────
// UTILITY FUNCTIONS
// ─────────────────────────────────────────────────────────────────────────────────

function abortReason(signal: AbortSignal): Error {
  return signal.reason instanceof Error ? signal.reason : new Error('Aborted');
}

/**
 * Sleep with abort support.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortReason(signal));
      return;
    }
    
    const onAbort = () => {
      clearTimeout(timer);
      if (signal) reject(abortReason(signal));
    };
    
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, Math.min(ms, MAX_TIMER_MS));
    
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Format delay for logging.
 */
export function formatDelay(ms: number): string {
  if (ms < 1000) {
    return `${Math.round(ms)}ms`;
  } else if (ms < 60000) {
    return `${(ms / 1000).toFixed(1)}s`;
  } else {
    return `${(ms / 60000).toFixed(1)}m`;
  }
}
