// ═══════════════════════════════════════════════════════════════════════════════
// RETRY POLICY — Validation and Presets
// Broker Resilience — Infrastructure
// ═══════════════════════════════════════════════════════════════════════════════
//
// Policies are validated once and frozen; a wrapper never sees a policy
// that has not passed the schema.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { z } from 'zod';
import { parseConfig } from '../../config/validation.js';
import { type RetryPolicy, DEFAULT_RETRY_POLICY } from './types.js';
import { MAX_TIMER_MS } from './backoff.js';

// ─────────────────────────────────────────────────────────────────────────────────
// SCHEMA
// ─────────────────────────────────────────────────────────────────────────────────

export const RetryPolicySchema = z
  .object({
    maxAttempts: z
      .number()
      .int()
      .min(1, 'maxAttempts must be at least 1')
      .default(DEFAULT_RETRY_POLICY.maxAttempts),
    baseBackoffMs: z
      .number()
      .min(0, 'baseBackoffMs cannot be negative')
      .default(DEFAULT_RETRY_POLICY.baseBackoffMs),
    multiplier: z
      .number()
      .min(1, 'multiplier must be at least 1')
      .default(DEFAULT_RETRY_POLICY.multiplier),
    maxBackoffMs: z
      .number()
      .min(0, 'maxBackoffMs cannot be negative')
      .max(MAX_TIMER_MS, `maxBackoffMs cannot exceed ${MAX_TIMER_MS}`)
      .default(DEFAULT_RETRY_POLICY.maxBackoffMs),
    jitterFraction: z
      .number()
      .min(0, 'jitterFraction must be between 0 and 1')
      .max(1, 'jitterFraction must be between 0 and 1')
      .default(DEFAULT_RETRY_POLICY.jitterFraction),
    retryableOutcomes: z
      .array(z.enum(['transient', 'timeout']))
      .default([...DEFAULT_RETRY_POLICY.retryableOutcomes]),
    attemptTimeoutMs: z
      .number()
      .int()
      .min(0, 'attemptTimeoutMs cannot be negative')
      .max(MAX_TIMER_MS, `attemptTimeoutMs cannot exceed ${MAX_TIMER_MS}`)
      .default(DEFAULT_RETRY_POLICY.attemptTimeoutMs),
  })
  .refine(p => p.maxBackoffMs >= p.baseBackoffMs, {
    message: 'maxBackoffMs must be at least baseBackoffMs',
    path: ['maxBackoffMs'],
  });

export type RetryPolicyInput = z.input<typeof RetryPolicySchema>;

/**
 * Validate and freeze a retry policy.
 */
export function createRetryPolicy(input: RetryPolicyInput = {}): RetryPolicy {
  const parsed = parseConfig(RetryPolicySchema, input, 'retry policy');
  return Object.freeze({
    ...parsed,
    retryableOutcomes: Object.freeze(Array.from(new Set(parsed.retryableOutcomes))),
  });
}

// ─────────────────────────────────────────────────────────────────────────────────
// PRESETS
// ─────────────────────────────────────────────────────────────────────────────────

export type RetryPreset = 'quick' | 'standard' | 'patient';

/**
 * Preset configurations for common use cases.
 */
export const RetryPresets: Record<RetryPreset, RetryPolicyInput> = {
  /** Quotes and other reads that go stale quickly */
  quick: {
    maxAttempts: 2,
    baseBackoffMs: 100,
    maxBackoffMs: 1000,
    attemptTimeoutMs: 2000,
  },
  
  /** Most account and order calls */
  standard: {
    maxAttempts: 3,
    baseBackoffMs: 500,
    maxBackoffMs: 10000,
    attemptTimeoutMs: 10000,
  },
  
  /** Reports, history downloads */
  patient: {
    maxAttempts: 5,
    baseBackoffMs: 2000,
    maxBackoffMs: 30000,
    attemptTimeoutMs: 30000,
  },
};

/**
 * Create a policy from a preset with overrides.
 */
export function createPolicyFromPreset(
  preset: RetryPreset,
  overrides: RetryPolicyInput = {}
): RetryPolicy {
  return createRetryPolicy({ ...RetryPresets[preset], ...overrides });
}
