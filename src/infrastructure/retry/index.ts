// ═══════════════════════════════════════════════════════════════════════════════
// RETRY MODULE INDEX — Retry Wrapper Exports
// Broker Resilience — Infrastructure
// ═══════════════════════════════════════════════════════════════════════════════

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export {
  // Configuration
  type RetryPolicy,
  type RandomSource,
  type SleepFn,
  DEFAULT_RETRY_POLICY,
  
  // Operation
  type AttemptContext,
  type Operation,
  type ExecuteOptions,
  
  // Errors
  type ExhaustionReason,
  type ExhaustedDetails,
  ExhaustedError,
  RetryCancelledError,
  AttemptTimeoutError,
  
  // Result and statistics
  type RetryFailure,
  type RetryStats,
} from './types.js';

// ─────────────────────────────────────────────────────────────────────────────────
// BACKOFF
// ─────────────────────────────────────────────────────────────────────────────────

export {
  computeBackoff,
  applyJitter,
  backoffDelay,
  calculateMaxRetryTime,
  sleep,
  formatDelay,
  MAX_TIMER_MS,
} from './backoff.js';

// ─────────────────────────────────────────────────────────────────────────────────
// POLICY
// ─────────────────────────────────────────────────────────────────────────────────

export {
  RetryPolicySchema,
  type RetryPolicyInput,
  createRetryPolicy,
  
  // Presets
  type RetryPreset,
  RetryPresets,
  createPolicyFromPreset,
} from './policy.js';

// ─────────────────────────────────────────────────────────────────────────────────
// WRAPPER
// ─────────────────────────────────────────────────────────────────────────────────

export {
  type RetryWrapperOptions,
  RetryWrapper,
  withRetry,
} from './wrapper.js';
