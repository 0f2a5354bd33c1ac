// ═══════════════════════════════════════════════════════════════════════════════
// OUTCOME MODULE INDEX
// Broker Resilience — Infrastructure
// ═══════════════════════════════════════════════════════════════════════════════

export {
  type OutcomeKind,
  type FailureKind,
  type RetryableKind,
  type SuccessOutcome,
  type TransientOutcome,
  type PermanentOutcome,
  type TimeoutOutcome,
  type FailureOutcome,
  type Outcome,
  FAILURE_KINDS,
  success,
  transientFailure,
  permanentFailure,
  timeout,
  failure,
  isFailure,
} from './types.js';

export {
  type ClassifiedErrorOptions,
  ClassifiedError,
  TransientFailureError,
  PermanentFailureError,
  TimeoutFailureError,
  isClassifiedError,
} from './errors.js';

export {
  type ClassifyOptions,
  DEFAULT_RETRYABLE_STATUS_CODES,
  extractStatusCode,
  classifyStatusCode,
  toError,
  classifyErrorKind,
  classifyError,
} from './classify.js';
