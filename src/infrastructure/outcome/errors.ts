// ═══════════════════════════════════════════════════════════════════════════════
// CLASSIFIED ERRORS — What the Normalization Layer Throws
// Broker Resilience — Infrastructure
// ═══════════════════════════════════════════════════════════════════════════════
//
// The broker normalization layer translates vendor errors into one of these
// classes before they reach the resilience core. The core reads `kind`; it
// never inspects vendor payloads.
//
// ═══════════════════════════════════════════════════════════════════════════════

import type { FailureKind } from './types.js';

export interface ClassifiedErrorOptions {
  /** HTTP status reported by the remote API, if any */
  readonly statusCode?: number;
  
  /** Underlying error */
  readonly cause?: unknown;
}

/**
 * Base class for failures that already carry their classification.
 */
export abstract class ClassifiedError extends Error {
  abstract readonly kind: FailureKind;
  readonly statusCode?: number;
  
  constructor(message: string, options: ClassifiedErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.statusCode = options.statusCode;
  }
}

/**
 * Retryable failure: network blip, rate limit, upstream 5xx.
 */
export class TransientFailureError extends ClassifiedError {
  readonly name: string = 'TransientFailureError';
  readonly kind = 'transient' as const;
}

/**
 * Non-retryable failure: validation, authentication, rejected order.
 */
export class PermanentFailureError extends ClassifiedError {
  readonly name: string = 'PermanentFailureError';
  readonly kind = 'permanent' as const;
}

/**
 * The remote call did not answer in time.
 */
export class TimeoutFailureError extends ClassifiedError {
  readonly name: string = 'TimeoutFailureError';
  readonly kind = 'timeout' as const;
}

export function isClassifiedError(error: unknown): error is ClassifiedError {
  return error instanceof ClassifiedError;
}
