// ═══════════════════════════════════════════════════════════════════════════════
// LOGGING CONTEXT — Correlation Propagation via AsyncLocalStorage
// Broker Resilience — Observability
// ═══════════════════════════════════════════════════════════════════════════════
//
// Every call through the retry wrapper runs inside a context carrying its
// correlation tag. Anything that logs while the call is in flight (breaker,
// fault injector, the wrapper itself) picks the tag up automatically.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { AsyncLocalStorage } from 'node:async_hooks';
import { v4 as uuidv4 } from 'uuid';

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Context attached to every log line emitted inside a tracked call.
 */
export interface LoggingContext {
  /** Correlation tag of the remote operation */
  readonly correlationId: string;
  
  /** Attempt currently running (1-based) */
  readonly attempt?: number;
  
  /** Protected resource (circuit breaker name) */
  readonly resource?: string;
}

// ─────────────────────────────────────────────────────────────────────────────────
// STORAGE
// ─────────────────────────────────────────────────────────────────────────────────

const storage = new AsyncLocalStorage<LoggingContext>();

/**
 * Run a function inside a logging context.
 */
export function runWithContext<T>(context: LoggingContext, fn: () => T): T {
  return storage.run(context, fn);
}

/**
 * Run a function with extra fields merged onto the current context.
 * Outside any context this starts a new one with a generated correlation ID.
 */
export function runWithExtendedContext<T>(
  extra: Partial<LoggingContext>,
  fn: () => T
): T {
  const current = storage.getStore();
  const next: LoggingContext = {
    correlationId: extra.correlationId ?? current?.correlationId ?? generateCorrelationId(),
    attempt: extra.attempt ?? current?.attempt,
    resource: extra.resource ?? current?.resource,
  };
  return storage.run(next, fn);
}

/**
 * Get the active logging context, if any.
 */
export function getLoggingContext(): LoggingContext | undefined {
  return storage.getStore();
}

/**
 * Get the active correlation ID, if any.
 */
export function getCorrelationId(): string | undefined {
  return storage.getStore()?.correlationId;
}

/**
 * Generate a new correlation ID.
 */
export function generateCorrelationId(): string {
  return uuidv4();
}
