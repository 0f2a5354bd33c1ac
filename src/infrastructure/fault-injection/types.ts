// ═══════════════════════════════════════════════════════════════════════════════
// FAULT INJECTION TYPES — Scripts, Injectors, Statistics
// Broker Resilience — Infrastructure
// ═══════════════════════════════════════════════════════════════════════════════
//
// A fault injector wraps an operation and decides, per invocation, whether
// the real call runs or a substituted outcome is returned. It only changes
// what the wrapped operation appears to do; breaker and retry state are
// never touched.
//
// ═══════════════════════════════════════════════════════════════════════════════

import type { FailureKind } from '../outcome/index.js';
import type { Operation } from '../retry/index.js';

// ─────────────────────────────────────────────────────────────────────────────────
// SCRIPT
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * One scripted invocation.
 * 
 * pass: run the real operation
 * transient | permanent | timeout: fail with that kind
 * { kind: 'success', value }: return the value without calling through
 */
export type ScriptEntry<T = unknown> =
  | 'pass'
  | FailureKind
  | { readonly kind: 'success'; readonly value: T };

/**
 * Kinds an injector can substitute.
 */
export type InjectedKind = FailureKind | 'success';

// ─────────────────────────────────────────────────────────────────────────────────
// STATISTICS
// ─────────────────────────────────────────────────────────────────────────────────

export interface FaultInjectorStats {
  /** Invocations seen */
  readonly calls: number;
  
  /** Invocations that ran the real operation */
  readonly passThroughs: number;
  
  /** Substituted outcomes per kind */
  readonly injected: Readonly<Record<InjectedKind, number>>;
}

// ─────────────────────────────────────────────────────────────────────────────────
// INTERFACE
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Fault injector interface.
 */
export interface FaultInjector<T = unknown> {
  /** Wrap an operation so each invocation consults the injector */
  wrap(operation: Operation<T>): Operation<T>;
  
  /** Invocation counters */
  getStats(): FaultInjectorStats;
  
  /** Rewind to the first invocation (replays the same sequence) */
  reset(): void;
}
