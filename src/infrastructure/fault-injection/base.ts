// ═══════════════════════════════════════════════════════════════════════════════
// FAULT INJECTOR BASE — Decision Application and Counters
// Broker Resilience — Infrastructure
// ═══════════════════════════════════════════════════════════════════════════════

import type { FaultInjector, FaultInjectorStats, InjectedKind } from './types.js';
import {
  type FailureKind,
  TransientFailureError,
  PermanentFailureError,
  TimeoutFailureError,
} from '../outcome/index.js';
import { type Operation, sleep } from '../retry/index.js';
import type { ILogger } from '../../observability/logging/index.js';

/**
 * What one invocation will do.
 */
export type FaultDecision<T> =
  | { readonly kind: 'pass' }
  | { readonly kind: 'success'; readonly value: T }
  | { readonly kind: FailureKind; readonly statusCode?: number };

function emptyCounts(): Record<InjectedKind, number> {
  return { success: 0, transient: 0, permanent: 0, timeout: 0 };
}

/**
 * Shared wrapping logic; subclasses only decide.
 */
export abstract class BaseFaultInjector<T> implements FaultInjector<T> {
  protected readonly logger: ILogger;
  private readonly timeoutDelayMs: number;
  
  private calls = 0;
  private passThroughs = 0;
  private injected = emptyCounts();
  
  constructor(timeoutDelayMs: number, logger: ILogger) {
    this.timeoutDelayMs = timeoutDelayMs;
    this.logger = logger;
  }
  
  /** Decide invocation `callNumber` (1-based) */
  protected abstract decide(callNumber: number): FaultDecision<T>;
  
  /** Return the decision source to its initial position */
  protected abstract rewind(): void;
  
  wrap(operation: Operation<T>): Operation<T> {
    return async (context) => {
      const callNumber = ++this.calls;
      const decision = this.decide(callNumber);
      
      if (decision.kind === 'pass') {
        this.passThroughs++;
        return operation(context);
      }
      
      this.injected[decision.kind]++;
      this.logger.debug('Injecting fault', {
        call: callNumber,
        kind: decision.kind,
        attempt: context.attempt,
      });
      
      switch (decision.kind) {
        case 'success':
          return decision.value;
          
        case 'timeout':
          await sleep(this.timeoutDelayMs, context.signal);
          throw new TimeoutFailureError(`Injected timeout (call #${callNumber})`);
          
        case 'transient':
          throw new TransientFailureError(`Injected transient fault (call #${callNumber})`, {
            statusCode: decision.statusCode,
          });
          
        case 'permanent':
          throw new PermanentFailureError(`Injected permanent fault (call #${callNumber})`, {
            statusCode: decision.statusCode,
          });
      }
    };
  }
  
  getStats(): FaultInjectorStats {
    return {
      calls: this.calls,
      passThroughs: this.passThroughs,
      injected: { ...this.injected },
    };
  }
  
  reset(): void {
    this.calls = 0;
    this.passThroughs = 0;
    this.injected = emptyCounts();
    this.rewind();
  }
}
