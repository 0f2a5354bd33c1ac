// ═══════════════════════════════════════════════════════════════════════════════
// SCRIPTED FAULT INJECTOR — Deterministic Replay
// Broker Resilience — Infrastructure
// ═══════════════════════════════════════════════════════════════════════════════
//
// Consumes one script entry per invocation. Once the script is used up,
// every further invocation passes through to the real operation.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { BaseFaultInjector, type FaultDecision } from './base.js';
import type { ScriptEntry } from './types.js';
import {
  DEFAULT_TIMEOUT_DELAY_MS,
  DEFAULT_TRANSIENT_STATUS_CODE,
  DEFAULT_PERMANENT_STATUS_CODE,
} from './config.js';
import { getLogger, type ILogger } from '../../observability/logging/index.js';

export interface ScriptedFaultOptions {
  /** Delay before an injected timeout fails */
  readonly timeoutDelayMs?: number;
  
  /** Status code carried by injected transient failures */
  readonly statusCode?: number;
  
  /** Status code carried by injected permanent failures */
  readonly permanentStatusCode?: number;
  
  readonly logger?: ILogger;
}

export class ScriptedFaultInjector<T = unknown> extends BaseFaultInjector<T> {
  private readonly script: readonly ScriptEntry<T>[];
  private readonly statusCode: number;
  private readonly permanentStatusCode: number;
  private position = 0;
  
  constructor(script: readonly ScriptEntry<T>[], options: ScriptedFaultOptions = {}) {
    super(
      options.timeoutDelayMs ?? DEFAULT_TIMEOUT_DELAY_MS,
      options.logger ?? getLogger({ component: 'fault-injector' })
    );
    this.script = [...script];
    this.statusCode = options.statusCode ?? DEFAULT_TRANSIENT_STATUS_CODE;
    this.permanentStatusCode = options.permanentStatusCode ?? DEFAULT_PERMANENT_STATUS_CODE;
  }
  
  /** Script entries not yet consumed */
  remaining(): number {
    return Math.max(0, this.script.length - this.position);
  }
  
  protected decide(): FaultDecision<T> {
    const entry = this.script[this.position];
    if (entry === undefined) {
      return { kind: 'pass' };
    }
    this.position++;
    
    if (typeof entry !== 'string') {
      return entry;
    }
    
    switch (entry) {
      case 'pass':
        return { kind: 'pass' };
      case 'timeout':
        return { kind: 'timeout' };
      case 'transient':
        return { kind: 'transient', statusCode: this.statusCode };
      case 'permanent':
        return { kind: 'permanent', statusCode: this.permanentStatusCode };
    }
  }
  
  protected rewind(): void {
    this.position = 0;
  }
}
