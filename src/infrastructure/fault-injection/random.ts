// ═══════════════════════════════════════════════════════════════════════════════
// RANDOM FAULT INJECTOR — Seeded Failure Profiles
// Broker Resilience — Infrastructure
// ═══════════════════════════════════════════════════════════════════════════════
//
// Each invocation draws two numbers from a seeded generator: one against
// failureRate, one to pick the failure kind by weight. Invocations inside
// the burst window [burstAt, burstAt + burstLength) always fail, modelling
// an outage. The same seed replays the same sequence.
//
// ═══════════════════════════════════════════════════════════════════════════════

import seedrandom from 'seedrandom';
import { BaseFaultInjector, type FaultDecision } from './base.js';
import {
  type RandomFaultSettings,
  type RandomFaultSettingsInput,
  RandomFaultSettingsSchema,
} from './config.js';
import { type FailureKind, FAILURE_KINDS } from '../outcome/index.js';
import { parseConfig } from '../../config/validation.js';
import { getLogger, type ILogger } from '../../observability/logging/index.js';

export interface RandomFaultOptions {
  readonly logger?: ILogger;
}

export class RandomFaultInjector<T = unknown> extends BaseFaultInjector<T> {
  private readonly settings: RandomFaultSettings;
  private rng: seedrandom.PRNG;
  
  constructor(settings: RandomFaultSettingsInput, options: RandomFaultOptions = {}) {
    const parsed = parseConfig(RandomFaultSettingsSchema, settings, 'random fault injection');
    super(parsed.timeoutDelayMs, options.logger ?? getLogger({ component: 'fault-injector' }));
    this.settings = parsed;
    this.rng = seedrandom(String(parsed.seed));
  }
  
  getSettings(): RandomFaultSettings {
    return this.settings;
  }
  
  /** Whether invocation `callNumber` falls inside the burst window */
  inBurst(callNumber: number): boolean {
    const { burstAt, burstLength } = this.settings;
    return burstAt !== undefined && callNumber >= burstAt && callNumber < burstAt + burstLength;
  }
  
  protected decide(callNumber: number): FaultDecision<T> {
    const roll = this.rng();
    const pick = this.rng();
    
    if (!this.inBurst(callNumber) && roll >= this.settings.failureRate) {
      return { kind: 'pass' };
    }
    
    const kind = this.pickKind(pick);
    switch (kind) {
      case 'timeout':
        return { kind };
      case 'transient':
        return { kind, statusCode: this.settings.statusCode };
      case 'permanent':
        return { kind, statusCode: this.settings.permanentStatusCode };
    }
  }
  
  /**
   * Map a uniform draw to a failure kind by weight.
   */
  private pickKind(draw: number): FailureKind {
    const weights = this.settings.kinds;
    const total = FAILURE_KINDS.reduce((sum, kind) => sum + weights[kind], 0);
    let threshold = draw * total;
    let chosen: FailureKind = 'transient';
    
    for (const kind of FAILURE_KINDS) {
      const weight = weights[kind];
      if (weight <= 0) continue;
      chosen = kind;
      if (threshold < weight) break;
      threshold -= weight;
    }
    
    return chosen;
  }
  
  protected rewind(): void {
    this.rng = seedrandom(String(this.settings.seed));
  }
}
