// ═══════════════════════════════════════════════════════════════════════════════
// CIRCUIT BREAKER — Implementation
// Broker Resilience — Infrastructure
// ═══════════════════════════════════════════════════════════════════════════════
//
// Circuit breaker pattern implementation:
// - State machine: CLOSED → OPEN → HALF_OPEN → CLOSED
// - Consecutive or sliding-window failure counting
// - Single probe in HALF_OPEN, guarded by generation-stamped permits
// - Read-only snapshots for polling
//
// All transitions happen inside synchronous methods. Node runs them to
// completion on one thread, so allow() + transition is atomic with respect
// to every other caller sharing the breaker.
//
// ═══════════════════════════════════════════════════════════════════════════════

import {
  type CircuitState,
  type CircuitBreakerConfig,
  type CircuitSnapshot,
  type CircuitBreaker,
  type CircuitBreakerRegistry,
  type AttemptPermit,
  type Clock,
  type FailureWindow,
} from './types.js';
import { createCircuitBreakerConfig, type CircuitBreakerSettingsInput } from './config.js';
import type { Outcome } from '../outcome/index.js';
import { getLogger, type ILogger } from '../../observability/logging/index.js';

// ─────────────────────────────────────────────────────────────────────────────────
// FAILURE COUNTERS
// ─────────────────────────────────────────────────────────────────────────────────

interface FailureCounter {
  record(now: number): void;
  count(now: number): number;
  clear(): void;
}

/**
 * Plain counter, cleared only by success or transition.
 */
class ConsecutiveCounter implements FailureCounter {
  private failures = 0;
  
  record(): void {
    this.failures++;
  }
  
  count(): number {
    return this.failures;
  }
  
  clear(): void {
    this.failures = 0;
  }
}

/**
 * Sliding window for tracking failures within a time period.
 */
class SlidingWindow implements FailureCounter {
  private readonly timestamps: number[] = [];
  private readonly windowMs: number;
  
  constructor(windowMs: number) {
    this.windowMs = windowMs;
  }
  
  record(now: number): void {
    this.cleanup(now);
    this.timestamps.push(now);
  }
  
  count(now: number): number {
    this.cleanup(now);
    return this.timestamps.length;
  }
  
  clear(): void {
    this.timestamps.length = 0;
  }
  
  /**
   * Remove expired entries.
   */
  private cleanup(now: number): void {
    const cutoff = now - this.windowMs;
    let expired = 0;
    while (expired < this.timestamps.length && (this.timestamps[expired] ?? now) <= cutoff) {
      expired++;
    }
    if (expired > 0) {
      this.timestamps.splice(0, expired);
    }
  }
}

function createFailureCounter(window: FailureWindow): FailureCounter {
  switch (window.kind) {
    case 'consecutive':
      return new ConsecutiveCounter();
    case 'sliding':
      return new SlidingWindow(window.windowMs);
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// CIRCUIT BREAKER IMPLEMENTATION
// ─────────────────────────────────────────────────────────────────────────────────

export interface CircuitBreakerOptions {
  /** Time source; defaults to Date.now */
  readonly clock?: Clock;
  
  /** Logger; defaults to the 'circuit-breaker' component logger */
  readonly logger?: ILogger;
}

/**
 * Circuit breaker implementation.
 */
export class CircuitBreakerImpl implements CircuitBreaker {
  readonly name: string;
  
  private readonly config: CircuitBreakerConfig;
  private readonly clock: Clock;
  private readonly logger: ILogger;
  private readonly failures: FailureCounter;
  
  // State
  private state: CircuitState = 'CLOSED';
  private generation = 0;
  private lastStateChangeAt: number;
  private lastTripAt?: number;
  private tripCount = 0;
  
  // HALF_OPEN bookkeeping
  private successCount = 0;
  private probeInFlight = false;
  
  // Lifetime counters
  private allowedRequests = 0;
  private rejectedRequests = 0;
  private successfulRequests = 0;
  private failedRequests = 0;
  private timedOutRequests = 0;
  private staleRecords = 0;
  
  constructor(config: CircuitBreakerConfig, options: CircuitBreakerOptions = {}) {
    const { name, ...settings } = config;
    this.config = createCircuitBreakerConfig(name, settings);
    this.name = this.config.name;
    this.clock = options.clock ?? Date.now;
    this.logger = options.logger ?? getLogger({ component: 'circuit-breaker' });
    this.failures = createFailureCounter(this.config.failureWindow);
    this.lastStateChangeAt = this.clock();
    
    this.logger.debug('Circuit breaker created', {
      circuit: this.name,
      failureThreshold: this.config.failureThreshold,
      openDurationMs: this.config.openDurationMs,
      closeThreshold: this.config.closeThreshold,
      failureWindow: this.config.failureWindow.kind,
    });
  }
  
  // ─────────────────────────────────────────────────────────────────────────────
  // State
  // ─────────────────────────────────────────────────────────────────────────────
  
  getState(): CircuitState {
    return this.state;
  }
  
  getConfig(): CircuitBreakerConfig {
    return this.config;
  }
  
  retryAfterMs(): number {
    if (this.state !== 'OPEN' || this.lastTripAt === undefined) return 0;
    const elapsed = this.clock() - this.lastTripAt;
    return Math.max(0, this.config.openDurationMs - elapsed);
  }
  
  private transitionTo(newState: CircuitState, reason: string): void {
    const oldState = this.state;
    if (oldState === newState) return;
    
    const now = this.clock();
    this.state = newState;
    this.generation++;
    this.lastStateChangeAt = now;
    this.successCount = 0;
    this.probeInFlight = false;
    
    if (newState === 'OPEN') {
      this.lastTripAt = now;
      this.tripCount++;
    } else if (newState === 'CLOSED') {
      this.failures.clear();
    }
    
    const context = {
      circuit: this.name,
      from: oldState,
      to: newState,
      reason,
      generation: this.generation,
      tripCount: this.tripCount,
    };
    
    if (newState === 'OPEN') {
      this.logger.warn('Circuit tripped', context);
    } else {
      this.logger.info('Circuit state changed', context);
    }
  }
  
  // ─────────────────────────────────────────────────────────────────────────────
  // Admission
  // ─────────────────────────────────────────────────────────────────────────────
  
  allow(): boolean {
    return this.tryAcquire() !== null;
  }
  
  tryAcquire(): AttemptPermit | null {
    switch (this.state) {
      case 'CLOSED':
        return this.grant();
        
      case 'OPEN':
        if (this.retryAfterMs() > 0) {
          return this.reject();
        }
        // First caller after the cooldown becomes the probe
        this.transitionTo('HALF_OPEN', 'Open duration elapsed');
        this.probeInFlight = true;
        return this.grant();
        
      case 'HALF_OPEN':
        if (this.probeInFlight) {
          return this.reject();
        }
        this.probeInFlight = true;
        return this.grant();
    }
  }
  
  private grant(): AttemptPermit {
    this.allowedRequests++;
    return { circuitName: this.name, generation: this.generation };
  }
  
  private reject(): null {
    this.rejectedRequests++;
    return null;
  }
  
  // ─────────────────────────────────────────────────────────────────────────────
  // Recording
  // ─────────────────────────────────────────────────────────────────────────────
  
  record(outcome: Outcome, permit?: AttemptPermit): void {
    this.countLifetime(outcome);
    
    if (permit && (permit.circuitName !== this.name || permit.generation !== this.generation)) {
      this.staleRecords++;
      this.logger.debug('Ignoring outcome from earlier generation', {
        circuit: this.name,
        outcome: outcome.kind,
        permitGeneration: permit.generation,
        generation: this.generation,
      });
      return;
    }
    
    switch (this.state) {
      case 'CLOSED':
        this.recordClosed(outcome);
        return;
        
      case 'HALF_OPEN':
        this.recordHalfOpen(outcome);
        return;
        
      case 'OPEN':
        // Nothing should reach execution while OPEN; ignore stragglers
        return;
    }
  }
  
  private recordClosed(outcome: Outcome): void {
    const now = this.clock();
    
    if (outcome.kind === 'success') {
      this.failures.clear();
      return;
    }
    
    this.failures.record(now);
    const failureCount = this.failures.count(now);
    
    if (failureCount >= this.config.failureThreshold) {
      this.transitionTo(
        'OPEN',
        `Failure threshold reached (${failureCount}/${this.config.failureThreshold})`
      );
    }
  }
  
  private recordHalfOpen(outcome: Outcome): void {
    this.probeInFlight = false;
    
    if (outcome.kind !== 'success') {
      this.transitionTo('OPEN', `Probe failed (${outcome.kind})`);
      return;
    }
    
    this.successCount++;
    if (this.successCount >= this.config.closeThreshold) {
      this.transitionTo(
        'CLOSED',
        `Close threshold reached (${this.successCount}/${this.config.closeThreshold})`
      );
    }
  }
  
  private countLifetime(outcome: Outcome): void {
    switch (outcome.kind) {
      case 'success':
        this.successfulRequests++;
        break;
      case 'timeout':
        this.timedOutRequests++;
        this.failedRequests++;
        break;
      case 'transient':
      case 'permanent':
        this.failedRequests++;
        break;
    }
  }
  
  // ─────────────────────────────────────────────────────────────────────────────
  // Control
  // ─────────────────────────────────────────────────────────────────────────────
  
  reset(): void {
    this.state = 'CLOSED';
    this.generation++;
    this.lastStateChangeAt = this.clock();
    this.lastTripAt = undefined;
    this.tripCount = 0;
    this.successCount = 0;
    this.probeInFlight = false;
    this.failures.clear();
    
    this.allowedRequests = 0;
    this.rejectedRequests = 0;
    this.successfulRequests = 0;
    this.failedRequests = 0;
    this.timedOutRequests = 0;
    this.staleRecords = 0;
    
    this.logger.info('Circuit breaker reset', { circuit: this.name });
  }
  
  // ─────────────────────────────────────────────────────────────────────────────
  // Snapshot
  // ─────────────────────────────────────────────────────────────────────────────
  
  getSnapshot(): CircuitSnapshot {
    const now = this.clock();
    
    return {
      name: this.name,
      state: this.state,
      failureCount: this.state === 'CLOSED' ? this.failures.count(now) : 0,
      successCount: this.successCount,
      probeInFlight: this.probeInFlight,
      lastTripAt: this.lastTripAt,
      tripCount: this.tripCount,
      generation: this.generation,
      lastStateChangeAt: this.lastStateChangeAt,
      timeInStateMs: now - this.lastStateChangeAt,
      retryAfterMs: this.retryAfterMs(),
      allowedRequests: this.allowedRequests,
      rejectedRequests: this.rejectedRequests,
      successfulRequests: this.successfulRequests,
      failedRequests: this.failedRequests,
      timedOutRequests: this.timedOutRequests,
      staleRecords: this.staleRecords,
    };
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// FACTORY
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Create a breaker for one protected resource.
 */
export function createCircuitBreaker(
  name: string,
  settings: CircuitBreakerSettingsInput = {},
  options: CircuitBreakerOptions = {}
): CircuitBreaker {
  return new CircuitBreakerImpl(createCircuitBreakerConfig(name, settings), options);
}

// ─────────────────────────────────────────────────────────────────────────────────
// REGISTRY
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * One breaker per protected resource, created on first use.
 */
export class CircuitBreakerRegistryImpl implements CircuitBreakerRegistry {
  private readonly breakers = new Map<string, CircuitBreaker>();
  private readonly settings = new Map<string, CircuitBreakerSettingsInput>();
  private readonly defaults: CircuitBreakerSettingsInput;
  private readonly options: CircuitBreakerOptions;
  private readonly logger = getLogger({ component: 'circuit-registry' });
  
  constructor(defaults: CircuitBreakerSettingsInput = {}, options: CircuitBreakerOptions = {}) {
    this.defaults = defaults;
    this.options = options;
  }
  
  /**
   * Register settings for a resource before its breaker is first used.
   */
  configure(name: string, settings: CircuitBreakerSettingsInput): void {
    if (this.breakers.has(name)) {
      this.logger.warn('Breaker already created; new settings ignored until removal', { circuit: name });
    }
    this.settings.set(name, settings);
  }
  
  get(name: string): CircuitBreaker {
    let breaker = this.breakers.get(name);
    
    if (!breaker) {
      breaker = createCircuitBreaker(
        name,
        { ...this.defaults, ...this.settings.get(name) },
        this.options
      );
      this.breakers.set(name, breaker);
      this.logger.debug('Circuit breaker registered', { circuit: name });
    }
    
    return breaker;
  }
  
  find(name: string): CircuitBreaker | undefined {
    return this.breakers.get(name);
  }
  
  getAll(): CircuitBreaker[] {
    return Array.from(this.breakers.values());
  }
  
  getAllSnapshots(): CircuitSnapshot[] {
    return this.getAll().map(b => b.getSnapshot());
  }
  
  resetAll(): void {
    for (const breaker of this.breakers.values()) {
      breaker.reset();
    }
  }
  
  remove(name: string): boolean {
    this.settings.delete(name);
    return this.breakers.delete(name);
  }
  
  clear(): void {
    this.breakers.clear();
    this.settings.clear();
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// SINGLETON REGISTRY
// ─────────────────────────────────────────────────────────────────────────────────

let registry: CircuitBreakerRegistryImpl | null = null;

/**
 * Get the process-wide circuit breaker registry.
 */
export function getCircuitBreakerRegistry(): CircuitBreakerRegistryImpl {
  if (!registry) {
    registry = new CircuitBreakerRegistryImpl();
  }
  return registry;
}

/**
 * Get or create a circuit breaker from the process-wide registry.
 */
export function getCircuitBreaker(name: string): CircuitBreaker {
  return getCircuitBreakerRegistry().get(name);
}

/**
 * Drop the process-wide registry (for testing).
 */
export function resetCircuitBreakerRegistry(): void {
  registry = null;
}
