// ═══════════════════════════════════════════════════════════════════════════════
// CIRCUIT BREAKER TESTS — State Machine, Probes, Permits, Registry
// Broker Resilience — Infrastructure
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect, beforeEach } from 'vitest';
import {
  CircuitBreakerImpl,
  CircuitBreakerRegistryImpl,
  CircuitOpenError,
  createCircuitBreaker,
  createCircuitBreakerConfig,
  createFromPreset,
  getCircuitBreaker,
  getCircuitBreakerRegistry,
  resetCircuitBreakerRegistry,
  type CircuitBreaker,
} from '../index.js';
import { success, transientFailure, permanentFailure, timeout } from '../../outcome/index.js';
import { ConfigValidationError } from '../../../config/validation.js';

// ─────────────────────────────────────────────────────────────────────────────────
// TEST FIXTURES
// ─────────────────────────────────────────────────────────────────────────────────

function createManualClock(start = 1_000_000) {
  let now = start;
  return {
    now: () => now,
    advance: (ms: number) => {
      now += ms;
    },
  };
}

const fail = () => transientFailure(new Error('upstream 503'));
const ok = () => success('filled');

function trip(breaker: CircuitBreaker, times: number): void {
  for (let i = 0; i < times; i++) {
    expect(breaker.allow()).toBe(true);
    breaker.record(fail());
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// CONFIGURATION
// ─────────────────────────────────────────────────────────────────────────────────

describe('Circuit breaker configuration', () => {
  it('should apply defaults', () => {
    const config = createCircuitBreakerConfig('quotes');
    expect(config).toEqual({
      name: 'quotes',
      failureThreshold: 3,
      openDurationMs: 60000,
      closeThreshold: 1,
      failureWindow: { kind: 'consecutive' },
    });
    expect(Object.isFrozen(config)).toBe(true);
  });

  it('should reject invalid thresholds with every issue listed', () => {
    expect(() => createCircuitBreakerConfig('orders', { failureThreshold: 0, closeThreshold: 0 }))
      .toThrow(ConfigValidationError);

    try {
      createCircuitBreakerConfig('orders', { failureThreshold: 0, closeThreshold: 0 });
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigValidationError);
      if (error instanceof ConfigValidationError) {
        expect(error.issues).toEqual([
          'failureThreshold: failureThreshold must be at least 1',
          'closeThreshold: closeThreshold must be at least 1',
        ]);
      }
    }
  });

  it('should reject an empty name', () => {
    expect(() => createCircuitBreakerConfig('  ')).toThrow(ConfigValidationError);
  });

  it('should build from presets with overrides', () => {
    const config = createFromPreset('orders', 'critical', { openDurationMs: 5000 });
    expect(config.failureThreshold).toBe(2);
    expect(config.closeThreshold).toBe(3);
    expect(config.openDurationMs).toBe(5000);
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// CLOSED → OPEN
// ─────────────────────────────────────────────────────────────────────────────────

describe('CircuitBreakerImpl', () => {
  let clock: ReturnType<typeof createManualClock>;
  let breaker: CircuitBreaker;

  beforeEach(() => {
    clock = createManualClock();
    breaker = createCircuitBreaker(
      'orders',
      { failureThreshold: 3, openDurationMs: 5000, closeThreshold: 2 },
      { clock: clock.now }
    );
  });

  describe('closed state', () => {
    it('should start closed and allow calls', () => {
      expect(breaker.getState()).toBe('CLOSED');
      expect(breaker.allow()).toBe(true);
    });

    it('should trip after threshold consecutive failures', () => {
      trip(breaker, 3);
      expect(breaker.getState()).toBe('OPEN');
      expect(breaker.allow()).toBe(false);

      const snapshot = breaker.getSnapshot();
      expect(snapshot.tripCount).toBe(1);
      expect(snapshot.lastTripAt).toBe(clock.now());
    });

    it('should count every failure kind toward the threshold', () => {
      breaker.record(fail());
      breaker.record(permanentFailure(new Error('rejected')));
      breaker.record(timeout(new Error('slow')));
      expect(breaker.getState()).toBe('OPEN');
    });

    it('should reset the failure counter on success', () => {
      trip(breaker, 2);
      breaker.record(ok());
      expect(breaker.getSnapshot().failureCount).toBe(0);

      trip(breaker, 2);
      expect(breaker.getState()).toBe('CLOSED');
    });
  });

  // ───────────────────────────────────────────────────────────────────────────
  // OPEN
  // ───────────────────────────────────────────────────────────────────────────

  describe('open state', () => {
    beforeEach(() => {
      trip(breaker, 3);
    });

    it('should refuse until the open duration has elapsed', () => {
      clock.advance(4999);
      expect(breaker.allow()).toBe(false);
      expect(breaker.retryAfterMs()).toBe(1);
      expect(breaker.getState()).toBe('OPEN');
    });

    it('should ignore outcomes recorded while open', () => {
      breaker.record(ok());
      breaker.record(fail());
      expect(breaker.getState()).toBe('OPEN');
      expect(breaker.getSnapshot().tripCount).toBe(1);
    });

    it('should not transition from getState or getSnapshot', () => {
      clock.advance(10000);
      expect(breaker.getState()).toBe('OPEN');
      expect(breaker.getSnapshot().state).toBe('OPEN');
      expect(breaker.getSnapshot().retryAfterMs).toBe(0);
    });

    it('should count rejected requests', () => {
      breaker.allow();
      breaker.allow();
      expect(breaker.getSnapshot().rejectedRequests).toBe(2);
    });
  });

  // ───────────────────────────────────────────────────────────────────────────
  // HALF_OPEN
  // ───────────────────────────────────────────────────────────────────────────

  describe('half-open state', () => {
    beforeEach(() => {
      trip(breaker, 3);
      clock.advance(5000);
    });

    it('should grant exactly one probe after the cooldown', () => {
      expect(breaker.allow()).toBe(true);
      expect(breaker.getState()).toBe('HALF_OPEN');
      expect(breaker.allow()).toBe(false);
      expect(breaker.allow()).toBe(false);
      expect(breaker.getSnapshot().probeInFlight).toBe(true);
    });

    it('should grant the next probe once the previous one resolves', () => {
      expect(breaker.allow()).toBe(true);
      breaker.record(ok());
      expect(breaker.getState()).toBe('HALF_OPEN');
      expect(breaker.allow()).toBe(true);
      expect(breaker.allow()).toBe(false);
    });

    it('should close after closeThreshold probe successes and reset counters', () => {
      breaker.allow();
      breaker.record(ok());
      breaker.allow();
      breaker.record(ok());

      expect(breaker.getState()).toBe('CLOSED');
      const snapshot = breaker.getSnapshot();
      expect(snapshot.failureCount).toBe(0);
      expect(snapshot.successCount).toBe(0);
      expect(snapshot.probeInFlight).toBe(false);
    });

    it('should reopen on a single probe failure regardless of prior successes', () => {
      breaker.allow();
      breaker.record(ok());
      breaker.allow();
      breaker.record(fail());

      expect(breaker.getState()).toBe('OPEN');
      const snapshot = breaker.getSnapshot();
      expect(snapshot.tripCount).toBe(2);
      expect(snapshot.lastTripAt).toBe(clock.now());
      expect(breaker.retryAfterMs()).toBe(5000);
    });

    it('should need a fresh threshold of failures after closing', () => {
      breaker.allow();
      breaker.record(ok());
      breaker.allow();
      breaker.record(ok());

      trip(breaker, 2);
      expect(breaker.getState()).toBe('CLOSED');
      trip(breaker, 1);
      expect(breaker.getState()).toBe('OPEN');
    });
  });

  // ───────────────────────────────────────────────────────────────────────────
  // PERMITS
  // ───────────────────────────────────────────────────────────────────────────

  describe('permits', () => {
    it('should stamp permits with the current generation', () => {
      const first = breaker.tryAcquire();
      expect(first).toEqual({ circuitName: 'orders', generation: 0 });

      trip(breaker, 3);
      clock.advance(5000);
      const probe = breaker.tryAcquire();
      expect(probe).toEqual({ circuitName: 'orders', generation: 2 });
      expect(breaker.getSnapshot().probeInFlight).toBe(true);
    });

    it('should ignore late outcomes from before a trip', () => {
      const early = breaker.tryAcquire();
      expect(early).not.toBeNull();

      trip(breaker, 3);
      clock.advance(5000);
      expect(breaker.allow()).toBe(true);

      // A straggler admitted while CLOSED completes during the probe
      if (early) breaker.record(ok(), early);

      const snapshot = breaker.getSnapshot();
      expect(snapshot.state).toBe('HALF_OPEN');
      expect(snapshot.probeInFlight).toBe(true);
      expect(snapshot.successCount).toBe(0);
      expect(snapshot.staleRecords).toBe(1);
      expect(snapshot.successfulRequests).toBe(1);
    });

    it('should not let a stale failure reopen a half-open circuit', () => {
      const early = breaker.tryAcquire();
      trip(breaker, 3);
      clock.advance(5000);
      breaker.allow();

      if (early) breaker.record(fail(), early);
      expect(breaker.getState()).toBe('HALF_OPEN');
    });

    it('should ignore permits issued by another breaker', () => {
      const other = new CircuitBreakerImpl(
        createCircuitBreakerConfig('quotes'),
        { clock: clock.now }
      );
      const foreign = other.tryAcquire();
      if (foreign) breaker.record(fail(), foreign);
      expect(breaker.getSnapshot().failureCount).toBe(0);
    });
  });

  // ───────────────────────────────────────────────────────────────────────────
  // SLIDING WINDOW
  // ───────────────────────────────────────────────────────────────────────────

  describe('sliding window', () => {
    it('should only count failures inside the window', () => {
      const sliding = createCircuitBreaker(
        'positions',
        { failureThreshold: 3, failureWindow: { kind: 'sliding', windowMs: 1000 } },
        { clock: clock.now }
      );

      sliding.record(fail());
      clock.advance(600);
      sliding.record(fail());
      clock.advance(600);
      // First failure has expired
      sliding.record(fail());
      expect(sliding.getState()).toBe('CLOSED');
      expect(sliding.getSnapshot().failureCount).toBe(2);

      sliding.record(fail());
      expect(sliding.getState()).toBe('OPEN');
    });

    it('should still reset on success', () => {
      const sliding = createCircuitBreaker(
        'positions',
        { failureThreshold: 2, failureWindow: { kind: 'sliding', windowMs: 60000 } },
        { clock: clock.now }
      );
      sliding.record(fail());
      sliding.record(ok());
      sliding.record(fail());
      expect(sliding.getState()).toBe('CLOSED');
    });
  });

  // ───────────────────────────────────────────────────────────────────────────
  // SNAPSHOT AND RESET
  // ───────────────────────────────────────────────────────────────────────────

  describe('snapshot and reset', () => {
    it('should track lifetime counters', () => {
      breaker.allow();
      breaker.record(ok());
      breaker.allow();
      breaker.record(timeout(new Error('slow')));

      const snapshot = breaker.getSnapshot();
      expect(snapshot.allowedRequests).toBe(2);
      expect(snapshot.successfulRequests).toBe(1);
      expect(snapshot.failedRequests).toBe(1);
      expect(snapshot.timedOutRequests).toBe(1);
    });

    it('should report time in state', () => {
      clock.advance(250);
      expect(breaker.getSnapshot().timeInStateMs).toBe(250);
    });

    it('should return to closed with cleared counters on reset', () => {
      trip(breaker, 3);
      breaker.reset();

      const snapshot = breaker.getSnapshot();
      expect(snapshot.state).toBe('CLOSED');
      expect(snapshot.tripCount).toBe(0);
      expect(snapshot.failureCount).toBe(0);
      expect(snapshot.lastTripAt).toBeUndefined();
      expect(breaker.allow()).toBe(true);
    });
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// ERRORS
// ─────────────────────────────────────────────────────────────────────────────────

describe('CircuitOpenError', () => {
  it('should describe an open circuit', () => {
    const error = new CircuitOpenError('orders', 'OPEN', 1200);
    expect(error.name).toBe('CircuitOpenError');
    expect(error.message).toBe("Circuit breaker 'orders' is open. Retry after 1200ms");
    expect(error.retryAfterMs).toBe(1200);
  });

  it('should describe a busy probe', () => {
    const error = new CircuitOpenError('orders', 'HALF_OPEN', 0);
    expect(error.message).toBe("Circuit breaker 'orders' is half-open with a probe in flight");
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// REGISTRY
// ─────────────────────────────────────────────────────────────────────────────────

describe('CircuitBreakerRegistryImpl', () => {
  it('should create one breaker per resource', () => {
    const registry = new CircuitBreakerRegistryImpl({ failureThreshold: 2 });
    const a = registry.get('orders');
    expect(registry.get('orders')).toBe(a);
    expect(a.getConfig().failureThreshold).toBe(2);
    expect(registry.find('quotes')).toBeUndefined();
  });

  it('should apply per-resource settings over defaults', () => {
    const registry = new CircuitBreakerRegistryImpl({ failureThreshold: 2 });
    registry.configure('quotes', { failureThreshold: 7 });
    expect(registry.get('quotes').getConfig().failureThreshold).toBe(7);
    expect(registry.get('orders').getConfig().failureThreshold).toBe(2);
  });

  it('should list snapshots and reset all', () => {
    const registry = new CircuitBreakerRegistryImpl({ failureThreshold: 1 });
    registry.get('orders').record(fail());
    registry.get('quotes');

    expect(registry.getAllSnapshots().map(s => [s.name, s.state])).toEqual([
      ['orders', 'OPEN'],
      ['quotes', 'CLOSED'],
    ]);

    registry.resetAll();
    expect(registry.getAll().every(b => b.getState() === 'CLOSED')).toBe(true);
  });

  it('should remove and clear breakers', () => {
    const registry = new CircuitBreakerRegistryImpl();
    registry.get('orders');
    expect(registry.remove('orders')).toBe(true);
    expect(registry.remove('orders')).toBe(false);
    registry.get('quotes');
    registry.clear();
    expect(registry.getAll()).toEqual([]);
  });

  it('should share a process-wide registry', () => {
    resetCircuitBreakerRegistry();
    const breaker = getCircuitBreaker('account');
    expect(getCircuitBreakerRegistry().find('account')).toBe(breaker);
    resetCircuitBreakerRegistry();
    expect(getCircuitBreakerRegistry().find('account')).toBeUndefined();
  });
});
