// ═══════════════════════════════════════════════════════════════════════════════
// RESILIENCE INTEGRATION TESTS — Wrapper, Breaker and Injector Together
// Broker Resilience — Tests
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect, vi } from 'vitest';
import {
  createResilience,
  loadResilienceConfig,
  createCircuitBreaker,
  createRetryPolicy,
  RetryWrapper,
  ScriptedFaultInjector,
  CircuitOpenError,
  ExhaustedError,
  type AttemptContext,
} from '../index.js';

function createManualClock() {
  let now = 0;
  return {
    now: () => now,
    advance: (ms: number) => {
      now += ms;
    },
  };
}

/**
 * Operation that resolves when the test says so.
 */
function deferredCall<T>() {
  const resolvers: Array<(value: T) => void> = [];
  const op = vi.fn(
    (_context: AttemptContext) =>
      new Promise<T>(resolve => {
        resolvers.push(resolve);
      })
  );
  return {
    op,
    resolveAll: (value: T) => {
      for (const resolve of resolvers) resolve(value);
    },
  };
}

const noSleep = async () => undefined;

// ─────────────────────────────────────────────────────────────────────────────────
// COMPOSITION
// ─────────────────────────────────────────────────────────────────────────────────

describe('createResilience', () => {
  it('should retry through scripted faults with settings from the environment', async () => {
    const resilience = createResilience(
      loadResilienceConfig({
        RETRY_MAX_ATTEMPTS: '3',
        RETRY_BASE_BACKOFF_MS: '1',
        RETRY_MAX_BACKOFF_MS: '2',
        FAULT_MODE: 'scripted',
        FAULT_SCRIPT: 'transient,timeout',
        FAULT_TIMEOUT_DELAY_MS: '0',
      })
    );
    const injector = resilience.faultInjector<string>();
    const submitOrder = vi.fn(async () => 'filled');

    await expect(resilience.wrapper('orders').execute(injector.wrap(submitOrder))).resolves.toBe('filled');

    expect(submitOrder).toHaveBeenCalledTimes(1);
    expect(injector.getStats()).toEqual({
      calls: 3,
      passThroughs: 1,
      injected: { success: 0, transient: 1, permanent: 0, timeout: 1 },
    });
    expect(resilience.wrapper('orders').getStats()).toMatchObject({ callCount: 1, retryCount: 2 });
  });

  it('should share one breaker and wrapper per resource', () => {
    const resilience = createResilience(loadResilienceConfig({}));

    const orders = resilience.wrapper('orders');

    expect(resilience.wrapper('orders')).toBe(orders);
    expect(resilience.wrapper('quotes')).not.toBe(orders);
    expect(resilience.registry.find('orders')).toBe(orders.getBreaker());
    expect(orders.getPolicy()).toBe(resilience.config.retry);
  });

  it('should apply the configured breaker defaults', () => {
    const resilience = createResilience(loadResilienceConfig({ BREAKER_FAILURE_THRESHOLD: '7' }));
    expect(resilience.wrapper('orders').getBreaker().getConfig().failureThreshold).toBe(7);
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// BREAKER SCENARIOS
// ─────────────────────────────────────────────────────────────────────────────────

describe('Breaker scenarios', () => {
  it('should stop calling the API once scripted failures trip the breaker', async () => {
    const clock = createManualClock();
    const breaker = createCircuitBreaker('orders', { failureThreshold: 3, openDurationMs: 5000 }, { clock: clock.now });
    const wrapper = new RetryWrapper({
      breaker,
      policy: createRetryPolicy({ maxAttempts: 1 }),
      clock: clock.now,
    });
    const injector = new ScriptedFaultInjector<string>(['transient', 'transient', 'transient']);
    const submitOrder = injector.wrap(async () => 'filled');

    for (let i = 0; i < 3; i++) {
      await expect(wrapper.execute(submitOrder)).rejects.toBeInstanceOf(ExhaustedError);
    }
    await expect(wrapper.execute(submitOrder)).rejects.toBeInstanceOf(CircuitOpenError);
    expect(injector.getStats().calls).toBe(3);

    clock.advance(5000);
    await expect(wrapper.execute(submitOrder)).resolves.toBe('filled');
    expect(breaker.getState()).toBe('CLOSED');
  });

  it('should admit exactly one probe among concurrent callers', async () => {
    const clock = createManualClock();
    const breaker = createCircuitBreaker('orders', { failureThreshold: 1, openDurationMs: 1000 }, { clock: clock.now });
    const wrapper = new RetryWrapper({
      breaker,
      policy: createRetryPolicy({ maxAttempts: 1 }),
      clock: clock.now,
      sleep: noSleep,
    });

    await expect(
      wrapper.execute(async () => {
        throw Object.assign(new Error('unavailable'), { statusCode: 503 });
      })
    ).rejects.toBeInstanceOf(ExhaustedError);
    clock.advance(1000);

    const { op, resolveAll } = deferredCall<string>();
    const calls = Array.from({ length: 50 }, () => wrapper.executeWithResult(op));

    expect(op).toHaveBeenCalledTimes(1);
    expect(breaker.getSnapshot()).toMatchObject({ state: 'HALF_OPEN', probeInFlight: true });

    resolveAll('quote');
    const results = await Promise.all(calls);

    const refused = results.filter(r => !r.ok && r.error.kind === 'circuit_open');
    expect(refused).toHaveLength(49);
    expect(results.filter(r => r.ok)).toHaveLength(1);
    expect(breaker.getState()).toBe('CLOSED');
  });

  it('should ignore a slow success that completes after the breaker tripped', async () => {
    const clock = createManualClock();
    const breaker = createCircuitBreaker('orders', { failureThreshold: 1, openDurationMs: 1000 }, { clock: clock.now });
    const wrapper = new RetryWrapper({
      breaker,
      policy: createRetryPolicy({ maxAttempts: 1 }),
      clock: clock.now,
    });

    const slow = deferredCall<string>();
    const slowCall = wrapper.execute(slow.op);

    await expect(
      wrapper.execute(async () => {
        throw Object.assign(new Error('unavailable'), { statusCode: 503 });
      })
    ).rejects.toBeInstanceOf(ExhaustedError);
    expect(breaker.getState()).toBe('OPEN');

    slow.resolveAll('late fill');

    await expect(slowCall).resolves.toBe('late fill');
    expect(breaker.getState()).toBe('OPEN');
    expect(breaker.getSnapshot()).toMatchObject({ staleRecords: 1, successfulRequests: 1 });
  });

  it('should hold the probe slot while a stale completion arrives', async () => {
    const clock = createManualClock();
    const breaker = createCircuitBreaker('orders', { failureThreshold: 1, openDurationMs: 1000 }, { clock: clock.now });
    const wrapper = new RetryWrapper({
      breaker,
      policy: createRetryPolicy({ maxAttempts: 1 }),
      clock: clock.now,
    });

    const slow = deferredCall<string>();
    const slowCall = wrapper.execute(slow.op);
    await wrapper.executeWithResult(async () => {
      throw Object.assign(new Error('unavailable'), { statusCode: 503 });
    });

    clock.advance(1000);
    const probe = deferredCall<string>();
    const probeCall = wrapper.execute(probe.op);
    expect(breaker.getState()).toBe('HALF_OPEN');

    slow.resolveAll('late fill');
    await slowCall;

    const another = await wrapper.executeWithResult(async () => 'second probe');
    expect(another.ok).toBe(false);
    expect(breaker.getSnapshot().probeInFlight).toBe(true);

    probe.resolveAll('probe fill');
    await expect(probeCall).resolves.toBe('probe fill');
    expect(breaker.getState()).toBe('CLOSED');
  });
});
