// ═══════════════════════════════════════════════════════════════════════════════
// STRESS TEST — Concurrent Calls Against a Flaky Upstream
// Broker Resilience — Tests
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect } from 'vitest';
import {
  createCircuitBreaker,
  createRetryPolicy,
  RetryWrapper,
  RandomFaultInjector,
  CircuitOpenError,
  ExhaustedError,
  type AttemptContext,
} from '../index.js';

const CALLS = 1000;

function pause(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

describe('Stress', () => {
  it('should keep breaker invariants under 1000 concurrent calls', async () => {
    const breaker = createCircuitBreaker('orders', {
      failureThreshold: 5,
      openDurationMs: 20,
      closeThreshold: 1,
    });
    const wrapper = new RetryWrapper({
      breaker,
      policy: createRetryPolicy({
        maxAttempts: 3,
        baseBackoffMs: 1,
        multiplier: 2,
        maxBackoffMs: 5,
        jitterFraction: 0.5,
      }),
    });
    const injector = new RandomFaultInjector<string>({ seed: 'stress', failureRate: 0.5 });

    let probesInFlight = 0;
    let maxProbesInFlight = 0;

    const upstream = injector.wrap(async (context: AttemptContext) => {
      await pause(1);
      return `fill-${context.tag}`;
    });

    const tracked = async (context: AttemptContext): Promise<string> => {
      const probing = breaker.getState() === 'HALF_OPEN';
      if (probing) {
        probesInFlight++;
        maxProbesInFlight = Math.max(maxProbesInFlight, probesInFlight);
      }
      try {
        return await upstream(context);
      } finally {
        if (probing) probesInFlight--;
      }
    };

    const results = await Promise.allSettled(
      Array.from({ length: CALLS }, (_, i) => wrapper.execute(tracked, { tag: `order-${i}` }))
    );

    let successes = 0;
    let exhausted = 0;
    let refused = 0;
    const unexpected: unknown[] = [];

    for (const result of results) {
      if (result.status === 'fulfilled') {
        successes++;
      } else if (result.reason instanceof ExhaustedError) {
        exhausted++;
      } else if (result.reason instanceof CircuitOpenError) {
        refused++;
      } else {
        unexpected.push(result.reason);
      }
    }

    expect(unexpected).toEqual([]);
    expect(successes + exhausted + refused).toBe(CALLS);
    expect(successes).toBeGreaterThan(0);
    expect(maxProbesInFlight).toBeLessThanOrEqual(1);

    const stats = wrapper.getStats();
    const snapshot = breaker.getSnapshot();

    expect(stats.callCount).toBe(CALLS);
    expect(stats.successCount).toBe(successes);
    expect(stats.exhaustedCount).toBe(exhausted);
    expect(stats.rejectedCount).toBe(refused);
    expect(stats.attemptCount).toBe(injector.getStats().calls);
    expect(snapshot.allowedRequests).toBe(stats.attemptCount);
    expect(snapshot.successfulRequests + snapshot.failedRequests).toBe(stats.attemptCount);
    expect(snapshot.probeInFlight).toBe(false);
  });
});
