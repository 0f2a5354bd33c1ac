// ═══════════════════════════════════════════════════════════════════════════════
// INFRASTRUCTURE MODULE — Resilience for Remote Trading API Calls
// Broker Resilience — Infrastructure
// ═══════════════════════════════════════════════════════════════════════════════
//
// This module provides:
// - Outcome classification (transient / permanent / timeout)
// - Circuit breaker per protected resource
// - Retry wrapper with exponential backoff and jitter
// - Fault injection for deterministic and seeded-random testing
//
// Quick Start:
//   import {
//     getCircuitBreaker,
//     RetryWrapper,
//     createRetryPolicy,
//   } from './infrastructure/index.js';
//
//   const wrapper = new RetryWrapper({
//     breaker: getCircuitBreaker('orders'),
//     policy: createRetryPolicy({ maxAttempts: 3 }),
//   });
//
//   const order = await wrapper.execute(
//     ({ signal }) => broker.submitOrder(request, { signal }),
//     { tag: request.clientOrderId }
//   );
//
// ═══════════════════════════════════════════════════════════════════════════════

export * from './outcome/index.js';
export * from './circuit-breaker/index.js';
export * from './retry/index.js';
export * from './fault-injection/index.js';
