// ═══════════════════════════════════════════════════════════════════════════════
// BROKER RESILIENCE — Library Entry
// ═══════════════════════════════════════════════════════════════════════════════
//
// Quick Start:
//   import { createResilience } from 'broker-resilience';
//
//   const resilience = createResilience();
//   const orders = resilience.wrapper('orders');
//   const fill = await orders.execute(({ signal }) => api.submitOrder(order, { signal }));
//
//   app.use('/resilience', resilience.router());
//
// ═══════════════════════════════════════════════════════════════════════════════

import type { Router } from 'express';
import { loadResilienceConfig, type ResilienceConfig } from './config/index.js';
import { CircuitBreakerRegistryImpl } from './infrastructure/circuit-breaker/index.js';
import { RetryWrapper } from './infrastructure/retry/index.js';
import {
  type FaultInjector,
  createFaultInjector,
} from './infrastructure/fault-injection/index.js';
import { createResilienceRouter } from './api/routes/health.js';

export * from './infrastructure/index.js';
export * from './config/index.js';
export * from './api/routes/health.js';
export * from './observability/logging/index.js';
export * from './types/result.js';

// ─────────────────────────────────────────────────────────────────────────────────
// COMPOSITION
// ─────────────────────────────────────────────────────────────────────────────────

export interface Resilience {
  readonly config: ResilienceConfig;
  readonly registry: CircuitBreakerRegistryImpl;
  
  /** Retry wrapper for a resource, sharing that resource's breaker */
  wrapper(resource: string): RetryWrapper;
  
  /** Injector built from the fault injection section */
  faultInjector<T = unknown>(): FaultInjector<T>;
  
  /** Status routes over this instance's breakers and wrappers */
  router(): Router;
}

/**
 * Wire a breaker registry and retry wrappers from one configuration.
 */
export function createResilience(config: ResilienceConfig = loadResilienceConfig()): Resilience {
  const registry = new CircuitBreakerRegistryImpl(config.breaker);
  const wrappers = new Map<string, RetryWrapper>();
  
  return {
    config,
    registry,
    
    wrapper(resource: string): RetryWrapper {
      let wrapper = wrappers.get(resource);
      if (!wrapper) {
        wrapper = new RetryWrapper({ breaker: registry.get(resource), policy: config.retry });
        wrappers.set(resource, wrapper);
      }
      return wrapper;
    },
    
    faultInjector<T = unknown>(): FaultInjector<T> {
      return createFaultInjector<T>(config.faultInjection);
    },
    
    router(): Router {
      return createResilienceRouter(registry, wrappers);
    },
  };
}
