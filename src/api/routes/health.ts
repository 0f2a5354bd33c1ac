// ═══════════════════════════════════════════════════════════════════════════════
// HEALTH ROUTES — Breaker and Retry Status for Dashboards
// Broker Resilience — API
// ═══════════════════════════════════════════════════════════════════════════════
//
// Read-only poll targets. Nothing here changes breaker or wrapper state.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { Router, type Request, type Response, type RequestHandler } from 'express';
import type {
  CircuitBreakerRegistry,
  CircuitSnapshot,
  CircuitState,
} from '../../infrastructure/circuit-breaker/index.js';
import type { RetryStats } from '../../infrastructure/retry/index.js';
import { getLogger } from '../../observability/logging/index.js';

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export type HealthStatus = 'healthy' | 'degraded' | 'unhealthy';

export interface BreakerHealth {
  name: string;
  state: CircuitState;
  retryAfterMs: number;
  tripCount: number;
}

export interface HealthCheck {
  status: HealthStatus;
  timestamp: string;
  breakers: BreakerHealth[];
}

/**
 * Anything exposing retry statistics (a RetryWrapper).
 */
export interface StatsSource {
  getStats(): RetryStats;
}

// ─────────────────────────────────────────────────────────────────────────────────
// HEALTH EVALUATION
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * OPEN anywhere → unhealthy, HALF_OPEN anywhere → degraded.
 */
export function evaluateHealth(snapshots: readonly CircuitSnapshot[]): HealthStatus {
  if (snapshots.some(s => s.state === 'OPEN')) return 'unhealthy';
  if (snapshots.some(s => s.state === 'HALF_OPEN')) return 'degraded';
  return 'healthy';
}

export function buildHealthCheck(registry: CircuitBreakerRegistry, now: Date = new Date()): HealthCheck {
  const snapshots = registry.getAllSnapshots();

  return {
    status: evaluateHealth(snapshots),
    timestamp: now.toISOString(),
    breakers: snapshots.map(s => ({
      name: s.name,
      state: s.state,
      retryAfterMs: s.retryAfterMs,
      tripCount: s.tripCount,
    })),
  };
}

// ─────────────────────────────────────────────────────────────────────────────────
// HANDLERS
// ─────────────────────────────────────────────────────────────────────────────────

export function healthHandler(registry: CircuitBreakerRegistry): RequestHandler {
  const logger = getLogger({ component: 'health' });

  return (_req: Request, res: Response) => {
    const health = buildHealthCheck(registry);

    if (health.status !== 'healthy') {
      logger.warn('Health check degraded', {
        status: health.status,
        breakers: health.breakers
          .filter(b => b.state !== 'CLOSED')
          .map(b => `${b.name}:${b.state}`),
      });
    }

    res.status(health.status === 'unhealthy' ? 503 : 200).json(health);
  };
}

export function breakersHandler(registry: CircuitBreakerRegistry): RequestHandler {
  return (_req: Request, res: Response) => {
    res.status(200).json({ breakers: registry.getAllSnapshots() });
  };
}

export function retryStatsHandler(wrappers: ReadonlyMap<string, StatsSource>): RequestHandler {
  return (_req: Request, res: Response) => {
    const stats: Record<string, RetryStats> = {};
    for (const [name, wrapper] of wrappers) {
      stats[name] = wrapper.getStats();
    }
    res.status(200).json({ wrappers: stats });
  };
}

// ─────────────────────────────────────────────────────────────────────────────────
// ROUTES
// ─────────────────────────────────────────────────────────────────────────────────

export function createResilienceRouter(
  registry: CircuitBreakerRegistry,
  wrappers: ReadonlyMap<string, StatsSource> = new Map()
): Router {
  const router = Router();

  // ─── HEALTH CHECK ───
  // healthy / degraded / unhealthy (503) from breaker states
  router.get('/health', healthHandler(registry));

  // ─── BREAKER SNAPSHOTS ───
  router.get('/breakers', breakersHandler(registry));

  // ─── RETRY STATISTICS ───
  router.get('/retry-stats', retryStatsHandler(wrappers));

  return router;
}
