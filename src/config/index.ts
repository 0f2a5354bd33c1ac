// ═══════════════════════════════════════════════════════════════════════════════
// CONFIG MODULE — Resilience Settings from the Environment
// Broker Resilience — Configuration
// ═══════════════════════════════════════════════════════════════════════════════
//
// RETRY_*   → retry policy (optionally starting from RETRY_PRESET)
// BREAKER_* → default breaker settings (optionally from BREAKER_PRESET)
// FAULT_*   → fault injection (off unless FAULT_MODE is set)
//
// Every section is validated with its zod schema; invalid values throw
// ConfigValidationError instead of falling back to defaults.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { z } from 'zod';
import { parseConfig, ConfigValidationError } from './validation.js';
import {
  type RetryPolicy,
  RetryPolicySchema,
  RetryPresets,
  createRetryPolicy,
} from '../infrastructure/retry/index.js';
import {
  type CircuitBreakerSettings,
  CircuitBreakerSettingsSchema,
  PRESETS as BREAKER_PRESETS,
} from '../infrastructure/circuit-breaker/index.js';
import {
  type FaultInjectionConfig,
  FaultInjectionConfigSchema,
} from '../infrastructure/fault-injection/index.js';
import { FAILURE_KINDS, type FailureKind } from '../infrastructure/outcome/index.js';

export { ConfigValidationError, formatConfigErrors, parseConfig } from './validation.js';

/**
 * Environment variables as read from process.env.
 */
export type Env = Readonly<Record<string, string | undefined>>;

// ─────────────────────────────────────────────────────────────────────────────────
// ENVIRONMENT HELPERS
// ─────────────────────────────────────────────────────────────────────────────────

function envString(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

/**
 * Unparseable numbers come back as NaN so the schema rejects them.
 */
function envNumber(env: Env, key: string): number | undefined {
  const value = envString(env, key);
  if (value === undefined) return undefined;
  return Number(value);
}

function envList(env: Env, key: string): string[] | undefined {
  const value = envString(env, key);
  if (value === undefined) return undefined;
  return value.split(',').map(s => s.trim()).filter(Boolean);
}

/**
 * Drop undefined entries so presets are not overwritten by unset variables.
 */
function definedOnly(values: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(values).filter(([, v]) => v !== undefined));
}

// ─────────────────────────────────────────────────────────────────────────────────
// RETRY
// ─────────────────────────────────────────────────────────────────────────────────

const RetryPresetSchema = z.enum(['quick', 'standard', 'patient']).optional();

export function loadRetryPolicy(env: Env = process.env): RetryPolicy {
  const preset = parseConfig(RetryPresetSchema, envString(env, 'RETRY_PRESET'), 'retry');

  const parsed = parseConfig(
    RetryPolicySchema,
    {
      ...(preset ? RetryPresets[preset] : {}),
      ...definedOnly({
        maxAttempts: envNumber(env, 'RETRY_MAX_ATTEMPTS'),
        baseBackoffMs: envNumber(env, 'RETRY_BASE_BACKOFF_MS'),
        multiplier: envNumber(env, 'RETRY_MULTIPLIER'),
        maxBackoffMs: envNumber(env, 'RETRY_MAX_BACKOFF_MS'),
        jitterFraction: envNumber(env, 'RETRY_JITTER_FRACTION'),
        retryableOutcomes: envList(env, 'RETRY_RETRYABLE_OUTCOMES'),
        attemptTimeoutMs: envNumber(env, 'RETRY_ATTEMPT_TIMEOUT_MS'),
      }),
    },
    'retry'
  );

  return createRetryPolicy(parsed);
}

// ─────────────────────────────────────────────────────────────────────────────────
// CIRCUIT BREAKER
// ─────────────────────────────────────────────────────────────────────────────────

const BreakerPresetSchema = z.enum(['aggressive', 'moderate', 'tolerant', 'critical']).optional();

/**
 * Default settings for every breaker. BREAKER_WINDOW_MS switches the
 * failure window to sliding.
 */
export function loadBreakerSettings(env: Env = process.env): CircuitBreakerSettings {
  const preset = parseConfig(BreakerPresetSchema, envString(env, 'BREAKER_PRESET'), 'circuit breaker');
  const windowMs = envNumber(env, 'BREAKER_WINDOW_MS');

  const settings = parseConfig(
    CircuitBreakerSettingsSchema,
    {
      ...(preset ? BREAKER_PRESETS[preset] : {}),
      ...definedOnly({
        failureThreshold: envNumber(env, 'BREAKER_FAILURE_THRESHOLD'),
        openDurationMs: envNumber(env, 'BREAKER_OPEN_DURATION_MS'),
        closeThreshold: envNumber(env, 'BREAKER_CLOSE_THRESHOLD'),
        failureWindow: windowMs !== undefined ? { kind: 'sliding', windowMs } : undefined,
      }),
    },
    'circuit breaker'
  );

  return Object.freeze(settings);
}

// ─────────────────────────────────────────────────────────────────────────────────
// FAULT INJECTION
// ─────────────────────────────────────────────────────────────────────────────────

function isFailureKind(value: string): value is FailureKind {
  return FAILURE_KINDS.some(kind => kind === value);
}

/**
 * Parse `transient:2,timeout:1` into kind weights.
 */
function envWeights(env: Env, key: string): Record<string, number> | undefined {
  const entries = envList(env, key);
  if (entries === undefined) return undefined;

  const weights: Record<string, number> = {};
  const issues: string[] = [];

  for (const entry of entries) {
    const [kind = '', weight] = entry.split(':').map(s => s.trim());
    if (!isFailureKind(kind)) {
      issues.push(`${key}: unknown fault kind '${kind}'`);
      continue;
    }
    weights[kind] = weight === undefined ? 1 : Number(weight);
  }

  if (issues.length > 0) {
    throw new ConfigValidationError('fault injection', issues);
  }
  return weights;
}

export function loadFaultInjectionConfig(env: Env = process.env): FaultInjectionConfig {
  const mode = envString(env, 'FAULT_MODE') ?? 'off';

  return parseConfig(
    FaultInjectionConfigSchema,
    {
      mode,
      ...definedOnly({
        script: envList(env, 'FAULT_SCRIPT'),
        seed: envString(env, 'FAULT_SEED'),
        failureRate: envNumber(env, 'FAULT_FAILURE_RATE'),
        kinds: envWeights(env, 'FAULT_KINDS'),
        burstAt: envNumber(env, 'FAULT_BURST_AT'),
        burstLength: envNumber(env, 'FAULT_BURST_LENGTH'),
        statusCode: envNumber(env, 'FAULT_STATUS_CODE'),
        permanentStatusCode: envNumber(env, 'FAULT_PERMANENT_STATUS_CODE'),
        timeoutDelayMs: envNumber(env, 'FAULT_TIMEOUT_DELAY_MS'),
      }),
    },
    'fault injection'
  );
}

// ─────────────────────────────────────────────────────────────────────────────────
// COMBINED
// ─────────────────────────────────────────────────────────────────────────────────

export interface ResilienceConfig {
  readonly retry: RetryPolicy;
  readonly breaker: CircuitBreakerSettings;
  readonly faultInjection: FaultInjectionConfig;
}

/**
 * Load and validate every resilience section.
 */
export function loadResilienceConfig(env: Env = process.env): ResilienceConfig {
  return Object.freeze({
    retry: loadRetryPolicy(env),
    breaker: loadBreakerSettings(env),
    faultInjection: loadFaultInjectionConfig(env),
  });
}
