// ═══════════════════════════════════════════════════════════════════════════════
// CIRCUIT BREAKER CONFIG — Validation and Presets
// Broker Resilience — Infrastructure
// ═══════════════════════════════════════════════════════════════════════════════
//
// Breaker configuration is validated once at construction and frozen.
// Presets cover the usual trading-API profiles:
// - aggressive: quote/market-data endpoints, fail fast and recover fast
// - moderate: account and position reads
// - tolerant: slow batch endpoints
// - critical: order submission, trip early and probe patiently
//
// ═══════════════════════════════════════════════════════════════════════════════

import { z } from 'zod';
import { parseConfig } from '../../config/validation.js';
import type { CircuitBreakerConfig } from './types.js';
import { DEFAULT_CIRCUIT_CONFIG } from './types.js';

// ─────────────────────────────────────────────────────────────────────────────────
// SCHEMA
// ─────────────────────────────────────────────────────────────────────────────────

export const FailureWindowSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('consecutive') }),
  z.object({
    kind: z.literal('sliding'),
    windowMs: z.number().int().positive('windowMs must be positive'),
  }),
]);

/**
 * Breaker settings without the resource name.
 */
export const CircuitBreakerSettingsSchema = z.object({
  failureThreshold: z
    .number()
    .int()
    .min(1, 'failureThreshold must be at least 1')
    .default(DEFAULT_CIRCUIT_CONFIG.failureThreshold),
  openDurationMs: z
    .number()
    .int()
    .min(0, 'openDurationMs cannot be negative')
    .default(DEFAULT_CIRCUIT_CONFIG.openDurationMs),
  closeThreshold: z
    .number()
    .int()
    .min(1, 'closeThreshold must be at least 1')
    .default(DEFAULT_CIRCUIT_CONFIG.closeThreshold),
  failureWindow: FailureWindowSchema.default(DEFAULT_CIRCUIT_CONFIG.failureWindow),
});

export type CircuitBreakerSettings = z.infer<typeof CircuitBreakerSettingsSchema>;
export type CircuitBreakerSettingsInput = z.input<typeof CircuitBreakerSettingsSchema>;

const CircuitBreakerConfigSchema = CircuitBreakerSettingsSchema.extend({
  name: z.string().trim().min(1, 'name is required'),
});

/**
 * Validate and freeze a complete breaker configuration.
 */
export function createCircuitBreakerConfig(
  name: string,
  settings: CircuitBreakerSettingsInput = {}
): CircuitBreakerConfig {
  const parsed = parseConfig(CircuitBreakerConfigSchema, { ...settings, name }, `circuit breaker '${name}'`);
  return Object.freeze({
    ...parsed,
    failureWindow: Object.freeze(parsed.failureWindow),
  });
}

// ─────────────────────────────────────────────────────────────────────────────────
// PRESETS
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Configuration preset types.
 */
export type ConfigPreset = 
  | 'aggressive'    // Fast failure, quick recovery (quotes, market data)
  | 'moderate'      // Balanced (account and position reads)
  | 'tolerant'      // Slow to open, patient recovery (reports, history)
  | 'critical';     // Very conservative (order submission)

/**
 * Preset configurations.
 */
export const PRESETS: Record<ConfigPreset, CircuitBreakerSettings> = {
  aggressive: {
    failureThreshold: 3,
    openDurationMs: 10000,       // 10 seconds
    closeThreshold: 1,
    failureWindow: { kind: 'sliding', windowMs: 30000 },
  },
  
  moderate: {
    ...DEFAULT_CIRCUIT_CONFIG,
  },
  
  tolerant: {
    failureThreshold: 10,
    openDurationMs: 60000,       // 1 minute
    closeThreshold: 3,
    failureWindow: { kind: 'sliding', windowMs: 120000 },
  },
  
  critical: {
    failureThreshold: 2,
    openDurationMs: 60000,       // 1 minute
    closeThreshold: 3,
    failureWindow: { kind: 'consecutive' },
  },
};

/**
 * Create a configuration from a preset with overrides.
 */
export function createFromPreset(
  name: string,
  preset: ConfigPreset,
  overrides: CircuitBreakerSettingsInput = {}
): CircuitBreakerConfig {
  return createCircuitBreakerConfig(name, { ...PRESETS[preset], ...overrides });
}
