// ═══════════════════════════════════════════════════════════════════════════════
// FAULT INJECTION CONFIG — Schemas
// Broker Resilience — Infrastructure
// ═══════════════════════════════════════════════════════════════════════════════

import { z } from 'zod';

// ─────────────────────────────────────────────────────────────────────────────────
// DEFAULTS
// ─────────────────────────────────────────────────────────────────────────────────

export const DEFAULT_TIMEOUT_DELAY_MS = 1000;
export const DEFAULT_TRANSIENT_STATUS_CODE = 429;
export const DEFAULT_PERMANENT_STATUS_CODE = 400;
export const DEFAULT_BURST_LENGTH = 3;

// ─────────────────────────────────────────────────────────────────────────────────
// SCHEMAS
// ─────────────────────────────────────────────────────────────────────────────────

const StatusCodeSchema = z.number().int().min(100).max(599);

const TimeoutDelaySchema = z
  .number()
  .int()
  .min(0, 'timeoutDelayMs cannot be negative')
  .default(DEFAULT_TIMEOUT_DELAY_MS);

export const ScriptKindSchema = z.enum(['pass', 'transient', 'permanent', 'timeout']);

/**
 * Scripted replay settings (string entries only; success substitutions are
 * programmatic).
 */
export const ScriptedFaultSettingsSchema = z.object({
  script: z.array(ScriptKindSchema).default([]),
  timeoutDelayMs: TimeoutDelaySchema,
  statusCode: StatusCodeSchema.default(DEFAULT_TRANSIENT_STATUS_CODE),
  permanentStatusCode: StatusCodeSchema.default(DEFAULT_PERMANENT_STATUS_CODE),
});

/**
 * Relative weight of each injected failure kind.
 */
export const FaultKindWeightsSchema = z
  .object({
    transient: z.number().min(0).default(0),
    permanent: z.number().min(0).default(0),
    timeout: z.number().min(0).default(0),
  })
  .refine(w => w.transient + w.permanent + w.timeout > 0, {
    message: 'at least one fault kind needs a positive weight',
  });

/**
 * Seeded random settings.
 */
export const RandomFaultSettingsSchema = z.object({
  seed: z.union([z.string().min(1), z.number()]),
  failureRate: z
    .number()
    .min(0, 'failureRate must be between 0 and 1')
    .max(1, 'failureRate must be between 0 and 1'),
  kinds: FaultKindWeightsSchema.default({ transient: 1 }),
  burstAt: z.number().int().min(1, 'burstAt is a 1-based call number').optional(),
  burstLength: z.number().int().min(1).default(DEFAULT_BURST_LENGTH),
  timeoutDelayMs: TimeoutDelaySchema,
  statusCode: StatusCodeSchema.default(DEFAULT_TRANSIENT_STATUS_CODE),
  permanentStatusCode: StatusCodeSchema.default(DEFAULT_PERMANENT_STATUS_CODE),
});

/**
 * Injector selection, as loaded from configuration.
 */
export const FaultInjectionConfigSchema = z.discriminatedUnion('mode', [
  z.object({ mode: z.literal('off') }),
  ScriptedFaultSettingsSchema.extend({ mode: z.literal('scripted') }),
  RandomFaultSettingsSchema.extend({ mode: z.literal('random') }),
]);

export type ScriptedFaultSettings = z.infer<typeof ScriptedFaultSettingsSchema>;
export type ScriptedFaultSettingsInput = z.input<typeof ScriptedFaultSettingsSchema>;
export type FaultKindWeights = z.infer<typeof FaultKindWeightsSchema>;
export type RandomFaultSettings = z.infer<typeof RandomFaultSettingsSchema>;
export type RandomFaultSettingsInput = z.input<typeof RandomFaultSettingsSchema>;
export type FaultInjectionConfig = z.infer<typeof FaultInjectionConfigSchema>;
export type FaultInjectionConfigInput = z.input<typeof FaultInjectionConfigSchema>;
