// ═══════════════════════════════════════════════════════════════════════════════
// FAULT INJECTION MODULE INDEX
// Broker Resilience — Infrastructure
// ═══════════════════════════════════════════════════════════════════════════════

export {
  type ScriptEntry,
  type InjectedKind,
  type FaultInjectorStats,
  type FaultInjector,
} from './types.js';

export {
  DEFAULT_TIMEOUT_DELAY_MS,
  DEFAULT_TRANSIENT_STATUS_CODE,
  DEFAULT_PERMANENT_STATUS_CODE,
  DEFAULT_BURST_LENGTH,
  ScriptKindSchema,
  ScriptedFaultSettingsSchema,
  FaultKindWeightsSchema,
  RandomFaultSettingsSchema,
  FaultInjectionConfigSchema,
  type ScriptedFaultSettings,
  type ScriptedFaultSettingsInput,
  type FaultKindWeights,
  type RandomFaultSettings,
  type RandomFaultSettingsInput,
  type FaultInjectionConfig,
  type FaultInjectionConfigInput,
} from './config.js';

export { type FaultDecision, BaseFaultInjector } from './base.js';
export { type ScriptedFaultOptions, ScriptedFaultInjector } from './scripted.js';
export { type RandomFaultOptions, RandomFaultInjector } from './random.js';
export { createFaultInjector } from './factory.js';
