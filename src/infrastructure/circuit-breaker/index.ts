// ═══════════════════════════════════════════════════════════════════════════════
// CIRCUIT BREAKER MODULE INDEX — Circuit Breaker Exports
// Broker Resilience — Infrastructure
// ═══════════════════════════════════════════════════════════════════════════════

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export {
  // States
  type CircuitState,
  
  // Configuration
  type FailureWindow,
  type CircuitBreakerConfig,
  type Clock,
  DEFAULT_CIRCUIT_CONFIG,
  
  // Permits and snapshots
  type AttemptPermit,
  type CircuitSnapshot,
  
  // Errors
  CircuitOpenError,
  
  // Interfaces
  type CircuitBreaker,
  type CircuitBreakerRegistry,
} from './types.js';

// ─────────────────────────────────────────────────────────────────────────────────
// CONFIGURATION
// ─────────────────────────────────────────────────────────────────────────────────

export {
  FailureWindowSchema,
  CircuitBreakerSettingsSchema,
  type CircuitBreakerSettings,
  type CircuitBreakerSettingsInput,
  createCircuitBreakerConfig,
  
  // Presets
  type ConfigPreset,
  PRESETS,
  createFromPreset,
} from './config.js';

// ─────────────────────────────────────────────────────────────────────────────────
// IMPLEMENTATION
// ─────────────────────────────────────────────────────────────────────────────────

export {
  type CircuitBreakerOptions,
  CircuitBreakerImpl,
  createCircuitBreaker,
  
  // Registry
  CircuitBreakerRegistryImpl,
  getCircuitBreakerRegistry,
  getCircuitBreaker,
  resetCircuitBreakerRegistry,
} from './breaker.js';
