// ═══════════════════════════════════════════════════════════════════════════════
// FAULT INJECTOR FACTORY
// Broker Resilience — Infrastructure
// ═══════════════════════════════════════════════════════════════════════════════

import type { FaultInjector } from './types.js';
import {
  type FaultInjectionConfigInput,
  FaultInjectionConfigSchema,
} from './config.js';
import { ScriptedFaultInjector } from './scripted.js';
import { RandomFaultInjector } from './random.js';
import { parseConfig } from '../../config/validation.js';

/**
 * Build an injector from configuration. Mode 'off' yields an injector
 * with an empty script, so every invocation passes through.
 */
export function createFaultInjector<T = unknown>(config: FaultInjectionConfigInput): FaultInjector<T> {
  const parsed = parseConfig(FaultInjectionConfigSchema, config, 'fault injection');
  
  switch (parsed.mode) {
    case 'off':
      return new ScriptedFaultInjector<T>([]);
      
    case 'scripted':
      return new ScriptedFaultInjector<T>(parsed.script, {
        timeoutDelayMs: parsed.timeoutDelayMs,
        statusCode: parsed.statusCode,
        permanentStatusCode: parsed.permanentStatusCode,
      });
      
    case 'random': {
      const { mode: _mode, ...settings } = parsed;
      return new RandomFaultInjector<T>(settings);
    }
  }
}
