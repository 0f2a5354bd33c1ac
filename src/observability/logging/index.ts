// ═══════════════════════════════════════════════════════════════════════════════
// LOGGING MODULE INDEX
// Broker Resilience — Observability
// ═══════════════════════════════════════════════════════════════════════════════

export {
  type LogLevel,
  type LoggerConfig,
  type LoggerOptions,
  type ILogger,
  LOG_LEVELS,
  configureLogger,
  getLogger,
  resetLogger,
} from './logger.js';

export {
  type LoggingContext,
  runWithContext,
  runWithExtendedContext,
  getLoggingContext,
  getCorrelationId,
  generateCorrelationId,
} from './context.js';

export {
  type RedactionOptions,
  SENSITIVE_KEY_FRAGMENTS,
  redact,
} from './redaction.js';
