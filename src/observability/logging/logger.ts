// ═══════════════════════════════════════════════════════════════════════════════
// STRUCTURED LOGGER — Component Loggers with Context & Redaction
// Broker Resilience — Observability
// ═══════════════════════════════════════════════════════════════════════════════
//
// Structured logging with:
// - JSON output for production, pretty-print for development
// - Automatic correlation ID injection from AsyncLocalStorage
// - Credential redaction
// - Component-based child loggers
//
// Usage:
//   import { getLogger } from './logging/index.js';
//
//   const logger = getLogger({ component: 'circuit-breaker' });
//   logger.warn('Circuit state changed', { from: 'CLOSED', to: 'OPEN' });
//
// ═══════════════════════════════════════════════════════════════════════════════

import { getLoggingContext } from './context.js';
import { redact, type RedactionOptions } from './redaction.js';

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Log levels in order of severity.
 */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

/**
 * Numeric log level values (Pino-compatible).
 */
export const LOG_LEVELS: Record<LogLevel, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  fatal: 60,
};

/**
 * Logger configuration options.
 */
export interface LoggerConfig {
  /** Minimum log level */
  level?: LogLevel;
  
  /** Enable pretty printing (development) */
  pretty?: boolean;
  
  /** Enable credential redaction */
  redactSecrets?: boolean;
  
  /** Additional redaction options */
  redactionOptions?: RedactionOptions;
  
  /** Service name for logs */
  serviceName?: string;
  
  /** Environment name */
  environment?: string;
  
  /** Enable timestamp */
  timestamp?: boolean;
}

/**
 * Options for creating a child logger.
 */
export interface LoggerOptions {
  /** Component name */
  component?: string;
  
  /** Additional context */
  context?: Record<string, unknown>;
}

/**
 * Logger interface.
 */
export interface ILogger {
  trace(message: string, context?: Record<string, unknown>): void;
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, error?: unknown, context?: Record<string, unknown>): void;
  fatal(message: string, error?: unknown, context?: Record<string, unknown>): void;
  
  /** Create a child logger with additional context */
  child(options: LoggerOptions): ILogger;
  
  /** Check if a level is enabled */
  isLevelEnabled(level: LogLevel): boolean;
}

// ─────────────────────────────────────────────────────────────────────────────────
// CONFIGURATION
// ─────────────────────────────────────────────────────────────────────────────────

const DEFAULT_LOGGER_CONFIG: LoggerConfig = {
  level: 'info',
  pretty: process.env.NODE_ENV !== 'production',
  redactSecrets: true,
  serviceName: 'broker-resilience',
  environment: process.env.NODE_ENV ?? 'development',
  timestamp: true,
};

let globalConfig: LoggerConfig = { ...DEFAULT_LOGGER_CONFIG };

/**
 * Configure the global logger settings.
 */
export function configureLogger(config: Partial<LoggerConfig>): void {
  globalConfig = { ...globalConfig, ...config };
}

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

/**
 * Get log level from environment or config.
 */
function getEffectiveLevel(): LogLevel {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  return globalConfig.level ?? 'info';
}

// ─────────────────────────────────────────────────────────────────────────────────
// FORMATTERS
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Format error for logging, following the cause chain one level.
 */
function formatError(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    return {
      errorName: error.name,
      errorMessage: error.message,
      errorStack: error.stack?.split('\n').slice(0, 10).join('\n'),
      ...(error.cause instanceof Error
        ? { errorCause: `${error.cause.name}: ${error.cause.message}` }
        : error.cause !== undefined ? { errorCause: String(error.cause) } : {}),
    };
  }
  
  if (typeof error === 'string') {
    return { errorMessage: error };
  }
  
  return { errorMessage: String(error) };
}

/**
 * Format log entry for output.
 */
function formatLogEntry(
  level: LogLevel,
  message: string,
  context: Record<string, unknown>,
  component?: string
): Record<string, unknown> {
  const callContext = getLoggingContext();
  
  const entry: Record<string, unknown> = {
    level,
    levelNum: LOG_LEVELS[level],
    time: globalConfig.timestamp ? new Date().toISOString() : undefined,
    msg: message,
    service: globalConfig.serviceName,
    env: globalConfig.environment,
    ...(component ? { component } : {}),
    ...callContext,
    ...context,
  };
  
  if (globalConfig.redactSecrets) {
    return redact(entry, globalConfig.redactionOptions);
  }
  
  return entry;
}

const COLORS: Record<LogLevel, string> = {
  trace: '\x1b[90m',
  debug: '\x1b[36m',
  info: '\x1b[32m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
  fatal: '\x1b[35m',
};
const RESET = '\x1b[0m';
const DIM = '\x1b[2m';

/**
 * Pretty print a log entry (for development).
 */
function prettyPrint(level: LogLevel, entry: Record<string, unknown>): string {
  const { time, msg, component, correlationId, ...rest } = entry;
  delete rest.level;
  delete rest.levelNum;
  delete rest.service;
  delete rest.env;
  
  const levelStr = level.toUpperCase().padEnd(5);
  const timeStr = typeof time === 'string' ? time.split('T')[1]?.replace('Z', '') ?? '' : '';
  const componentStr = typeof component === 'string' ? `[${component}]` : '';
  const correlationStr = typeof correlationId === 'string' ? `[${correlationId.slice(0, 8)}]` : '';
  const contextStr = Object.keys(rest).length > 0 ? ` ${DIM}${JSON.stringify(rest)}${RESET}` : '';
  
  return `${DIM}${timeStr}${RESET} ${COLORS[level]}${levelStr}${RESET} ${correlationStr}${componentStr} ${String(msg)}${contextStr}`;
}

// ─────────────────────────────────────────────────────────────────────────────────
// OUTPUT
// ─────────────────────────────────────────────────────────────────────────────────

function writeLog(level: LogLevel, entry: Record<string, unknown>): void {
  const output = globalConfig.pretty ? prettyPrint(level, entry) : JSON.stringify(entry);
  
  if (level === 'error' || level === 'fatal') {
    console.error(output);
  } else if (level === 'warn') {
    console.warn(output);
  } else {
    console.log(output);
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// LOGGER IMPLEMENTATION
// ─────────────────────────────────────────────────────────────────────────────────

function createLoggerImpl(options: LoggerOptions = {}): ILogger {
  const { component, context: baseContext = {} } = options;
  
  const levelNum = LOG_LEVELS[getEffectiveLevel()];
  
  const log = (level: LogLevel, message: string, context: Record<string, unknown> = {}): void => {
    if (LOG_LEVELS[level] < levelNum) {
      return;
    }
    writeLog(level, formatLogEntry(level, message, { ...baseContext, ...context }, component));
  };
  
  const logWithError = (
    level: LogLevel,
    message: string,
    error?: unknown,
    context: Record<string, unknown> = {}
  ): void => {
    if (LOG_LEVELS[level] < levelNum) {
      return;
    }
    const errorContext = error !== undefined ? formatError(error) : {};
    writeLog(level, formatLogEntry(level, message, { ...baseContext, ...context, ...errorContext }, component));
  };
  
  return {
    trace: (message, context) => log('trace', message, context),
    debug: (message, context) => log('debug', message, context),
    info: (message, context) => log('info', message, context),
    warn: (message, context) => log('warn', message, context),
    error: (message, error, context) => logWithError('error', message, error, context),
    fatal: (message, error, context) => logWithError('fatal', message, error, context),
    
    child: (childOptions: LoggerOptions): ILogger => createLoggerImpl({
      component: childOptions.component ?? component,
      context: { ...baseContext, ...childOptions.context },
    }),
    
    isLevelEnabled: (level: LogLevel): boolean => LOG_LEVELS[level] >= levelNum,
  };
}

// ─────────────────────────────────────────────────────────────────────────────────
// PUBLIC API
// ─────────────────────────────────────────────────────────────────────────────────

let rootLogger: ILogger | null = null;

/**
 * Get the root logger or create a child logger.
 */
export function getLogger(options?: LoggerOptions): ILogger {
  if (!rootLogger) {
    rootLogger = createLoggerImpl();
  }
  
  if (options) {
    return rootLogger.child(options);
  }
  
  return rootLogger;
}

/**
 * Reset the root logger and its configuration (for testing).
 */
export function resetLogger(): void {
  rootLogger = null;
  globalConfig = { ...DEFAULT_LOGGER_CONFIG };
}
