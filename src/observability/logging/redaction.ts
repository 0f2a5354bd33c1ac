// ═══════════════════════════════════════════════════════════════════════════════
// REDACTION — Keep Credentials Out of Log Output
// Broker Resilience — Observability
// ═══════════════════════════════════════════════════════════════════════════════

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export interface RedactionOptions {
  /** Additional key fragments to redact (case-insensitive) */
  readonly extraKeys?: readonly string[];
  
  /** Replacement marker */
  readonly replacement?: string;
  
  /** Maximum depth to walk */
  readonly maxDepth?: number;
}

// ─────────────────────────────────────────────────────────────────────────────────
// CONSTANTS
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Key fragments whose values are never logged.
 */
export const SENSITIVE_KEY_FRAGMENTS: readonly string[] = [
  'password',
  'secret',
  'token',
  'apikey',
  'api_key',
  'authorization',
  'credential',
];

const DEFAULT_REPLACEMENT = '[REDACTED]';
const DEFAULT_MAX_DEPTH = 5;

// ─────────────────────────────────────────────────────────────────────────────────
// REDACTION
// ─────────────────────────────────────────────────────────────────────────────────

function isSensitiveKey(key: string, extraKeys: readonly string[]): boolean {
  const lower = key.toLowerCase();
  return SENSITIVE_KEY_FRAGMENTS.some(fragment => lower.includes(fragment))
    || extraKeys.some(fragment => lower.includes(fragment.toLowerCase()));
}

function redactValue(
  value: unknown,
  options: Required<RedactionOptions>,
  depth: number
): unknown {
  if (depth > options.maxDepth) return '[MAX_DEPTH]';
  
  if (Array.isArray(value)) {
    return value.map(item => redactValue(item, options, depth + 1));
  }
  
  if (value !== null && typeof value === 'object' && !(value instanceof Error)) {
    const result: Record<string, unknown> = {};
    for (const [key, inner] of Object.entries(value)) {
      result[key] = isSensitiveKey(key, options.extraKeys)
        ? options.replacement
        : redactValue(inner, options, depth + 1);
    }
    return result;
  }
  
  return value;
}

/**
 * Redact sensitive keys from a log entry.
 */
export function redact(
  entry: Record<string, unknown>,
  options: RedactionOptions = {}
): Record<string, unknown> {
  const resolved: Required<RedactionOptions> = {
    extraKeys: options.extraKeys ?? [],
    replacement: options.replacement ?? DEFAULT_REPLACEMENT,
    maxDepth: options.maxDepth ?? DEFAULT_MAX_DEPTH,
  };
  
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(entry)) {
    result[key] = isSensitiveKey(key, resolved.extraKeys)
      ? resolved.replacement
      : redactValue(value, resolved, 1);
  }
  return result;
}
