// ═══════════════════════════════════════════════════════════════════════════════
// CONFIG VALIDATION — Zod Parsing with Readable Errors
// Broker Resilience — Configuration
// ═══════════════════════════════════════════════════════════════════════════════

import type { ZodError, ZodTypeAny, output } from 'zod';

/**
 * Thrown when configuration fails schema validation.
 */
export class ConfigValidationError extends Error {
  readonly name = 'ConfigValidationError';
  readonly section: string;
  readonly issues: readonly string[];
  
  constructor(section: string, issues: readonly string[]) {
    super(`Invalid ${section} configuration: ${issues.join('; ')}`);
    this.section = section;
    this.issues = issues;
  }
}

/**
 * Format zod issues as `path: message` lines.
 */
export function formatConfigErrors(error: ZodError): string[] {
  return error.issues.map(issue => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}

/**
 * Parse a configuration section, throwing ConfigValidationError on failure.
 */
export function parseConfig<S extends ZodTypeAny>(
  schema: S,
  input: unknown,
  section: string
): output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ConfigValidationError(section, formatConfigErrors(result.error));
  }
  return result.data;
}
