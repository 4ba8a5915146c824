/**
 * Error categorization for scenario failures.
 *
 * Scenario runners hand back raw error text (a traceback tail, a timeout
 * notice, an HTTP error body). `categorizeError()` maps it to a category so the
 * classifier can tell "model not loaded" apart from a genuine failure, and so
 * the dashboard can group failures.
 */

export type ErrorCategory =
  | 'MODEL_NOT_LOADED'
  | 'SERIALIZATION_ERROR'
  | 'TIMEOUT'
  | 'CONNECTION_ERROR'
  | 'AUTH_ERROR'
  | 'SHAPE_MISMATCH'
  | 'VALUE_ERROR'
  | 'IMPORT_ERROR'
  | 'UNKNOWN';

export const ERROR_CATEGORIES: readonly ErrorCategory[] = [
  'MODEL_NOT_LOADED',
  'SERIALIZATION_ERROR',
  'TIMEOUT',
  'CONNECTION_ERROR',
  'AUTH_ERROR',
  'SHAPE_MISMATCH',
  'VALUE_ERROR',
  'IMPORT_ERROR',
  'UNKNOWN',
];

// First match wins, so the order matters: "whitelist" messages often mention
// modules, and timeouts often mention connections.
const ERROR_PATTERNS: Array<{ pattern: RegExp; category: ErrorCategory }> = [
  { pattern: /not whitelisted|whitelist/, category: 'SERIALIZATION_ERROR' },
  { pattern: /serializ|pickle|marshal/, category: 'SERIALIZATION_ERROR' },
  { pattern: /timeout|timed out|deadline exceeded/, category: 'TIMEOUT' },
  { pattern: /connection|network|unreachable|refused/, category: 'CONNECTION_ERROR' },
  { pattern: /auth|api.key|unauthorized|forbidden|401|403/, category: 'AUTH_ERROR' },
  { pattern: /not loaded|not available|not deployed|not found.*model/, category: 'MODEL_NOT_LOADED' },
  { pattern: /shape|dimension|size mismatch|expected.*got/, category: 'SHAPE_MISMATCH' },
  { pattern: /nan|inf|invalid value|value error/, category: 'VALUE_ERROR' },
  { pattern: /import|module|no module named|cannot import/, category: 'IMPORT_ERROR' },
];

export function categorizeError(errorText: string): ErrorCategory {
  const lower = errorText.toLowerCase();
  for (const { pattern, category } of ERROR_PATTERNS) {
    if (pattern.test(lower)) {
      return category;
    }
  }
  return 'UNKNOWN';
}

export function isErrorCategory(value: unknown): value is ErrorCategory {
  return typeof value === 'string' && (ERROR_CATEGORIES as readonly string[]).includes(value);
}
