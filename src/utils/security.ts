import { CONFIG } from '../constants/config-constants.js';

/**
 * Security utilities for sanitization and redaction
 */

/**
 * Apply basic redaction patterns
 */
function applyBasicRedaction(text: string): string {
  return text
    .replace(CONFIG.REDACT_URL_AUTH_PATTERN, CONFIG.SANITIZE_REPLACEMENT)
    .replace(CONFIG.REDACT_JWT_PATTERN, CONFIG.SANITIZE_REPLACEMENT)
    .replace(CONFIG.REDACT_BEARER_TOKEN_PATTERN, CONFIG.SANITIZE_REPLACEMENT)
    .replace(CONFIG.SANITIZE_SECRET_PATTERN, CONFIG.SANITIZE_REPLACEMENT);
}

/**
 * Mask long mixed alphanumeric runs; pure words such as long file names stay
 */
function applyTokenRedaction(text: string): string {
  return text.replace(CONFIG.REDACT_GENERIC_TOKEN, (match) => {
    if (/^[a-zA-Z]+$/.test(match)) return match;
    if (/[a-zA-Z]/.test(match) && /[0-9_-]/.test(match)) {
      return CONFIG.SANITIZE_REPLACEMENT;
    }
    return match;
  });
}

export function redactSensitiveValue(value: string): string {
  return applyTokenRedaction(applyBasicRedaction(value));
}

/**
 * Check if an object key may carry secret material
 */
function isSensitiveKey(key: string): boolean {
  const lowerKey = key.toLowerCase();
  if (CONFIG.IDENTIFIER_FIELD_NAMES.some(identifier => identifier === lowerKey)) {
    return false;
  }
  return CONFIG.SENSITIVE_FIELD_NAMES.some(sensitive =>
    lowerKey === sensitive || lowerKey.includes(sensitive)
  );
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep sanitize a value; sensitive fields are replaced, strings are redacted
 */
export function deepSanitizeObject(obj: unknown, maxDepth: number = CONFIG.MAX_SANITIZE_DEPTH): unknown {
  if (obj === null || obj === undefined) {
    return obj;
  }

  if (maxDepth <= 0) {
    return CONFIG.SANITIZE_REPLACEMENT;
  }

  if (typeof obj === 'string') {
    return redactSensitiveValue(obj);
  }

  if (typeof obj === 'number' || typeof obj === 'boolean') {
    return obj;
  }

  if (Array.isArray(obj)) {
    return obj.map(item => deepSanitizeObject(item, maxDepth - 1));
  }

  if (isRecord(obj)) {
    const sanitized: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      sanitized[key] = isSensitiveKey(key)
        ? CONFIG.SANITIZE_REPLACEMENT
        : deepSanitizeObject(value, maxDepth - 1);
    }
    return sanitized;
  }

  return CONFIG.SANITIZE_REPLACEMENT;
}

/**
 * Sanitize a context record, keeping it a record
 */
export function sanitizeContext(context: Record<string, unknown>): Record<string, unknown> {
  const sanitized = deepSanitizeObject(context);
  return isRecord(sanitized) ? sanitized : {};
}

/**
 * Make an object deeply immutable
 */
export function deepFreeze<T>(obj: T): Readonly<T> {
  if (obj === null || typeof obj !== 'object') {
    return obj;
  }

  Object.freeze(obj);

  for (const value of Object.values(obj)) {
    if (value && typeof value === 'object' && !Object.isFrozen(value)) {
      deepFreeze(value);
    }
  }

  return obj;
}

/**
 * Reduce an unknown thrown value to a single redacted line
 */
export function sanitizeError(error: unknown): string {
  if (error instanceof Error) {
    const firstLine = error.message.split('\n')[0] ?? CONFIG.EMPTY_STRING_FALLBACK;
    return redactSensitiveValue(firstLine);
  }

  if (typeof error === 'string') {
    return redactSensitiveValue(error);
  }

  return CONFIG.SANITIZE_REPLACEMENT;
}
