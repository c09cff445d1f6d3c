import { CONFIG } from '../constants/config-constants.js';
import { TEXT } from '../constants/text-constants.js';
import { deepFreeze, redactSensitiveValue, sanitizeContext, sanitizeError } from './security.js';

export class SecretsError extends Error {
  public readonly code: string;
  public readonly context?: Readonly<Record<string, unknown>>;

  constructor(
    code: string,
    message: string,
    context?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    // Sanitize message to ensure no secrets
    super(redactSensitiveValue(message), options);
    this.name = 'SecretsError';
    this.code = code;

    // Sanitize and freeze context to prevent tampering
    if (context) {
      this.context = deepFreeze(sanitizeContext(context));
    }

    Object.setPrototypeOf(this, SecretsError.prototype);
  }

  toJSON(): Readonly<Record<string, unknown>> {
    const json = {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context
    };
    return deepFreeze(json);
  }
}

export class ValidationError extends SecretsError {
  constructor(code: string, message: string, field?: string) {
    // Only include field name, never the value
    const context = field ? { field } : undefined;
    super(code, message, context);
    this.name = 'ValidationError';
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

export class ConfigurationError extends SecretsError {
  constructor(message: string, field?: string) {
    const context = field ? { field } : undefined;
    super(CONFIG.ERROR_CODE_INVALID_CONFIG, message, context);
    this.name = 'ConfigurationError';
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

export class SecretNotFoundError extends SecretsError {
  constructor(secretKey: string, path: string) {
    super(
      CONFIG.ERROR_CODE_SECRET_NOT_FOUND,
      `${TEXT.ERROR_SECRET_NOT_FOUND}: ${path}`,
      { secretKey: secretKey.substring(0, CONFIG.MAX_SECRET_KEY_LENGTH), path }
    );
    this.name = 'SecretNotFoundError';
    Object.setPrototypeOf(this, SecretNotFoundError.prototype);
  }
}

export class SecretReadError extends SecretsError {
  constructor(path: string, cause: unknown, message: string = TEXT.ERROR_READ_FAILED) {
    super(
      CONFIG.ERROR_CODE_READ_FAILED,
      `${message} ${path}: ${sanitizeError(cause)}`,
      { path },
      { cause }
    );
    this.name = 'SecretReadError';
    Object.setPrototypeOf(this, SecretReadError.prototype);
  }
}

export class SecretClosedError extends SecretsError {
  constructor(secretKey: string) {
    super(
      CONFIG.ERROR_CODE_SECRET_CLOSED,
      `${TEXT.ERROR_SECRET_CLOSED}: ${secretKey}`,
      { secretKey }
    );
    this.name = 'SecretClosedError';
    Object.setPrototypeOf(this, SecretClosedError.prototype);
  }
}

export class RegistryClosedError extends SecretsError {
  constructor() {
    super(CONFIG.ERROR_CODE_REGISTRY_CLOSED, TEXT.ERROR_REGISTRY_CLOSED);
    this.name = 'RegistryClosedError';
    Object.setPrototypeOf(this, RegistryClosedError.prototype);
  }
}

export class WatchActivationError extends SecretsError {
  constructor(secretKey: string, cause: unknown) {
    super(
      CONFIG.ERROR_CODE_WATCH_ACTIVATION_FAILED,
      `${TEXT.ERROR_WATCH_ACTIVATION_FAILED} ${secretKey}: ${sanitizeError(cause)}`,
      { secretKey },
      { cause }
    );
    this.name = 'WatchActivationError';
    Object.setPrototypeOf(this, WatchActivationError.prototype);
  }
}

export class WatchError extends SecretsError {
  constructor(message: string, cause: unknown) {
    super(
      CONFIG.ERROR_CODE_WATCH_FAILED,
      `${message}: ${sanitizeError(cause)}`,
      undefined,
      { cause }
    );
    this.name = 'WatchError';
    Object.setPrototypeOf(this, WatchError.prototype);
  }
}

/**
 * Check for a Node.js system error code such as ENOENT
 */
export function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

/**
 * Wrap an unknown thrown value so it can be recorded as a last error
 */
export function toSecretsError(error: unknown, message: string = TEXT.ERROR_UNKNOWN): SecretsError {
  if (error instanceof SecretsError) {
    return error;
  }

  return new SecretsError(
    CONFIG.ERROR_CODE_UNKNOWN,
    `${message}: ${sanitizeError(error)}`,
    { errorType: error instanceof Error ? error.name : typeof error },
    { cause: error }
  );
}
