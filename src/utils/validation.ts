import { CONFIG } from '../constants/config-constants.js';
import { TEXT } from '../constants/text-constants.js';
import { ValidationError } from './errors.js';
import type { DirEntry } from '../interfaces/file-reader.interface.js';

export function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.trim().length > 0;
}

/**
 * A secret key names one file directly under the base path, so separators
 * and the dot entries are rejected along with the empty key.
 */
export function validateSecretKey(secretKey: string): string {
  if (secretKey.length < CONFIG.MIN_SECRET_KEY_LENGTH) {
    throw new ValidationError(
      CONFIG.ERROR_CODE_INVALID_KEY,
      TEXT.ERROR_EMPTY_SECRET_KEY,
      TEXT.FIELD_SECRET_KEY
    );
  }

  if (secretKey.length > CONFIG.MAX_SECRET_KEY_LENGTH) {
    throw new ValidationError(
      CONFIG.ERROR_CODE_INVALID_KEY,
      TEXT.ERROR_SECRET_KEY_TOO_LONG,
      TEXT.FIELD_SECRET_KEY
    );
  }

  if (
    CONFIG.PATH_SEPARATOR_PATTERN.test(secretKey) ||
    CONFIG.RESERVED_SECRET_KEYS.some(reserved => reserved === secretKey)
  ) {
    throw new ValidationError(
      CONFIG.ERROR_CODE_INVALID_KEY,
      TEXT.ERROR_INVALID_SECRET_KEY,
      TEXT.FIELD_SECRET_KEY
    );
  }

  return secretKey;
}

export function isHiddenEntry(name: string): boolean {
  return name.startsWith(CONFIG.HIDDEN_ENTRY_PREFIX);
}

/**
 * A directory entry that can back a secret: a visible file or symlink.
 */
export function isVisibleSecretEntry(entry: DirEntry): boolean {
  return !isHiddenEntry(entry.name) && (entry.isFile() || entry.isSymbolicLink());
}
