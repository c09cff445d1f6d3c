import { describe, it, expect } from 'vitest';
import { isHiddenEntry, isNonEmptyString, isVisibleSecretEntry, validateSecretKey } from './validation.js';
import type { DirEntry } from '../interfaces/file-reader.interface.js';
import { ValidationError } from './errors.js';
import { CONFIG } from '../constants/config-constants.js';
import { TEXT } from '../constants/text-constants.js';

function validationFailure(key: string): unknown {
  try {
    validateSecretKey(key);
  } catch (error) {
    return error;
  }
  return undefined;
}

describe('validateSecretKey', () => {
  it.each(['api-token', 'db.password', 'TLS_CERT', '..data-like'])('should accept %s', (key) => {
    expect(validateSecretKey(key)).toBe(key);
  });

  it('should accept a key of maximum length', () => {
    const key = 'k'.repeat(CONFIG.MAX_SECRET_KEY_LENGTH);
    expect(validateSecretKey(key)).toBe(key);
  });

  it('should reject an empty key', () => {
    const error = validationFailure('');

    expect(error).toBeInstanceOf(ValidationError);
    expect(error).toMatchObject({
      code: CONFIG.ERROR_CODE_INVALID_KEY,
      message: TEXT.ERROR_EMPTY_SECRET_KEY,
      context: { field: TEXT.FIELD_SECRET_KEY }
    });
  });

  it('should reject an overlong key', () => {
    expect(validationFailure('k'.repeat(CONFIG.MAX_SECRET_KEY_LENGTH + 1))).toMatchObject({
      message: TEXT.ERROR_SECRET_KEY_TOO_LONG
    });
  });

  it.each(['nested/key', '/absolute', 'windows\\key', '.', '..'])('should reject %s', (key) => {
    expect(validationFailure(key)).toMatchObject({
      code: CONFIG.ERROR_CODE_INVALID_KEY,
      message: TEXT.ERROR_INVALID_SECRET_KEY
    });
  });
});

describe('isHiddenEntry', () => {
  it('should treat dot-prefixed names as hidden', () => {
    expect(isHiddenEntry('..data')).toBe(true);
    expect(isHiddenEntry('.gitkeep')).toBe(true);
    expect(isHiddenEntry('api-token')).toBe(false);
  });
});

describe('isVisibleSecretEntry', () => {
  function entry(name: string, kind: 'file' | 'dir' | 'link' | 'other'): DirEntry {
    return {
      name,
      isFile: () => kind === 'file',
      isDirectory: () => kind === 'dir',
      isSymbolicLink: () => kind === 'link'
    };
  }

  it('should accept visible files and symlinks', () => {
    expect(isVisibleSecretEntry(entry('api-token', 'file'))).toBe(true);
    expect(isVisibleSecretEntry(entry('db-password', 'link'))).toBe(true);
  });

  it('should reject hidden entries and directories', () => {
    expect(isVisibleSecretEntry(entry('..data', 'link'))).toBe(false);
    expect(isVisibleSecretEntry(entry('nested', 'dir'))).toBe(false);
  });

  it('should reject sockets and pipes', () => {
    expect(isVisibleSecretEntry(entry('agent.sock', 'other'))).toBe(false);
  });
});

describe('isNonEmptyString', () => {
  it('should reject blank and non-string values', () => {
    expect(isNonEmptyString('value')).toBe(true);
    expect(isNonEmptyString('   ')).toBe(false);
    expect(isNonEmptyString(42)).toBe(false);
    expect(isNonEmptyString(undefined)).toBe(false);
  });
});
