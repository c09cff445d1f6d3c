import { CONFIG, LogLevel } from '../constants/config-constants.js';
import { deepSanitizeObject, redactSensitiveValue } from './security.js';

interface LogContext {
  level?: LogLevel;
  [key: string]: unknown;
}

const LEVEL_RANK: Readonly<Record<LogLevel, number>> = {
  ERROR: 0,
  WARN: 1,
  INFO: 2,
  DEBUG: 3
};

function isLogLevel(value: unknown): value is LogLevel {
  return CONFIG.LOG_LEVELS.some(level => level === value);
}

function initialLogLevel(): LogLevel {
  const fromEnv = process.env[CONFIG.ENV_LOG_LEVEL]?.toUpperCase();
  return isLogLevel(fromEnv) ? fromEnv : CONFIG.DEFAULT_LOG_LEVEL;
}

let minimumLevel: LogLevel = initialLogLevel();

export function setLogLevel(level: LogLevel): void {
  minimumLevel = level;
}

export function getLogLevel(): LogLevel {
  return minimumLevel;
}

function redactMessage(message: string): string {
  // Keep only the first line of anything carrying a stack trace
  const firstLine = message.includes(CONFIG.STACK_TRACE_PATTERN)
    ? message.split('\n')[0] ?? CONFIG.EMPTY_STRING_FALLBACK
    : message;
  return redactSensitiveValue(firstLine);
}

export function writeError(message: string, context: LogContext = {}): void {
  const { level = CONFIG.LOG_LEVEL_ERROR, ...rest } = context;

  if (LEVEL_RANK[level] > LEVEL_RANK[minimumLevel]) {
    return;
  }

  const redactedRest = deepSanitizeObject(rest);
  const logEntry = {
    timestamp: new Date().toISOString(),
    level,
    message: redactMessage(message),
    ...(typeof redactedRest === 'object' && redactedRest !== null ? redactedRest : {})
  };

  // Write to stderr as structured JSON
  console.error(JSON.stringify(logEntry));
}

export function writeWarn(message: string, context: Record<string, unknown> = {}): void {
  writeError(message, { ...context, level: CONFIG.LOG_LEVEL_WARN });
}

export function writeInfo(message: string, context: Record<string, unknown> = {}): void {
  writeError(message, { ...context, level: CONFIG.LOG_LEVEL_INFO });
}

export function writeDebug(message: string, context: Record<string, unknown> = {}): void {
  writeError(message, { ...context, level: CONFIG.LOG_LEVEL_DEBUG });
}
