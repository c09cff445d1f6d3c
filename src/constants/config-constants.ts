import { PACKAGE_VERSION, PACKAGE_NAME } from '../utils/package-info.js';

export const CONFIG = {
  // Version
  VERSION: PACKAGE_VERSION,
  PACKAGE_NAME: PACKAGE_NAME,
  CONFIG_VERSION: '1.0.0' as const,

  // Secret store
  DEFAULT_BASE_PATH: '/mnt/secrets_store',
  HIDDEN_ENTRY_PREFIX: '.',
  SUBSCRIBER_BUFFER_SIZE: 1,

  // Validation
  MIN_SECRET_KEY_LENGTH: 1,
  MAX_SECRET_KEY_LENGTH: 255,
  RESERVED_SECRET_KEYS: ['.', '..'] as const,
  PATH_SEPARATOR_PATTERN: /[\\/]/,
  MIN_BASE_PATH_LENGTH: 1,

  // Watch operations that trigger a re-read
  ROUTED_WATCH_OPERATIONS: ['create', 'write'] as const,

  // Chokidar settings
  WATCH_DEPTH: 0,
  WATCH_IGNORE_INITIAL: true,

  // Sanitization
  SANITIZE_SECRET_PATTERN: /\b(api[_-]?key|token|password|bearer|credential|private[_-]?key|access[_-]?key)\s*[:=]\s*\S+/gi,
  SANITIZE_REPLACEMENT: '[REDACTED]',
  REDACT_URL_AUTH_PATTERN: /https?:\/\/[^:\s]+:[^@\s]+@[^\s]+/gi,
  REDACT_JWT_PATTERN: /eyJ[a-zA-Z0-9_-]+\.[a-zA-Z0-9_-]+\.[a-zA-Z0-9_-]+/g,
  REDACT_BEARER_TOKEN_PATTERN: /bearer\s+[a-zA-Z0-9\-._~+\/]+=*/gi,
  REDACT_GENERIC_TOKEN: /\b[a-zA-Z0-9_-]{32,}\b/g,
  MAX_SANITIZE_DEPTH: 10,

  // Field names that may carry secret material
  SENSITIVE_FIELD_NAMES: [
    'value', 'content', 'password', 'token', 'credential', 'authorization',
    'apikey', 'api_key', 'private_key', 'client_secret'
  ] as const,

  // Identifiers that are safe to log even though they look sensitive
  IDENTIFIER_FIELD_NAMES: ['secretkey', 'secretkeys', 'key', 'keys', 'path', 'basepath'] as const,

  // File paths
  DEFAULT_CONFIG_FILE: 'secrets-watch.config.json',
  ENV_CONFIG_PATH: 'SECRETS_WATCH_CONFIG',
  ENV_LOG_LEVEL: 'SECRETS_WATCH_LOG_LEVEL',

  // Log levels
  LOG_LEVEL_ERROR: 'ERROR',
  LOG_LEVEL_WARN: 'WARN',
  LOG_LEVEL_INFO: 'INFO',
  LOG_LEVEL_DEBUG: 'DEBUG',
  DEFAULT_LOG_LEVEL: 'INFO',
  LOG_LEVELS: ['ERROR', 'WARN', 'INFO', 'DEBUG'] as const,

  // Error codes
  ERROR_CODE_INVALID_KEY: 'invalid_key',
  ERROR_CODE_INVALID_CONFIG: 'invalid_config',
  ERROR_CODE_SECRET_NOT_FOUND: 'secret_not_found',
  ERROR_CODE_READ_FAILED: 'read_failed',
  ERROR_CODE_SECRET_CLOSED: 'secret_closed',
  ERROR_CODE_REGISTRY_CLOSED: 'registry_closed',
  ERROR_CODE_WATCH_ACTIVATION_FAILED: 'watch_activation_failed',
  ERROR_CODE_WATCH_FAILED: 'watch_failed',
  ERROR_CODE_UNKNOWN: 'unknown_error',

  // Exit codes
  EXIT_CODE_SUCCESS: 0,
  EXIT_CODE_ERROR: 1,
  EXIT_CODE_INVALID_CONFIG: 2,

  // File system error codes
  FS_ERROR_ENOENT: 'ENOENT',
  FS_ERROR_ENOTDIR: 'ENOTDIR',

  // Default values
  DEFAULT_ENCODING: 'utf-8' as const,

  // Process signals
  SIGNAL_INT: 'SIGINT',
  SIGNAL_TERM: 'SIGTERM',

  // URL schemes
  FILE_URL_SCHEME: 'file://',

  // Logging patterns
  STACK_TRACE_PATTERN: '\n    at ',
  EMPTY_STRING_FALLBACK: '',

  // JSON Schema metadata
  JSON_SCHEMA_DRAFT: 'http://json-schema.org/draft-07/schema#',
  JSON_SCHEMA_ID_PREFIX: 'secrets-watch',
  JSON_SCHEMA_VERSION: 'v1.0.0',
  JSON_SCHEMA_FILENAME: 'secrets-watch.config.schema.json',
  JSON_SCHEMA_NAME: 'SecretsWatchConfig',

  // CLI commands
  CLI_COMMAND_DOCTOR: 'doctor',
  CLI_COMMAND_WATCH: 'watch',
  CLI_ARG_HELP_LONG: '--help' as const,
  CLI_ARG_HELP_SHORT: '-h' as const,
  CLI_ARG_VERSION_LONG: '--version' as const,

  // CLI formatting
  CLI_SEPARATOR_LINE: '═'.repeat(60),

  // ANSI color codes for terminal output
  ANSI_RESET: '\x1b[0m',
  ANSI_RED: '\x1b[31m',
  ANSI_GREEN: '\x1b[32m',
  ANSI_YELLOW: '\x1b[33m',
  ANSI_BLUE: '\x1b[34m',
  ANSI_CYAN: '\x1b[36m',
  ANSI_GRAY: '\x1b[90m',

  // JSON formatting
  JSON_INDENT_SIZE: 2
} as const;

export type LogLevel = typeof CONFIG.LOG_LEVELS[number];
