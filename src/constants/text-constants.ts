export const TEXT = {
  // Error messages
  ERROR_EMPTY_SECRET_KEY: 'Secret key cannot be empty',
  ERROR_SECRET_KEY_TOO_LONG: 'Secret key exceeds maximum length',
  ERROR_INVALID_SECRET_KEY: 'Secret key must name a file directly under the base path',
  ERROR_SECRET_NOT_FOUND: 'Secret file not found',
  ERROR_READ_FAILED: 'Failed to read secret file',
  ERROR_LIST_FAILED: 'Failed to list secret directory',
  ERROR_SECRET_CLOSED: 'Secret is closed',
  ERROR_REGISTRY_CLOSED: 'Secret registry is closed',
  ERROR_WATCH_ACTIVATION_FAILED: 'Failed to start watching secret',
  ERROR_WATCHER_CREATE_FAILED: 'Failed to create file watcher',
  ERROR_WATCH_BASE_PATH_FAILED: 'Failed to add base path to watcher',
  ERROR_WATCH_STREAM_FAILED: 'File watcher reported an error',
  ERROR_WATCH_CLOSE_FAILED: 'Failed to close file watcher',
  ERROR_WATCHER_CLOSED: 'File watcher is closed',
  ERROR_DISPATCH_FAILED: 'Secret dispatch loop failed',
  ERROR_INVALID_CONFIG: 'Invalid configuration',
  ERROR_INVALID_CONFIG_JSON: 'Invalid JSON in configuration file',
  ERROR_INVALID_BASE_PATH: 'Base path must be a non-empty string',
  ERROR_UNKNOWN: 'Unexpected error',

  // Log messages
  LOG_REGISTRY_OPENED: 'Secret registry opened',
  LOG_REGISTRY_CLOSED: 'Secret registry closed',
  LOG_SECRET_LOADED: 'Secret loaded',
  LOG_SECRET_CHANGED: 'Secret changed',
  LOG_SECRET_CLOSED: 'Secret closed',
  LOG_SECRET_UNWATCHABLE: 'Secret re-read failed, closing secret',
  LOG_SUBSCRIBER_DROPPED: 'Dropped unresponsive subscriber',
  LOG_WATCH_ACTIVATED: 'Secret watch activated',
  LOG_HIDDEN_ENTRY_CHANGED: 'Hidden entry changed, refreshing loaded secrets',
  LOG_CONFIG_LOADED: 'Configuration loaded',
  LOG_WATCHING: 'Watching secrets',
  LOG_SHUTDOWN_SIGNAL: 'Shutdown signal received',

  // Field names
  FIELD_SECRET_KEY: 'secretKey',
  FIELD_BASE_PATH: 'basePath',

  // Doctor CLI messages
  DOCTOR_HEADER: 'secrets-watch doctor',
  DOCTOR_CHECKING_CONFIG: 'Checking configuration...',
  DOCTOR_CHECKING_DIRECTORY: 'Checking secret directory...',
  DOCTOR_CHECKING_SECRETS: 'Checking secret files...',
  DOCTOR_CHECKING_WATCHER: 'Checking file watcher...',
  DOCTOR_CONFIG_VALID: 'Configuration is valid',
  DOCTOR_CONFIG_INVALID: 'Configuration is invalid',
  DOCTOR_DIRECTORY_OK: 'Secret directory is readable',
  DOCTOR_DIRECTORY_MISSING: 'Secret directory cannot be read',
  DOCTOR_SECRETS_OK: 'All secret files are readable',
  DOCTOR_SECRETS_NONE: 'No secret files found',
  DOCTOR_SECRETS_EMPTY: 'Some secret files are empty',
  DOCTOR_SECRETS_UNREADABLE: 'Some secret files cannot be read',
  DOCTOR_SECRETS_MISSING: 'Configured secrets are missing',
  DOCTOR_WATCHER_OK: 'File watcher can be started',
  DOCTOR_WATCHER_FAILED: 'File watcher cannot be started',
  DOCTOR_SUMMARY: 'Summary',
  DOCTOR_ALL_PASSED: 'All checks passed',
  DOCTOR_HAS_WARNINGS: 'Checks passed with warnings',
  DOCTOR_HAS_ERRORS: 'Checks failed',
  DOCTOR_CLI_FAILED: 'Doctor command failed',

  // Watch CLI messages
  WATCH_CLI_FAILED: 'Watch command failed',

  // Usage
  CLI_USAGE: 'Usage: secrets-watch <doctor|watch> [configPath] | --version',

  // Schema generation
  SCHEMA_TITLE: 'secrets-watch configuration',
  SCHEMA_DESCRIPTION: 'Configuration for the secrets-watch command line tools',
  SCHEMA_BASE_PATH_DESC: 'Directory holding one file per secret',
  SCHEMA_SECRET_KEY_DESC: 'File name of one secret directly under the base path',
  SCHEMA_SECRETS_DESC: 'Secrets to watch; every visible file when omitted',
  SCHEMA_LOG_LEVEL_DESC: 'Minimum level written to stderr',
  SCHEMA_GENERATION_SUCCESS: 'JSON schema generated',
  SCHEMA_GENERATION_FAILED: 'Failed to generate JSON schema'
} as const;

