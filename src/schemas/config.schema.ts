import { z } from 'zod';
import { CONFIG } from '../constants/config-constants.js';
import { TEXT } from '../constants/text-constants.js';

const BasePathSchema = z.string()
  .trim()
  .min(CONFIG.MIN_BASE_PATH_LENGTH, { message: TEXT.ERROR_INVALID_BASE_PATH })
  .describe(TEXT.SCHEMA_BASE_PATH_DESC);

const SecretKeySchema = z.string()
  .min(CONFIG.MIN_SECRET_KEY_LENGTH, { message: TEXT.ERROR_EMPTY_SECRET_KEY })
  .max(CONFIG.MAX_SECRET_KEY_LENGTH, { message: TEXT.ERROR_SECRET_KEY_TOO_LONG })
  .refine(
    (key) => !CONFIG.PATH_SEPARATOR_PATTERN.test(key) &&
      !CONFIG.RESERVED_SECRET_KEYS.some(reserved => reserved === key),
    { message: TEXT.ERROR_INVALID_SECRET_KEY }
  )
  .describe(TEXT.SCHEMA_SECRET_KEY_DESC);

// Settings the registry itself consumes
export const RegistrySettingsSchema = z.object({
  basePath: BasePathSchema.default(CONFIG.DEFAULT_BASE_PATH)
});

// Config file read by the command line tools
export const SecretsWatchConfigSchema = z.object({
  version: z.literal(CONFIG.CONFIG_VERSION),
  basePath: BasePathSchema.optional(),
  logLevel: z.enum(CONFIG.LOG_LEVELS).describe(TEXT.SCHEMA_LOG_LEVEL_DESC).optional(),
  secrets: z.array(SecretKeySchema).describe(TEXT.SCHEMA_SECRETS_DESC).optional()
});

// Type exports
export type RegistrySettings = z.infer<typeof RegistrySettingsSchema>;
export type SecretsWatchConfig = z.infer<typeof SecretsWatchConfigSchema>;

// Frozen config type for immutable configurations
export type FrozenSecretsWatchConfig = Readonly<{
  version: typeof CONFIG.CONFIG_VERSION;
  basePath: string;
  logLevel?: SecretsWatchConfig['logLevel'];
  secrets?: readonly string[];
}>;

function formatIssues(error: z.ZodError): string {
  const messages = error.errors.map(err => {
    const path = err.path.join('.');
    return path ? `${path}: ${err.message}` : err.message;
  });
  return `${TEXT.ERROR_INVALID_CONFIG}:\n${messages.join('\n')}`;
}

export class ConfigValidationError extends Error {
  constructor(readonly issues: z.ZodError) {
    super(formatIssues(issues));
    this.name = 'ConfigValidationError';
    Object.setPrototypeOf(this, ConfigValidationError.prototype);
  }
}

// Validation function with clear error messages
export function validateSecretsWatchConfig(data: unknown): SecretsWatchConfig {
  const result = SecretsWatchConfigSchema.safeParse(data);
  if (!result.success) {
    throw new ConfigValidationError(result.error);
  }
  return result.data;
}
