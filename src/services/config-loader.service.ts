import { promises as fs } from 'fs';
import {
  ConfigValidationError,
  FrozenSecretsWatchConfig,
  SecretsWatchConfig,
  validateSecretsWatchConfig
} from '../schemas/config.schema.js';
import { CONFIG } from '../constants/config-constants.js';
import { TEXT } from '../constants/text-constants.js';
import { ConfigurationError, hasErrorCode } from '../utils/errors.js';
import { isNonEmptyString } from '../utils/validation.js';

export interface ConfigLoader {
  loadConfig(): Promise<FrozenSecretsWatchConfig>;
  getConfigPath(): string;
}

export function defaultConfigPath(): string {
  const fromEnv = process.env[CONFIG.ENV_CONFIG_PATH];
  return isNonEmptyString(fromEnv) ? fromEnv : CONFIG.DEFAULT_CONFIG_FILE;
}

export class ConfigLoaderService implements ConfigLoader {
  private cachedConfig: FrozenSecretsWatchConfig | null = null;

  constructor(
    private readonly configPath: string = defaultConfigPath()
  ) {}

  getConfigPath(): string {
    return this.configPath;
  }

  async loadConfig(): Promise<FrozenSecretsWatchConfig> {
    // Return cached config if already loaded
    if (this.cachedConfig) {
      return this.cachedConfig;
    }

    let content: string;
    try {
      content = await fs.readFile(this.configPath, CONFIG.DEFAULT_ENCODING);
    } catch (error) {
      // A missing file means defaults
      if (hasErrorCode(error, CONFIG.FS_ERROR_ENOENT)) {
        this.cachedConfig = this.freezeConfig({ version: CONFIG.CONFIG_VERSION });
        return this.cachedConfig;
      }
      throw error;
    }

    let data: unknown;
    try {
      data = JSON.parse(content);
    } catch {
      throw new ConfigurationError(`${TEXT.ERROR_INVALID_CONFIG_JSON}: ${this.configPath}`);
    }

    try {
      this.cachedConfig = this.freezeConfig(validateSecretsWatchConfig(data));
    } catch (error) {
      if (error instanceof ConfigValidationError) {
        throw new ConfigurationError(error.message);
      }
      throw error;
    }
    return this.cachedConfig;
  }

  private freezeConfig(config: SecretsWatchConfig): FrozenSecretsWatchConfig {
    return Object.freeze({
      version: config.version,
      basePath: config.basePath ?? CONFIG.DEFAULT_BASE_PATH,
      logLevel: config.logLevel,
      secrets: config.secrets
        ? Object.freeze([...new Set(config.secrets)].sort())
        : undefined
    });
  }
}
