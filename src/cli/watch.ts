import { ConfigLoader, ConfigLoaderService } from '../services/config-loader.service.js';
import { openSecretRegistry, SecretRegistryOptions } from '../services/file-secret-registry.js';
import { Secret, SecretRegistry } from '../interfaces/secret.interface.js';
import { ReadonlyChannel } from '../utils/channel.js';
import { CONFIG } from '../constants/config-constants.js';
import { TEXT } from '../constants/text-constants.js';
import { setLogLevel, writeInfo, writeWarn } from '../utils/logging.js';

export interface WatchCommandOptions extends Omit<SecretRegistryOptions, 'basePath'> {
  configLoader?: ConfigLoader;
}

interface Subscription {
  readonly secret: Secret;
  readonly changes: ReadonlyChannel<string>;
}

async function followChanges({ secret, changes }: Subscription): Promise<void> {
  for await (const _value of changes) {
    writeInfo(TEXT.LOG_SECRET_CHANGED, { secretKey: secret.id });
  }
  const error = secret.lastError();
  if (error) {
    writeWarn(error.message, { secretKey: secret.id });
  }
}

/**
 * Logs one line per secret change until the registry closes. Values are
 * never logged, only keys.
 */
export class WatchCLI {
  private readonly configLoader: ConfigLoader;
  private registry: SecretRegistry | undefined;
  private finished: Promise<void> = Promise.resolve();

  constructor(configPath?: string, private readonly options: WatchCommandOptions = {}) {
    this.configLoader = options.configLoader ?? new ConfigLoaderService(configPath);
  }

  async start(): Promise<SecretRegistry> {
    const config = await this.configLoader.loadConfig();
    if (config.logLevel) {
      setLogLevel(config.logLevel);
    }
    writeInfo(TEXT.LOG_CONFIG_LOADED, { basePath: config.basePath });

    const registry = await openSecretRegistry({
      basePath: config.basePath,
      fileReader: this.options.fileReader,
      watchSourceFactory: this.options.watchSourceFactory
    });
    this.registry = registry;

    let keys: readonly string[];
    const subscriptions: Subscription[] = [];
    try {
      keys = config.secrets ?? await registry.listSecretKeys();
      for (const key of keys) {
        const secret = await registry.getSecret(key);
        subscriptions.push({ secret, changes: await secret.listenChanges() });
      }
    } catch (error) {
      await registry.close();
      throw error;
    }

    const followers = subscriptions.map(followChanges);
    writeInfo(TEXT.LOG_WATCHING, { basePath: config.basePath, keys: [...keys] });

    // Followers end when their channel closes, which close() guarantees
    this.finished = Promise.all(followers).then(() => registry.whenClosed());
    return registry;
  }

  whenFinished(): Promise<void> {
    return this.finished;
  }

  async stop(): Promise<void> {
    await this.registry?.close();
    await this.finished;
  }

  async run(): Promise<void> {
    await this.start();

    const shutdown = (signal: string): void => {
      writeInfo(TEXT.LOG_SHUTDOWN_SIGNAL, { signal });
      this.stop().then(
        () => process.exit(CONFIG.EXIT_CODE_SUCCESS),
        () => process.exit(CONFIG.EXIT_CODE_ERROR)
      );
    };
    process.once(CONFIG.SIGNAL_INT, shutdown);
    process.once(CONFIG.SIGNAL_TERM, shutdown);

    await this.whenFinished();
    const error = this.registry?.lastError();
    if (error) {
      writeWarn(error.message);
      process.exit(CONFIG.EXIT_CODE_ERROR);
    }
  }
}
