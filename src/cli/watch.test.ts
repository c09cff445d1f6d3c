import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { WatchCLI } from './watch.js';
import { ConfigLoader } from '../services/config-loader.service.js';
import { FrozenSecretsWatchConfig } from '../schemas/config.schema.js';
import { CONFIG } from '../constants/config-constants.js';
import { TEXT } from '../constants/text-constants.js';
import { SecretNotFoundError, WatchError } from '../utils/errors.js';
import { setLogLevel } from '../utils/logging.js';
import {
  FakeWatchSourceFactory,
  MemoryFileReader,
  secretPath,
  settle,
  TEST_BASE_PATH
} from '../test-utils/secret-test-helpers.js';

function staticConfig(config: Partial<FrozenSecretsWatchConfig> = {}): ConfigLoader {
  const frozen: FrozenSecretsWatchConfig = {
    version: CONFIG.CONFIG_VERSION,
    basePath: TEST_BASE_PATH,
    ...config
  };
  return {
    loadConfig: async () => frozen,
    getConfigPath: () => 'test-config.json'
  };
}

interface LogLine {
  level: string;
  message: string;
  [key: string]: unknown;
}

describe('WatchCLI', () => {
  let reader: MemoryFileReader;
  let factory: FakeWatchSourceFactory;
  let logLines: LogLine[];

  beforeEach(() => {
    logLines = [];
    vi.spyOn(console, 'error').mockImplementation((line: unknown) => {
      logLines.push(JSON.parse(String(line)));
    });

    reader = new MemoryFileReader();
    reader.createDir(TEST_BASE_PATH);
    factory = new FakeWatchSourceFactory();
  });

  afterEach(() => {
    setLogLevel(CONFIG.DEFAULT_LOG_LEVEL);
    vi.restoreAllMocks();
  });

  function watchCommand(config: Partial<FrozenSecretsWatchConfig> = {}): WatchCLI {
    return new WatchCLI(undefined, {
      configLoader: staticConfig(config),
      fileReader: reader,
      watchSourceFactory: factory
    });
  }

  function changeLines(): LogLine[] {
    return logLines.filter(line => line.level === CONFIG.LOG_LEVEL_INFO && line.message === TEXT.LOG_SECRET_CHANGED);
  }

  it('should log each change by key without the value', async () => {
    reader.writeFile(secretPath('api-token'), 'placeholder-one');
    const cli = watchCommand({ secrets: ['api-token'] });
    await cli.start();

    reader.writeFile(secretPath('api-token'), 'placeholder-two');
    factory.source.simulateWrite(secretPath('api-token'));
    await settle();

    expect(changeLines()).toHaveLength(1);
    expect(changeLines()[0]?.secretKey).toBe('api-token');
    expect(logLines.filter(line => JSON.stringify(line).includes('placeholder-'))).toEqual([]);

    await cli.stop();
  });

  it('should follow every visible secret when none are configured', async () => {
    reader.writeFile(secretPath('zeta'), 'z1');
    reader.writeFile(secretPath('alpha'), 'a1');
    reader.writeFile(secretPath('..data'), '');
    const cli = watchCommand();
    const registry = await cli.start();

    const watching = logLines.find(line => line.message === TEXT.LOG_WATCHING);
    expect(watching?.keys).toEqual(['alpha', 'zeta']);
    expect(factory.source.addCalls).toEqual([TEST_BASE_PATH, secretPath('alpha'), secretPath('zeta')]);

    await cli.stop();
    expect(registry.isClosed()).toBe(true);
  });

  it('should apply the configured log level', async () => {
    reader.writeFile(secretPath('api-token'), 'placeholder-one');
    const cli = watchCommand({ secrets: ['api-token'], logLevel: 'WARN' });
    await cli.start();

    reader.writeFile(secretPath('api-token'), 'placeholder-two');
    factory.source.simulateWrite(secretPath('api-token'));
    await settle();

    expect(changeLines()).toEqual([]);
    await cli.stop();
  });

  it('should close the registry when a configured secret is missing', async () => {
    const cli = watchCommand({ secrets: ['absent'] });

    await expect(cli.start()).rejects.toBeInstanceOf(SecretNotFoundError);
    expect(factory.source.closed).toBe(true);
  });

  it('should finish when the watcher fails', async () => {
    reader.writeFile(secretPath('api-token'), 'placeholder-one');
    const cli = watchCommand({ secrets: ['api-token'] });
    const registry = await cli.start();

    factory.source.simulateError(new Error('event queue overflow'));
    await cli.whenFinished();

    expect(registry.isClosed()).toBe(true);
    expect(registry.lastError()).toBeInstanceOf(WatchError);
  });

  it('should finish once stopped', async () => {
    reader.writeFile(secretPath('api-token'), 'placeholder-one');
    const cli = watchCommand({ secrets: ['api-token'] });
    const registry = await cli.start();

    await cli.stop();

    await expect(cli.whenFinished()).resolves.toBeUndefined();
    expect(registry.lastError()).toBeUndefined();
  });
});
