import { basename, dirname, join, resolve } from 'path';
import { CONFIG } from '../constants/config-constants.js';
import { TEXT } from '../constants/text-constants.js';
import { FileReader } from '../interfaces/file-reader.interface.js';
import { Secret, SecretRegistry } from '../interfaces/secret.interface.js';
import { WatchEvent, WatchOperation, WatchSource, WatchSourceFactory } from '../interfaces/watch-source.interface.js';
import { RegistrySettingsSchema } from '../schemas/config.schema.js';
import { ChannelResult } from '../utils/channel.js';
import { ConcurrentMap, ConcurrentValue, Once } from '../utils/concurrent.js';
import {
  ConfigurationError,
  hasErrorCode,
  RegistryClosedError,
  SecretNotFoundError,
  SecretReadError,
  toSecretsError,
  WatchError
} from '../utils/errors.js';
import { writeDebug, writeError, writeWarn } from '../utils/logging.js';
import { isHiddenEntry, isVisibleSecretEntry, validateSecretKey } from '../utils/validation.js';
import { ChokidarWatchSourceFactory } from './chokidar-watch-source.js';
import { FileSecret } from './file-secret.js';
import { FsFileReader } from './fs-file-reader.js';

export interface SecretRegistryOptions {
  /** Directory holding one file per secret. Defaults to `/mnt/secrets_store`. */
  basePath?: string;
  fileReader?: FileReader;
  watchSourceFactory?: WatchSourceFactory;
}

type DispatchSignal =
  | { readonly kind: 'event'; readonly result: ChannelResult<WatchEvent> }
  | { readonly kind: 'error'; readonly result: ChannelResult<Error> }
  | { readonly kind: 'cancel' };

function isRoutedOperation(operation: WatchOperation): boolean {
  return CONFIG.ROUTED_WATCH_OPERATIONS.some(routed => routed === operation);
}

function resolveBasePath(basePath: string | undefined): string {
  const parsed = RegistrySettingsSchema.safeParse({ basePath });
  if (!parsed.success) {
    throw new ConfigurationError(TEXT.ERROR_INVALID_BASE_PATH, TEXT.FIELD_BASE_PATH);
  }
  return resolve(parsed.data.basePath);
}

/**
 * Open a registry over `basePath`. The shared watch source is created and the
 * base directory registered before the dispatch loop starts.
 */
export async function openSecretRegistry(options: SecretRegistryOptions = {}): Promise<SecretRegistry> {
  const basePath = resolveBasePath(options.basePath);
  const reader = options.fileReader ?? new FsFileReader();
  const factory = options.watchSourceFactory ?? new ChokidarWatchSourceFactory();

  let watchSource: WatchSource;
  try {
    watchSource = await factory.createWatchSource();
  } catch (error) {
    throw new WatchError(TEXT.ERROR_WATCHER_CREATE_FAILED, error);
  }

  try {
    await watchSource.add(basePath);
  } catch (error) {
    const watchError = new WatchError(TEXT.ERROR_WATCH_BASE_PATH_FAILED, error);
    await watchSource.close().catch((closeError: unknown) => {
      writeWarn(TEXT.ERROR_WATCH_CLOSE_FAILED, { basePath, error: String(closeError) });
    });
    throw watchError;
  }

  writeDebug(TEXT.LOG_REGISTRY_OPENED, { basePath });
  return new FileSecretRegistry(basePath, reader, watchSource);
}

/**
 * Maps secret keys to their watched files and routes the shared watch
 * source's events to them from a single dispatch loop.
 */
export class FileSecretRegistry implements SecretRegistry {
  private readonly secrets = new ConcurrentMap<string, FileSecret>();
  private readonly pendingLoads = new ConcurrentMap<string, Promise<FileSecret>>();
  private readonly closed = new ConcurrentValue(false);
  private readonly error = new ConcurrentValue<Error | undefined>(undefined);
  private readonly closeOnce = new Once<Promise<void>>();
  private readonly cancellation = new AbortController();
  private readonly dispatching: Promise<void>;

  constructor(
    private readonly basePath: string,
    private readonly reader: FileReader,
    private readonly watchSource: WatchSource
  ) {
    this.dispatching = this.dispatch();
  }

  async getSecret(secretKey: string): Promise<Secret> {
    this.assertOpen();
    const key = validateSecretKey(secretKey);

    const existing = this.secrets.get(key);
    if (existing && !existing.isClosed()) {
      return existing;
    }
    // A secret closed by a failed re-read is no longer live; load it afresh
    if (existing) {
      this.secrets.delete(key);
    }

    // Concurrent first loads of one key share a single read
    const pending = this.pendingLoads.get(key);
    if (pending) {
      return pending;
    }

    const load = this.loadSecret(key);
    this.pendingLoads.set(key, load);
    try {
      return await load;
    } finally {
      this.pendingLoads.delete(key);
    }
  }

  private async loadSecret(key: string): Promise<FileSecret> {
    const path = join(this.basePath, key);

    try {
      const stat = await this.reader.stat(path);
      if (!stat.isFile()) {
        throw new SecretNotFoundError(key, path);
      }
    } catch (error) {
      if (error instanceof SecretNotFoundError ||
          hasErrorCode(error, CONFIG.FS_ERROR_ENOENT) ||
          hasErrorCode(error, CONFIG.FS_ERROR_ENOTDIR)) {
        throw new SecretNotFoundError(key, path);
      }
      throw new SecretReadError(path, error);
    }

    let content: Buffer;
    try {
      content = await this.reader.readFile(path);
    } catch (error) {
      throw new SecretReadError(path, error);
    }

    // Closed while the file was being read
    this.assertOpen();

    const secret = new FileSecret({
      id: key,
      path,
      initialContent: content,
      reader: this.reader,
      watchSource: this.watchSource
    });
    this.secrets.set(key, secret);
    writeDebug(TEXT.LOG_SECRET_LOADED, { secretKey: key });
    return secret;
  }

  /**
   * Visible secret keys in the base directory: files and symlinks whose
   * names do not start with a dot.
   */
  async listSecretKeys(): Promise<readonly string[]> {
    this.assertOpen();

    try {
      const entries = await this.reader.readDir(this.basePath);
      return entries
        .filter(isVisibleSecretEntry)
        .map(entry => entry.name)
        .sort();
    } catch (error) {
      throw new SecretReadError(this.basePath, error, TEXT.ERROR_LIST_FAILED);
    }
  }

  getBasePath(): string {
    return this.basePath;
  }

  isClosed(): boolean {
    return this.closed.get();
  }

  lastError(): Error | undefined {
    return this.error.get();
  }

  close(): Promise<void> {
    return this.closeOnce.run(() => this.shutdown());
  }

  whenClosed(): Promise<void> {
    return this.dispatching;
  }

  private async shutdown(): Promise<void> {
    this.closed.set(true);
    this.cancellation.abort();

    for (const [key, secret] of this.secrets.copyMap()) {
      secret.close();
      this.secrets.delete(key);
    }

    try {
      await this.watchSource.close();
    } catch (error) {
      const closeError = new WatchError(TEXT.ERROR_WATCH_CLOSE_FAILED, error);
      this.error.set(closeError);
      writeWarn(closeError.message, { basePath: this.basePath, code: closeError.code });
    }

    writeDebug(TEXT.LOG_REGISTRY_CLOSED, { basePath: this.basePath });
  }

  private assertOpen(): void {
    if (this.closed.get()) {
      throw new RegistryClosedError();
    }
  }

  private async dispatch(): Promise<void> {
    const { events, errors } = this.watchSource;
    const signal = this.cancellation.signal;

    const receiveEvent = (): Promise<DispatchSignal> =>
      events.receive().then(result => ({ kind: 'event', result }));
    const receiveError = (): Promise<DispatchSignal> =>
      errors.receive().then(result => ({ kind: 'error', result }));
    const cancelled = new Promise<DispatchSignal>(resolveCancel => {
      signal.addEventListener('abort', () => resolveCancel({ kind: 'cancel' }), { once: true });
    });

    let nextEvent = receiveEvent();
    const nextError = receiveError();

    try {
      while (!signal.aborted) {
        const next = await Promise.race([nextEvent, nextError, cancelled]);

        if (next.kind === 'cancel') {
          return;
        }

        if (next.kind === 'error') {
          if (!next.result.done) {
            const watchError = new WatchError(TEXT.ERROR_WATCH_STREAM_FAILED, next.result.value);
            this.error.set(watchError);
            writeError(watchError.message, { basePath: this.basePath, code: watchError.code });
          }
          return;
        }

        if (next.result.done) {
          return;
        }

        await this.routeChange(next.result.value);
        nextEvent = receiveEvent();
      }
    } catch (error) {
      this.error.set(toSecretsError(error, TEXT.ERROR_DISPATCH_FAILED));
    } finally {
      await this.close();
    }
  }

  private async routeChange(event: WatchEvent): Promise<void> {
    if (!isRoutedOperation(event.operation)) {
      return;
    }

    const changedPath = resolve(this.basePath, event.path);
    const loaded = [...this.secrets.copyMap().values()];

    // Secret volumes swap a hidden `..data` entry rather than writing files
    const hiddenEntryChanged = dirname(changedPath) === this.basePath &&
      isHiddenEntry(basename(changedPath));
    const targets = hiddenEntryChanged
      ? loaded
      : loaded.filter(secret => secret.path === changedPath);

    if (hiddenEntryChanged && targets.length > 0) {
      writeDebug(TEXT.LOG_HIDDEN_ENTRY_CHANGED, { basePath: this.basePath, secrets: targets.length });
    }

    for (const secret of targets) {
      await secret.handleFileChange();
    }
  }
}
