import { CONFIG } from '../constants/config-constants.js';
import { TEXT } from '../constants/text-constants.js';
import { FileReader } from '../interfaces/file-reader.interface.js';
import { Secret } from '../interfaces/secret.interface.js';
import { WatchSource } from '../interfaces/watch-source.interface.js';
import { Channel, ReadonlyChannel } from '../utils/channel.js';
import { ConcurrentList, ConcurrentValue, Once } from '../utils/concurrent.js';
import { SecretClosedError, SecretReadError, WatchActivationError } from '../utils/errors.js';
import { writeDebug, writeWarn } from '../utils/logging.js';

export interface FileSecretInit {
  readonly id: string;
  readonly path: string;
  readonly initialContent: Buffer;
  readonly reader: FileReader;
  readonly watchSource: WatchSource;
}

/**
 * One watched secret file. Watching starts on the first `listenChanges`
 * call; the registry's dispatch loop feeds changes in via `handleFileChange`.
 */
export class FileSecret implements Secret {
  readonly id: string;
  readonly path: string;

  private readonly cachedValue: ConcurrentValue<string>;
  private readonly cachedContent: ConcurrentValue<Buffer>;
  private readonly subscribers = new ConcurrentList<Channel<string>>();
  private readonly closed = new ConcurrentValue(false);
  private readonly error = new ConcurrentValue<Error | undefined>(undefined);
  private readonly watchActivation = new Once<Promise<void>>();
  private readonly closeOnce = new Once<void>();
  private readonly reader: FileReader;
  private readonly watchSource: WatchSource;

  constructor(init: FileSecretInit) {
    this.id = init.id;
    this.path = init.path;
    this.cachedContent = new ConcurrentValue(init.initialContent);
    this.cachedValue = new ConcurrentValue(init.initialContent.toString(CONFIG.DEFAULT_ENCODING));
    this.reader = init.reader;
    this.watchSource = init.watchSource;
  }

  value(): string {
    return this.cachedValue.get();
  }

  async listenChanges(): Promise<ReadonlyChannel<string>> {
    if (this.closed.get()) {
      throw new SecretClosedError(this.id);
    }

    await this.watchActivation.run(() => this.activateWatch());

    // Closed while the watch was being registered
    if (this.closed.get()) {
      throw new SecretClosedError(this.id);
    }

    const channel = new Channel<string>(CONFIG.SUBSCRIBER_BUFFER_SIZE);
    // Drop channels their readers have already closed
    this.subscribers.set([...this.subscribers.get().filter(subscriber => !subscriber.closed), channel]);
    return channel;
  }

  private async activateWatch(): Promise<void> {
    try {
      await this.watchSource.add(this.path);
      writeDebug(TEXT.LOG_WATCH_ACTIVATED, { secretKey: this.id });
    } catch (error) {
      const activationError = new WatchActivationError(this.id, error);
      this.error.set(activationError);
      throw activationError;
    }
  }

  /**
   * Re-read the file and broadcast when its bytes differ from the cached
   * content. A failed read is terminal for this secret.
   */
  async handleFileChange(): Promise<void> {
    if (this.closed.get()) {
      return;
    }

    let content: Buffer;
    try {
      content = await this.reader.readFile(this.path);
    } catch (error) {
      this.error.set(new SecretReadError(this.path, error));
      writeWarn(TEXT.LOG_SECRET_UNWATCHABLE, { secretKey: this.id, code: CONFIG.ERROR_CODE_READ_FAILED });
      this.close();
      return;
    }

    if (this.closed.get() || content.equals(this.cachedContent.get())) {
      return;
    }

    const newValue = content.toString(CONFIG.DEFAULT_ENCODING);
    this.cachedContent.set(content);
    this.cachedValue.set(newValue);
    this.broadcast(newValue);
  }

  private broadcast(newValue: string): void {
    const active: Channel<string>[] = [];
    for (const subscriber of this.subscribers.get()) {
      if (subscriber.trySend(newValue)) {
        active.push(subscriber);
      } else {
        // Still holding the previous update, or closed by its reader
        subscriber.close();
        writeWarn(TEXT.LOG_SUBSCRIBER_DROPPED, { secretKey: this.id });
      }
    }
    this.subscribers.set(active);
    writeDebug(TEXT.LOG_SECRET_CHANGED, { secretKey: this.id, subscribers: active.length });
  }

  close(): void {
    this.closeOnce.run(() => {
      // Stop new subscribers before closing the existing ones
      this.closed.set(true);

      for (const subscriber of this.subscribers.get()) {
        subscriber.close();
      }
      this.subscribers.set([]);
      writeDebug(TEXT.LOG_SECRET_CLOSED, { secretKey: this.id });
    });
  }

  isClosed(): boolean {
    return this.closed.get();
  }

  lastError(): Error | undefined {
    return this.error.get();
  }

  subscriberCount(): number {
    return this.subscribers.length;
  }
}
