import { dirname, basename } from 'path';
import { DirEntry, FileReader, FileStat } from '../interfaces/file-reader.interface.js';
import { Secret } from '../interfaces/secret.interface.js';
import { WatchEvent, WatchOperation, WatchSource, WatchSourceFactory } from '../interfaces/watch-source.interface.js';
import { FileSecret } from '../services/file-secret.js';
import { Channel, ChannelResult, ReadonlyChannel } from '../utils/channel.js';

export const TEST_BASE_PATH = '/mnt/secrets_store';

export function secretPath(key: string, basePath: string = TEST_BASE_PATH): string {
  return `${basePath}/${key}`;
}

function systemError(code: string, syscall: string, path: string): Error {
  return Object.assign(new Error(`${code}: ${syscall} '${path}'`), { code, path });
}

/**
 * In-memory file system implementing the registry's file reader
 */
export class MemoryFileReader implements FileReader {
  private readonly files = new Map<string, Buffer>();
  private readonly dirs = new Set<string>();
  private readonly readFailures = new Map<string, Error>();
  private readonly reads = new Map<string, number>();

  writeFile(path: string, content: string | Buffer): void {
    this.files.set(path, typeof content === 'string' ? Buffer.from(content, 'utf-8') : Buffer.from(content));
    this.dirs.add(dirname(path));
  }

  deleteFile(path: string): void {
    this.files.delete(path);
  }

  createDir(path: string): void {
    this.dirs.add(path);
  }

  failReads(path: string, error: Error): void {
    this.readFailures.set(path, error);
  }

  clearReadFailure(path: string): void {
    this.readFailures.delete(path);
  }

  readCount(path: string): number {
    return this.reads.get(path) ?? 0;
  }

  async readFile(path: string): Promise<Buffer> {
    this.reads.set(path, this.readCount(path) + 1);

    const failure = this.readFailures.get(path);
    if (failure) {
      throw failure;
    }

    const content = this.files.get(path);
    if (!content) {
      throw systemError('ENOENT', 'open', path);
    }
    return Buffer.from(content);
  }

  async stat(path: string): Promise<FileStat> {
    if (this.files.has(path)) {
      return { isFile: () => true };
    }
    if (this.dirs.has(path)) {
      return { isFile: () => false };
    }
    throw systemError('ENOENT', 'stat', path);
  }

  async readDir(path: string): Promise<readonly DirEntry[]> {
    if (!this.dirs.has(path)) {
      throw systemError('ENOENT', 'scandir', path);
    }

    const entry = (name: string, isDirectory: boolean): DirEntry => ({
      name,
      isFile: () => !isDirectory,
      isDirectory: () => isDirectory,
      isSymbolicLink: () => false
    });

    const files = [...this.files.keys()]
      .filter(file => dirname(file) === path)
      .map(file => entry(basename(file), false));
    const dirs = [...this.dirs]
      .filter(dir => dir !== path && dirname(dir) === path)
      .map(dir => entry(basename(dir), true));

    return [...files, ...dirs];
  }
}

/**
 * Watch source driven by the test: events are only reported for watched
 * paths or paths inside a watched directory.
 */
export class FakeWatchSource implements WatchSource {
  readonly events = new Channel<WatchEvent>();
  readonly errors = new Channel<Error>();
  readonly addCalls: string[] = [];
  closeCalls = 0;
  closeError: Error | undefined;

  private readonly watched = new Set<string>();
  private readonly addFailures = new Map<string, Error>();
  private isClosed = false;

  get closed(): boolean {
    return this.isClosed;
  }

  isWatching(path: string): boolean {
    return this.watched.has(path);
  }

  failAdd(path: string, error: Error): void {
    this.addFailures.set(path, error);
  }

  async add(path: string): Promise<void> {
    this.addCalls.push(path);
    if (this.isClosed) {
      throw new Error('watcher is closed');
    }
    const failure = this.addFailures.get(path);
    if (failure) {
      throw failure;
    }
    this.watched.add(path);
  }

  async remove(path: string): Promise<void> {
    if (this.isClosed) {
      throw new Error('watcher is closed');
    }
    this.watched.delete(path);
  }

  async close(): Promise<void> {
    this.closeCalls += 1;
    if (!this.isClosed) {
      this.isClosed = true;
      this.events.close();
      this.errors.close();
    }
    if (this.closeError) {
      throw this.closeError;
    }
  }

  simulate(path: string, operation: WatchOperation = 'write'): boolean {
    if (this.isClosed) {
      return false;
    }
    if (!this.watched.has(path) && !this.watched.has(dirname(path))) {
      return false;
    }
    return this.events.trySend({ path, operation });
  }

  simulateWrite(path: string): boolean {
    return this.simulate(path, 'write');
  }

  simulateError(error: Error): boolean {
    return this.errors.trySend(error);
  }
}

export class FakeWatchSourceFactory implements WatchSourceFactory {
  readonly source = new FakeWatchSource();
  private creationError: Error | undefined;

  failWith(error: Error): void {
    this.creationError = error;
  }

  async createWatchSource(): Promise<WatchSource> {
    if (this.creationError) {
      throw this.creationError;
    }
    return this.source;
  }
}

export function asFileSecret(secret: Secret): FileSecret {
  if (!(secret instanceof FileSecret)) {
    throw new Error(`expected a FileSecret for ${secret.id}`);
  }
  return secret;
}

/**
 * Receive from a channel, failing the test after `timeoutMs`
 */
export async function receiveWithin<T>(
  channel: ReadonlyChannel<T>,
  timeoutMs: number = 1000
): Promise<ChannelResult<T>> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`no value within ${timeoutMs}ms`)), timeoutMs);
  });
  try {
    return await Promise.race([channel.receive(), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Let the dispatch loop drain everything already queued
 */
export async function settle(): Promise<void> {
  for (let round = 0; round < 3; round++) {
    await new Promise<void>(resolve => setImmediate(resolve));
  }
}
