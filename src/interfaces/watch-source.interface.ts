import type { ReadonlyChannel } from '../utils/channel.js';

export type WatchOperation = 'create' | 'write' | 'remove' | 'rename' | 'chmod';

export interface WatchEvent {
  /** Absolute, or relative to the registry base path. */
  readonly path: string;
  readonly operation: WatchOperation;
}

/**
 * A set of watched paths with one stream of change events and one stream
 * of errors. Both channels are closed when the source is closed.
 */
export interface WatchSource {
  add(path: string): Promise<void>;
  remove(path: string): Promise<void>;
  readonly events: ReadonlyChannel<WatchEvent>;
  readonly errors: ReadonlyChannel<Error>;
  close(): Promise<void>;
}

export interface WatchSourceFactory {
  createWatchSource(): Promise<WatchSource>;
}
