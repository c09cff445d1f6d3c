import { promises as fs } from 'fs';
import { watch, type FSWatcher } from 'chokidar';
import { CONFIG } from '../constants/config-constants.js';
import { TEXT } from '../constants/text-constants.js';
import { WatchEvent, WatchOperation, WatchSource, WatchSourceFactory } from '../interfaces/watch-source.interface.js';
import { Channel } from '../utils/channel.js';
import { Once } from '../utils/concurrent.js';

const OPERATION_BY_CHOKIDAR_EVENT: Readonly<Record<string, WatchOperation>> = {
  add: 'create',
  addDir: 'create',
  change: 'write',
  unlink: 'remove',
  unlinkDir: 'remove'
};

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Watch source backed by chokidar. Raw events are translated and queued
 * unbounded, so the emitter never waits on the dispatch loop.
 */
export class ChokidarWatchSource implements WatchSource {
  private readonly eventChannel = new Channel<WatchEvent>();
  private readonly errorChannel = new Channel<Error>();
  private readonly closeOnce = new Once<Promise<void>>();

  constructor(private readonly watcher: FSWatcher) {
    watcher.on('all', (eventName: string, path: string) => {
      const operation = OPERATION_BY_CHOKIDAR_EVENT[eventName];
      if (operation) {
        this.eventChannel.trySend({ path, operation });
      }
    });
    watcher.on('error', (error: unknown) => {
      this.errorChannel.trySend(toError(error));
    });
  }

  get events(): Channel<WatchEvent> {
    return this.eventChannel;
  }

  get errors(): Channel<Error> {
    return this.errorChannel;
  }

  async add(path: string): Promise<void> {
    if (this.closeOnce.done) {
      throw new Error(TEXT.ERROR_WATCHER_CLOSED);
    }
    // chokidar silently waits for paths that do not exist yet
    await fs.stat(path);
    this.watcher.add(path);
  }

  async remove(path: string): Promise<void> {
    if (this.closeOnce.done) {
      throw new Error(TEXT.ERROR_WATCHER_CLOSED);
    }
    this.watcher.unwatch(path);
  }

  close(): Promise<void> {
    return this.closeOnce.run(async () => {
      try {
        await this.watcher.close();
      } finally {
        this.eventChannel.close();
        this.errorChannel.close();
      }
    });
  }
}

export class ChokidarWatchSourceFactory implements WatchSourceFactory {
  async createWatchSource(): Promise<WatchSource> {
    const watcher = watch([], {
      ignoreInitial: CONFIG.WATCH_IGNORE_INITIAL,
      depth: CONFIG.WATCH_DEPTH,
      persistent: true
    });
    return new ChokidarWatchSource(watcher);
  }
}
