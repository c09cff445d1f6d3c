import { describe, it, expect, beforeEach, vi } from 'vitest';
import { tmpdir } from 'os';
import { join } from 'path';
import { watch } from 'chokidar';
import { ChokidarWatchSourceFactory } from './chokidar-watch-source.js';
import { WatchSource } from '../interfaces/watch-source.interface.js';
import { TEXT } from '../constants/text-constants.js';

interface FakeWatcher {
  emit(event: string, ...args: unknown[]): boolean;
  add: ReturnType<typeof vi.fn>;
  unwatch: ReturnType<typeof vi.fn>;
  close: ReturnType<typeof vi.fn>;
}

const created = vi.hoisted(() => {
  const watchers: FakeWatcher[] = [];
  return watchers;
});

vi.mock('chokidar', async () => {
  const { EventEmitter } = await import('events');

  class Watcher extends EventEmitter {
    add = vi.fn();
    unwatch = vi.fn();
    close = vi.fn(async () => undefined);
  }

  return {
    watch: vi.fn(() => {
      const watcher = new Watcher();
      created.push(watcher);
      return watcher;
    })
  };
});

function latestWatcher(): FakeWatcher {
  const watcher = created.at(-1);
  if (!watcher) {
    throw new Error('no watcher created');
  }
  return watcher;
}

describe('ChokidarWatchSource', () => {
  let source: WatchSource;
  let watcher: FakeWatcher;

  beforeEach(async () => {
    vi.clearAllMocks();
    source = await new ChokidarWatchSourceFactory().createWatchSource();
    watcher = latestWatcher();
  });

  it('should create a shallow watcher that skips existing files', () => {
    expect(watch).toHaveBeenCalledWith([], {
      ignoreInitial: true,
      depth: 0,
      persistent: true
    });
  });

  it.each([
    ['add', 'create'],
    ['addDir', 'create'],
    ['change', 'write'],
    ['unlink', 'remove'],
    ['unlinkDir', 'remove']
  ])('should report %s as %s', async (eventName, operation) => {
    watcher.emit('all', eventName, '/mnt/secrets_store/api-token');

    await expect(source.events.receive()).resolves.toEqual({
      done: false,
      value: { path: '/mnt/secrets_store/api-token', operation }
    });
  });

  it('should skip events without a counterpart', () => {
    watcher.emit('all', 'ready', '/mnt/secrets_store');

    expect(source.events.pending).toBe(0);
  });

  it('should queue events until they are taken', async () => {
    watcher.emit('all', 'change', '/a');
    watcher.emit('all', 'change', '/b');

    expect(source.events.pending).toBe(2);
    await expect(source.events.receive()).resolves.toMatchObject({ value: { path: '/a' } });
    await expect(source.events.receive()).resolves.toMatchObject({ value: { path: '/b' } });
  });

  it('should report watcher errors', async () => {
    const failure = new Error('EMFILE: too many open files');
    watcher.emit('error', failure);
    watcher.emit('error', 'raw failure');

    await expect(source.errors.receive()).resolves.toEqual({ done: false, value: failure });
    const wrapped = await source.errors.receive();
    expect(wrapped.value).toBeInstanceOf(Error);
    expect(wrapped.value?.message).toBe('raw failure');
  });

  describe('add', () => {
    it('should watch a path that exists', async () => {
      await source.add(tmpdir());

      expect(watcher.add).toHaveBeenCalledWith(tmpdir());
    });

    it('should reject a path that does not exist', async () => {
      const missing = join(tmpdir(), 'secrets-watch-missing-entry');

      await expect(source.add(missing)).rejects.toMatchObject({ code: 'ENOENT' });
      expect(watcher.add).not.toHaveBeenCalled();
    });

    it('should reject once closed', async () => {
      await source.close();

      await expect(source.add(tmpdir())).rejects.toThrow(TEXT.ERROR_WATCHER_CLOSED);
    });
  });

  describe('remove', () => {
    it('should stop watching the path', async () => {
      await source.remove('/mnt/secrets_store/api-token');

      expect(watcher.unwatch).toHaveBeenCalledWith('/mnt/secrets_store/api-token');
    });
  });

  describe('close', () => {
    it('should close the watcher once and end both streams', async () => {
      await Promise.all([source.close(), source.close()]);

      expect(watcher.close).toHaveBeenCalledTimes(1);
      expect(source.events.closed).toBe(true);
      expect(source.errors.closed).toBe(true);
    });

    it('should end both streams when the watcher fails to close', async () => {
      watcher.close.mockRejectedValueOnce(new Error('watcher busy'));

      await expect(source.close()).rejects.toThrow('watcher busy');
      expect(source.events.closed).toBe(true);
      expect(source.errors.closed).toBe(true);
    });

    it('should drop events emitted after close', async () => {
      await source.close();
      watcher.emit('all', 'change', '/late');

      await expect(source.events.receive()).resolves.toEqual({ done: true, value: undefined });
    });
  });
});
