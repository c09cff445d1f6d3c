export type ChannelResult<T> = IteratorResult<T, undefined>;

/**
 * Receiving side of a channel, as handed to consumers.
 */
export interface ReadonlyChannel<T> extends AsyncIterable<T> {
  /** Next value, or `done` once the channel is closed and drained. */
  receive(): Promise<ChannelResult<T>>;
  /** Stop receiving. Buffered values are kept for pending `receive` calls. */
  close(): void;
  readonly closed: boolean;
  /** Number of values sent but not yet received. */
  readonly pending: number;
}

interface Slot<T> {
  readonly value: T;
}

/**
 * Async channel with a fixed buffer. Sends never wait: `trySend` either
 * hands the value over or reports that the buffer is full.
 */
export class Channel<T> implements ReadonlyChannel<T> {
  private readonly buffer: Slot<T>[] = [];
  private readonly receivers: Array<(result: ChannelResult<T>) => void> = [];
  private isClosed = false;

  constructor(private readonly capacity: number = Number.POSITIVE_INFINITY) {}

  get closed(): boolean {
    return this.isClosed;
  }

  get pending(): number {
    return this.buffer.length;
  }

  trySend(value: T): boolean {
    if (this.isClosed) {
      return false;
    }

    const receiver = this.receivers.shift();
    if (receiver) {
      receiver({ done: false, value });
      return true;
    }

    if (this.buffer.length >= this.capacity) {
      return false;
    }

    this.buffer.push({ value });
    return true;
  }

  receive(): Promise<ChannelResult<T>> {
    const slot = this.buffer.shift();
    if (slot) {
      return Promise.resolve({ done: false, value: slot.value });
    }

    if (this.isClosed) {
      return Promise.resolve({ done: true, value: undefined });
    }

    return new Promise(resolve => {
      this.receivers.push(resolve);
    });
  }

  close(): void {
    if (this.isClosed) {
      return;
    }
    this.isClosed = true;

    // Receivers only wait on an empty buffer
    for (const receiver of this.receivers.splice(0)) {
      receiver({ done: true, value: undefined });
    }
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return {
      next: () => this.receive(),
      return: () => {
        this.close();
        return Promise.resolve({ done: true, value: undefined });
      }
    };
  }
}
