/**
 * State containers shared by the registry, its secrets and the dispatch loop.
 *
 * Node.js runs each synchronous section to completion, so every method here
 * is atomic with respect to other callers. Readers get copies, which keeps
 * iteration stable while the loop calls into entries across `await` points.
 */

export class ConcurrentValue<T> {
  constructor(private value: T) {}

  get(): T {
    return this.value;
  }

  set(newValue: T): void {
    this.value = newValue;
  }
}

export class ConcurrentList<T> {
  private values: T[] = [];

  add(value: T): void {
    this.values.push(value);
  }

  /** Copy of the current list; mutating it does not touch the backing storage. */
  get(): T[] {
    return [...this.values];
  }

  /** Replace the whole list with a copy of `newList`. */
  set(newList: readonly T[]): void {
    this.values = [...newList];
  }

  get length(): number {
    return this.values.length;
  }
}

export class ConcurrentMap<K, V> {
  private readonly entries = new Map<K, V>();

  get(key: K): V | undefined {
    return this.entries.get(key);
  }

  set(key: K, value: V): void {
    this.entries.set(key, value);
  }

  delete(key: K): boolean {
    return this.entries.delete(key);
  }

  /** Snapshot for iteration without observing concurrent inserts or deletes. */
  copyMap(): Map<K, V> {
    return new Map(this.entries);
  }

  get size(): number {
    return this.entries.size;
  }
}

/**
 * One-time latch. The first `run` executes its function; every later call,
 * including ones racing the first across an await, gets that first result.
 * For async work the result is the same promise, rejected or not.
 */
export class Once<T> {
  private result: { readonly value: T } | undefined;

  run(fn: () => T): T {
    if (!this.result) {
      this.result = { value: fn() };
    }
    return this.result.value;
  }

  get done(): boolean {
    return this.result !== undefined;
  }
}
