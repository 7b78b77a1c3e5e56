/**
 * Bounded map with least-recently-used eviction. Relies on `Map` keeping
 * insertion order: the first key is always the least recently used one.
 */
export class LruMap<K, V extends {} | null> {
  private readonly entries = new Map<K, V>();

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new RangeError(`LruMap capacity must be a positive integer (got ${capacity})`);
    }
  }

  /** Returns the value and marks the key most recently used. */
  get(key: K): V | undefined {
    const value = this.entries.get(key);
    if (value === undefined) {
      return undefined;
    }

    this.entries.delete(key);
    this.entries.set(key, value);
    return value;
  }

  /** Reads without touching recency. */
  peek(key: K): V | undefined {
    return this.entries.get(key);
  }

  has(key: K): boolean {
    return this.entries.has(key);
  }

  /**
   * Inserts or replaces `key` as most recently used. Returns the entry that
   * was evicted to stay within capacity, if any.
   */
  set(key: K, value: V): [K, V] | undefined {
    if (this.entries.has(key)) {
      this.entries.delete(key);
      this.entries.set(key, value);
      return undefined;
    }

    let evicted: [K, V] | undefined;
    if (this.entries.size >= this.capacity) {
      evicted = this.evictOldest();
    }

    this.entries.set(key, value);
    return evicted;
  }

  delete(key: K): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }

  /** Keys from least to most recently used. */
  keys(): K[] {
    return [...this.entries.keys()];
  }

  private evictOldest(): [K, V] | undefined {
    const oldest = this.entries.entries().next();
    if (oldest.done) {
      return undefined;
    }

    const [key, value] = oldest.value;
    this.entries.delete(key);
    return [key, value];
  }
}
