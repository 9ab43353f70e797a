/**
 * Bounded promise cache. Entries are kept in recency order so the least
 * recently used one is evicted once `maxEntries` is exceeded.
 *
 * Callers racing on the same key share the pending promise, so the loader runs
 * once per key. A rejected load is dropped so the next call retries it.
 */
export class MemoCache<V> {
  private readonly entries = new Map<string, Promise<V>>();

  constructor(readonly maxEntries = 100) {
    if (!Number.isInteger(maxEntries) || maxEntries < 1) {
      throw new RangeError(`maxEntries must be a positive integer, got ${maxEntries}`);
    }
  }

  get size(): number {
    return this.entries.size;
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  getOrLoad(key: string, loader: () => Promise<V>): Promise<V> {
    const cached = this.entries.get(key);
    if (cached) {
      // Re-insert to mark as most recently used
      this.entries.delete(key);
      this.entries.set(key, cached);
      return cached;
    }

    const pending = loader();
    this.entries.set(key, pending);
    this.evictOverflow();

    pending.catch(() => {
      if (this.entries.get(key) === pending) {
        this.entries.delete(key);
      }
    });

    return pending;
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  private evictOverflow() {
    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) return;
      this.entries.delete(oldest.value);
    }
  }
}
