/**
 * Run-scoped LRU cache with single-flight loading: concurrent callers for one key share
 * a single loader promise. A loader that rejects leaves nothing cached.
 */
export class MetadataCache<V> {
  private readonly entries = new Map<string, V>();
  private readonly inFlight = new Map<string, Promise<V>>();
  private hitCount = 0;
  private missCount = 0;
  readonly maxEntries: number;

  constructor(maxEntries = 500) {
    this.maxEntries = Number.isFinite(maxEntries) ? Math.max(1, Math.trunc(maxEntries)) : 500;
  }

  get hits(): number {
    return this.hitCount;
  }

  get misses(): number {
    return this.missCount;
  }

  get size(): number {
    return this.entries.size;
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  get(key: string): V | undefined {
    if (!this.entries.has(key)) return undefined;
    const value = this.entries.get(key);
    // Re-insert to mark as most recently used.
    this.entries.delete(key);
    if (value !== undefined) this.entries.set(key, value);
    return value;
  }

  set(key: string, value: V): void {
    if (this.entries.has(key)) this.entries.delete(key);
    this.entries.set(key, value);
    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }

  getOrLoad(key: string, loader: () => Promise<V>): Promise<V> {
    if (this.entries.has(key)) {
      const cached = this.get(key);
      if (cached !== undefined) {
        this.hitCount += 1;
        return Promise.resolve(cached);
      }
    }

    const pending = this.inFlight.get(key);
    if (pending) {
      this.hitCount += 1;
      return pending;
    }

    this.missCount += 1;
    const load = Promise.resolve()
      .then(loader)
      .then((value) => {
        this.set(key, value);
        return value;
      })
      .finally(() => {
        this.inFlight.delete(key);
      });
    this.inFlight.set(key, load);
    return load;
  }

  clear(): void {
    this.entries.clear();
    this.inFlight.clear();
    this.hitCount = 0;
    this.missCount = 0;
  }
}
