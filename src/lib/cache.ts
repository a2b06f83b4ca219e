type Entry<T> = { value: T; expiresAt: number };

/** Small TTL + LRU map for per-process memoization of lookups. */
export class LRUCache<T> {
  private store = new Map<string, Entry<T>>();

  constructor(
    private ttlMs: number,
    private maxSize: number = 1000,
    private now: () => number = Date.now,
  ) {}

  get size(): number {
    return this.store.size;
  }

  get(key: string): T | null {
    const entry = this.store.get(key);
    if (!entry) return null;

    if (this.now() > entry.expiresAt) {
      this.store.delete(key);
      return null;
    }

    // Refresh LRU order: delete and re-add to end
    this.store.delete(key);
    this.store.set(key, entry);

    return entry.value;
  }

  set(key: string, value: T): void {
    if (this.store.has(key)) {
      this.store.delete(key);
    }

    while (this.store.size >= this.maxSize) {
      const oldestKey = this.store.keys().next().value;
      if (oldestKey !== undefined) this.store.delete(oldestKey);
      else break;
    }

    this.store.set(key, { value, expiresAt: this.now() + this.ttlMs });
  }

  delete(key: string): boolean {
    return this.store.delete(key);
  }

  clear(): void {
    this.store.clear();
  }
}
