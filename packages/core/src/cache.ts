export interface TtlCache<K, V> {
  get(key: K): V | undefined;
  set(key: K, value: V, ttlMs?: number): void;
  delete(key: K): void;
  /** Drops every expired entry and returns how many were removed. */
  expire(): number;
}

type Entry<V> = { value: V; expiresAt: number };

/**
 * Bounded in-memory TTL cache.
 * - entries expire lazily on read, or in bulk via expire()
 * - insertion order doubles as eviction order once maxSize is reached
 */
export class MemoryTtlCache<K, V> implements TtlCache<K, V> {
  private entries = new Map<K, Entry<V>>();

  constructor(
    private defaultTtlMs: number,
    private maxSize: number = 1000,
    private now: () => number = Date.now
  ) {}

  get(key: K) {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return undefined;
    }
    return entry.value;
  }

  set(key: K, value: V, ttlMs: number = this.defaultTtlMs) {
    this.entries.delete(key);
    this.entries.set(key, { value, expiresAt: this.now() + ttlMs });

    while (this.entries.size > this.maxSize) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }

  delete(key: K) {
    this.entries.delete(key);
  }

  expire() {
    const now = this.now();
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt <= now) {
        this.entries.delete(key);
        removed += 1;
      }
    }
    return removed;
  }

  size() {
    return this.entries.size;
  }
}
