export interface CacheOptions {
  // Seconds
  ttl?: number;
}

export interface CacheStats {
  hits: number;
  misses: number;
  entries: number;
}

interface Entry<T> {
  value: T;
  expiresAt: number;
}

/**
 * Short-lived in-process read-through layer.
 * Entries expire after their TTL or on explicit invalidation.
 */
export class MemoryCache<T> {
  private readonly entries = new Map<string, Entry<T>>();
  private hits = 0;
  private misses = 0;

  constructor(
    private readonly defaultTtlSeconds = 300,
    private readonly clock: () => number = Date.now,
  ) {}

  get(key: string): T | null {
    const entry = this.entries.get(key);
    if (!entry) {
      this.misses++;
      return null;
    }
    if (entry.expiresAt <= this.clock()) {
      this.entries.delete(key);
      this.misses++;
      return null;
    }
    this.hits++;
    return entry.value;
  }

  set(key: string, value: T, options: CacheOptions = {}): void {
    const ttl = options.ttl ?? this.defaultTtlSeconds;
    this.entries.set(key, { value, expiresAt: this.clock() + ttl * 1000 });
  }

  /**
   * Returns true when an entry was removed
   */
  invalidate(key: string): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  getStats(): CacheStats {
    return { hits: this.hits, misses: this.misses, entries: this.entries.size };
  }
}
