import type { Clock } from '../clock.js';
import { systemClock } from '../clock.js';

interface CacheEntry<V> {
  value: V;
  expiresAt: number;
}

export interface CacheStats {
  hits: number;
  misses: number;
  sets: number;
  evictions: number;
  expirations: number;
  size: number;
  hitRate: number;
}

/**
 * Map-backed LRU cache with a fixed TTL per entry. Map iteration order is insertion
 * order, so the first key is always the least recently used one.
 */
export class LRUCache<V> {
  private cache = new Map<string, CacheEntry<V>>();
  private hits = 0;
  private misses = 0;
  private sets = 0;
  private evictions = 0;
  private expirations = 0;

  constructor(
    private readonly maxSize: number,
    private readonly ttlMs: number,
    private readonly clock: Clock = systemClock
  ) {}

  get(key: string): V | undefined {
    const entry = this.cache.get(key);
    if (!entry) {
      this.misses++;
      return undefined;
    }

    if (entry.expiresAt <= this.clock()) {
      this.cache.delete(key);
      this.expirations++;
      this.misses++;
      return undefined;
    }

    // Move to end (most recently used)
    this.cache.delete(key);
    this.cache.set(key, entry);
    this.hits++;
    return entry.value;
  }

  set(key: string, value: V): void {
    const entry = { value, expiresAt: this.clock() + this.ttlMs };
    this.sets++;

    // If key exists, just update it (delete + re-add to move to end)
    if (this.cache.has(key)) {
      this.cache.delete(key);
      this.cache.set(key, entry);
      return;
    }

    // New key: evict oldest entry if at capacity
    if (this.cache.size >= this.maxSize) {
      const oldest = this.cache.keys().next();
      if (!oldest.done) {
        this.cache.delete(oldest.value);
        this.evictions++;
      }
    }

    this.cache.set(key, entry);
  }

  delete(key: string): boolean {
    return this.cache.delete(key);
  }

  /** Remove every entry whose key starts with `prefix` */
  deleteByPrefix(prefix: string): number {
    let deleted = 0;
    for (const key of [...this.cache.keys()]) {
      if (key.startsWith(prefix)) {
        this.cache.delete(key);
        deleted++;
      }
    }
    return deleted;
  }

  clear(): void {
    this.cache.clear();
  }

  size(): number {
    return this.cache.size;
  }

  cleanupExpired(): number {
    const now = this.clock();
    let deleted = 0;

    for (const [key, entry] of this.cache) {
      if (entry.expiresAt <= now) {
        this.cache.delete(key);
        deleted++;
      }
    }

    this.expirations += deleted;
    return deleted;
  }

  stats(): CacheStats {
    const lookups = this.hits + this.misses;
    return {
      hits: this.hits,
      misses: this.misses,
      sets: this.sets,
      evictions: this.evictions,
      expirations: this.expirations,
      size: this.cache.size,
      hitRate: lookups === 0 ? 0 : this.hits / lookups,
    };
  }
}
