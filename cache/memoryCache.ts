import { logger } from '../logger.js';
import { CacheEntry, type Clock } from './cacheEntry.js';

export interface MemoryCacheStats {
  totalEntries: number;
  expiredEntries: number;
  activeEntries: number;
  maxSize: number;
  utilization: number;
  evictions: number;
}

/**
 * Bounded in-process store with least-recently-used eviction.
 *
 * Recency is the Map's insertion order: every read or write re-inserts its
 * key at the end, so the first key is always the eviction candidate.
 */
export class MemoryCache {
  private readonly entries = new Map<string, CacheEntry>();
  private evictions = 0;

  constructor(
    readonly maxSize: number,
    private readonly clock: Clock = Date.now,
  ) {
    if (!Number.isInteger(maxSize) || maxSize < 1) {
      throw new RangeError(`maxSize must be a positive integer, got ${maxSize}`);
    }
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Live value or undefined; an expired entry is dropped on the way
   */
  get(key: string): unknown {
    const entry = this.entries.get(key);
    if (!entry) return undefined;

    const now = this.clock();
    if (entry.isExpired(now)) {
      this.entries.delete(key);
      return undefined;
    }

    entry.touch(now);
    this.entries.delete(key);
    this.entries.set(key, entry);
    return entry.value;
  }

  set(key: string, value: unknown, ttlSeconds: number): void {
    if (this.entries.has(key)) {
      this.entries.delete(key);
    } else if (this.entries.size >= this.maxSize) {
      this.evictLeastRecent();
    }
    this.entries.set(key, new CacheEntry(value, this.clock(), ttlSeconds));
  }

  /**
   * Presence check without touching recency or access counts
   */
  has(key: string): boolean {
    const entry = this.entries.get(key);
    return entry !== undefined && !entry.isExpired(this.clock());
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  keys(): string[] {
    return Array.from(this.entries.keys());
  }

  clear(): void {
    this.entries.clear();
  }

  purgeExpired(): number {
    const now = this.clock();
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (entry.isExpired(now)) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  stats(): MemoryCacheStats {
    const now = this.clock();
    let expired = 0;
    for (const entry of this.entries.values()) {
      if (entry.isExpired(now)) expired++;
    }
    return {
      totalEntries: this.entries.size,
      expiredEntries: expired,
      activeEntries: this.entries.size - expired,
      maxSize: this.maxSize,
      utilization: this.entries.size / this.maxSize,
      evictions: this.evictions,
    };
  }

  private evictLeastRecent(): void {
    const oldest = this.entries.keys().next();
    if (oldest.done) return;
    this.entries.delete(oldest.value);
    this.evictions++;
    logger.debug({ key: oldest.value, maxSize: this.maxSize }, 'Evicted least recently used cache entry');
  }
}
