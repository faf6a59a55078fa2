import { logger } from '../logger.js';
import { CacheEntry, type Clock } from './cacheEntry.js';
import { cacheKey } from './cacheKey.js';
import { DiskCache } from './diskCache.js';
import { MemoryCache, type MemoryCacheStats } from './memoryCache.js';

export interface CacheSettings {
  enabled: boolean;
  maxMemorySize: number;
  diskCacheDir: string;
  defaultTtlSeconds: number;
}

export type LookupOutcome = 'memory' | 'disk' | 'miss';

export interface CacheManagerOptions {
  clock?: Clock;
  /** observes every lookup, e.g. for metrics */
  onLookup?: (outcome: LookupOutcome) => void;
}

export interface CachedValue<T> {
  value: T;
  source: 'memory' | 'disk' | 'computed';
}

export interface CacheStats {
  enabled: boolean;
  memory: MemoryCacheStats;
  diskEntries: number;
  cacheDir: string;
  hits: number;
  misses: number;
  hitRate: number;
}

export interface CleanupReport {
  expiredMemoryEntriesRemoved: number;
  expiredDiskEntriesRemoved: number;
  memory: MemoryCacheStats;
}

interface Found {
  value: unknown;
  source: 'memory' | 'disk';
}

/**
 * Read-through, write-through composition of the memory and disk tiers.
 *
 * Everything here is advisory: with caching disabled every lookup misses and
 * every computation runs.
 */
export class CacheManager {
  readonly memory: MemoryCache;
  readonly disk: DiskCache;
  private readonly clock: Clock;
  private readonly onLookup?: (outcome: LookupOutcome) => void;
  private hits = 0;
  private misses = 0;

  constructor(
    private readonly settings: CacheSettings,
    options: CacheManagerOptions = {},
  ) {
    this.clock = options.clock ?? Date.now;
    this.onLookup = options.onLookup;
    this.memory = new MemoryCache(settings.maxMemorySize, this.clock);
    this.disk = new DiskCache(settings.diskCacheDir, this.clock);
  }

  get enabled(): boolean {
    return this.settings.enabled;
  }

  keyFor(operation: string, args?: readonly unknown[], kwargs?: Readonly<Record<string, unknown>>): string {
    return cacheKey(operation, args, kwargs);
  }

  /**
   * Memory first, then disk. A disk hit is promoted into memory with the
   * default TTL.
   */
  async get(key: string): Promise<unknown> {
    const found = await this.lookup(key);
    return found?.value;
  }

  async set(key: string, value: unknown, ttlSeconds: number = this.settings.defaultTtlSeconds): Promise<void> {
    if (!this.settings.enabled) return;
    this.memory.set(key, value, ttlSeconds);
    await this.disk.set(key, new CacheEntry(value, this.clock(), ttlSeconds));
  }

  /**
   * Returns the cached value when one passes `isValue`, otherwise computes
   * and stores a fresh one. Errors from `compute` propagate and nothing is
   * stored. `ttlSeconds` may depend on the computed value.
   */
  async getOrCompute<T>(
    key: string,
    ttlSeconds: number | ((value: T) => number),
    compute: () => Promise<T>,
    isValue: (value: unknown) => value is T,
  ): Promise<CachedValue<T>> {
    const found = await this.lookup(key);
    if (found && isValue(found.value)) {
      return { value: found.value, source: found.source };
    }
    if (found) {
      logger.warn({ key, source: found.source }, 'Cached value has unexpected shape, recomputing');
    }

    const value = await compute();
    await this.set(key, value, typeof ttlSeconds === 'function' ? ttlSeconds(value) : ttlSeconds);
    return { value, source: 'computed' };
  }

  async isValid(key: string): Promise<boolean> {
    return (await this.lookup(key)) !== undefined;
  }

  /**
   * Drops the key from both tiers; true when a disk entry existed
   */
  async invalidate(key: string): Promise<boolean> {
    this.memory.delete(key);
    return this.disk.delete(key);
  }

  /**
   * Removes every memory-tier key containing `pattern` (and those keys' disk
   * files). Disk entries whose key is no longer in memory are not found by
   * this sweep; they stay until they expire.
   */
  async invalidatePattern(pattern: string): Promise<number> {
    return this.invalidateMatching(pattern, (key) => key.includes(pattern));
  }

  /**
   * Like `invalidatePattern`, anchored at the start of the key
   */
  async invalidatePrefix(prefix: string): Promise<number> {
    return this.invalidateMatching(prefix, (key) => key.startsWith(prefix));
  }

  async clearAll(): Promise<void> {
    this.memory.clear();
    const removed = await this.disk.clear();
    logger.info({ diskEntriesRemoved: removed }, 'Cache cleared');
  }

  async cleanup(): Promise<CleanupReport> {
    const expiredMemoryEntriesRemoved = this.memory.purgeExpired();
    const expiredDiskEntriesRemoved = await this.disk.cleanupExpired();
    return { expiredMemoryEntriesRemoved, expiredDiskEntriesRemoved, memory: this.memory.stats() };
  }

  private async invalidateMatching(pattern: string, matches: (key: string) => boolean): Promise<number> {
    const matching = this.memory.keys().filter(matches);
    for (const key of matching) {
      await this.invalidate(key);
    }
    logger.info({ pattern, removed: matching.length }, 'Invalidated cache keys by pattern');
    return matching.length;
  }

  async getStats(): Promise<CacheStats> {
    const lookups = this.hits + this.misses;
    return {
      enabled: this.settings.enabled,
      memory: this.memory.stats(),
      diskEntries: await this.disk.count(),
      cacheDir: this.settings.diskCacheDir,
      hits: this.hits,
      misses: this.misses,
      hitRate: lookups === 0 ? 0 : this.hits / lookups,
    };
  }

  private async lookup(key: string): Promise<Found | undefined> {
    if (!this.settings.enabled) return undefined;

    const fromMemory = this.memory.get(key);
    if (fromMemory !== undefined) {
      this.record('memory');
      return { value: fromMemory, source: 'memory' };
    }

    const entry = await this.disk.get(key);
    if (entry) {
      this.memory.set(key, entry.value, this.settings.defaultTtlSeconds);
      this.record('disk');
      return { value: entry.value, source: 'disk' };
    }

    this.record('miss');
    return undefined;
  }

  private record(outcome: LookupOutcome): void {
    if (outcome === 'miss') this.misses++;
    else this.hits++;
    this.onLookup?.(outcome);
  }
}
