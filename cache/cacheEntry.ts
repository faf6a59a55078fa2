import { isRecord } from '../shared/guards.js';

/**
 * Epoch milliseconds; injectable so tests can move time
 */
export type Clock = () => number;

/**
 * Persisted form of an entry
 */
export interface CacheEntryRecord<V = unknown> {
  value: V;
  createdAt: number;
  ttlSeconds: number;
  accessCount: number;
  lastAccessedAt: number | null;
}

export class CacheEntry<V = unknown> {
  accessCount = 0;
  lastAccessedAt: number | null = null;

  constructor(
    readonly value: V,
    readonly createdAt: number,
    readonly ttlSeconds: number,
  ) {}

  isExpired(now: number = Date.now()): boolean {
    return now - this.createdAt > this.ttlSeconds * 1000;
  }

  /**
   * Records a successful read
   */
  touch(now: number = Date.now()): void {
    this.accessCount += 1;
    this.lastAccessedAt = now;
  }

  toRecord(): CacheEntryRecord<V> {
    return {
      value: this.value,
      createdAt: this.createdAt,
      ttlSeconds: this.ttlSeconds,
      accessCount: this.accessCount,
      lastAccessedAt: this.lastAccessedAt,
    };
  }

  /**
   * Rebuilds an entry from parsed JSON; null when the shape is wrong
   */
  static fromRecord(input: unknown): CacheEntry | null {
    if (!isRecord(input) || !('value' in input)) return null;
    const { value, createdAt, ttlSeconds, accessCount, lastAccessedAt } = input;
    if (typeof createdAt !== 'number' || typeof ttlSeconds !== 'number') return null;

    const entry = new CacheEntry(value, createdAt, ttlSeconds);
    if (typeof accessCount === 'number') entry.accessCount = accessCount;
    if (typeof lastAccessedAt === 'number') entry.lastAccessedAt = lastAccessedAt;
    return entry;
  }
}
