import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { mkdtemp, rm } from 'fs/promises';
import os from 'os';
import path from 'path';
import { CacheManager, type CacheSettings, type LookupOutcome } from '../cache/cacheManager.js';

const isNumber = (value: unknown): value is number => typeof value === 'number';

describe('CacheManager', () => {
  let dir: string;
  let now: number;
  let settings: CacheSettings;
  let lookups: LookupOutcome[];

  const manager = (overrides: Partial<CacheSettings> = {}) =>
    new CacheManager(
      { ...settings, ...overrides },
      { clock: () => now, onLookup: (outcome) => lookups.push(outcome) },
    );

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'cache-manager-'));
    now = 1_700_000_000_000;
    lookups = [];
    settings = { enabled: true, maxMemorySize: 8, diskCacheDir: dir, defaultTtlSeconds: 3600 };
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('returns what was stored', async () => {
    const cache = manager();
    await cache.set('k', { value: 1 });
    expect(await cache.get('k')).toEqual({ value: 1 });
    expect(lookups).toEqual(['memory']);
  });

  it('forgets entries after their TTL', async () => {
    const cache = manager();
    await cache.set('k', 42, 1);
    now += 2_000;

    expect(await cache.get('k')).toBeUndefined();
    expect(await cache.isValid('k')).toBe(false);
    const stats = await cache.getStats();
    expect(stats.memory.activeEntries).toBe(0);
    expect(stats.diskEntries).toBe(0);
  });

  it('promotes a disk hit into memory', async () => {
    await manager().set('k', 'persisted');

    const fresh = manager();
    expect(await fresh.get('k')).toBe('persisted');
    expect(await fresh.get('k')).toBe('persisted');
    expect(lookups).toEqual(['disk', 'memory']);
    expect(fresh.memory.keys()).toEqual(['k']);
  });

  it('computes once and serves the cached value afterwards', async () => {
    const cache = manager();
    const compute = vi.fn(async () => 7);

    const first = await cache.getOrCompute('k', 60, compute, isNumber);
    const second = await cache.getOrCompute('k', 60, compute, isNumber);

    expect(first).toEqual({ value: 7, source: 'computed' });
    expect(second).toEqual({ value: 7, source: 'memory' });
    expect(compute).toHaveBeenCalledTimes(1);
  });

  it('recomputes when the cached value has the wrong shape', async () => {
    const cache = manager();
    await cache.set('k', 'not a number');

    const result = await cache.getOrCompute('k', 60, async () => 3, isNumber);
    expect(result).toEqual({ value: 3, source: 'computed' });
    expect(await cache.get('k')).toBe(3);
  });

  it('stores nothing when the computation fails', async () => {
    const cache = manager();
    await expect(
      cache.getOrCompute('k', 60, async () => Promise.reject(new Error('upstream down')), isNumber),
    ).rejects.toThrow('upstream down');
    expect(await cache.isValid('k')).toBe(false);
  });

  it('invalidates by substring across both tiers', async () => {
    const cache = manager();
    await cache.set('pce|periods:24', 1);
    await cache.set('pce|periods:12', 2);
    await cache.set('initial_claims', 3);

    expect(await cache.invalidatePattern('pce')).toBe(2);
    expect(cache.memory.keys()).toEqual(['initial_claims']);
    expect((await cache.getStats()).diskEntries).toBe(1);
  });

  it('invalidates by prefix without touching keys that merely contain it', async () => {
    const cache = manager();
    await cache.set('pce|periods:24', 1);
    await cache.set('core_pce|periods:24', 2);

    expect(await cache.invalidatePrefix('pce|')).toBe(1);
    expect(cache.memory.keys()).toEqual(['core_pce|periods:24']);
    expect((await cache.getStats()).diskEntries).toBe(1);
  });

  it('derives the TTL from the computed value', async () => {
    const cache = manager();
    const ttlFor = (value: number): number => (value < 0 ? 10 : 3600);
    await cache.getOrCompute('short', ttlFor, async () => -1, isNumber);
    await cache.getOrCompute('long', ttlFor, async () => 1, isNumber);
    now += 11_000;

    expect(await cache.isValid('short')).toBe(false);
    expect(await cache.isValid('long')).toBe(true);
  });

  it('invalidates a single key', async () => {
    const cache = manager();
    await cache.set('k', 1);
    expect(await cache.invalidate('k')).toBe(true);
    expect(await cache.invalidate('k')).toBe(false);
  });

  it('reports hits, misses and the hit rate', async () => {
    const cache = manager();
    await cache.set('k', 1);
    await cache.get('k');
    await cache.get('absent');

    const stats = await cache.getStats();
    expect(stats).toMatchObject({ enabled: true, hits: 1, misses: 1, hitRate: 0.5, diskEntries: 1, cacheDir: dir });
  });

  it('cleans expired entries out of both tiers', async () => {
    const cache = manager();
    await cache.set('short', 1, 1);
    await cache.set('long', 2, 3600);
    now += 5_000;

    const report = await cache.cleanup();
    expect(report.expiredMemoryEntriesRemoved).toBe(1);
    expect(report.expiredDiskEntriesRemoved).toBe(1);
    expect(report.memory.totalEntries).toBe(1);
  });

  it('clears everything', async () => {
    const cache = manager();
    await cache.set('a', 1);
    await cache.set('b', 2);
    await cache.clearAll();

    const stats = await cache.getStats();
    expect(stats.memory.totalEntries).toBe(0);
    expect(stats.diskEntries).toBe(0);
  });

  it('always computes when disabled', async () => {
    const cache = manager({ enabled: false });
    await cache.set('k', 1);
    expect(await cache.get('k')).toBeUndefined();

    const compute = vi.fn(async () => 5);
    await cache.getOrCompute('k', 60, compute, isNumber);
    await cache.getOrCompute('k', 60, compute, isNumber);
    expect(compute).toHaveBeenCalledTimes(2);
    expect((await cache.getStats()).diskEntries).toBe(0);
  });
});
