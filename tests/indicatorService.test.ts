import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { mkdtemp, rm } from 'fs/promises';
import os from 'os';
import path from 'path';
import { CacheManager } from '../cache/cacheManager.js';
import { computeComposite } from '../computeComposite.js';
import type { Config } from '../config.js';
import { buildCompositeIndicator, buildSeriesIndicator } from '../indicators.js';
import { IndicatorService, crossSignals, type IndicatorOutcome } from '../indicatorService.js';
import { SeriesFetchError } from '../errors.js';
import { createMetrics } from '../lib/metrics.js';
import { createIndicatorRegistry } from '../shared/indicatorRegistry.js';
import type { IndicatorData, Observation } from '../shared/types.js';
import { FakeQuoteSource, FakeReleaseSource, FakeSeriesSource, monthlySeries, testConfig, weeklySeries } from './fakes.js';

const NOW = new Date('2024-06-30T00:00:00Z');

const dailySeries = (count: number, price: (i: number) => number): Observation[] =>
  Array.from({ length: count }, (_, i) => {
    const day = new Date(Date.UTC(2022, 0, 3 + i));
    return { date: day.toISOString().slice(0, 10), value: price(i) };
  });

describe('IndicatorService', () => {
  let dir: string;
  let config: Config;
  let series: FakeSeriesSource;
  let quotes: FakeQuoteSource;

  const createService = (
    metrics = createMetrics({ defaultMetrics: false }),
    cache = new CacheManager(config.cache),
    releases?: FakeReleaseSource,
  ) =>
    new IndicatorService({
      config,
      registry: createIndicatorRegistry(config),
      cache,
      series,
      quotes,
      releases,
      metrics,
      now: () => NOW,
    });

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'indicator-service-'));
    config = testConfig(dir);
    series = new FakeSeriesSource();
    quotes = new FakeQuoteSource();
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe('series indicators', () => {
    it('fetches the configured window and builds the series', async () => {
      series.set('ICSA', weeklySeries([200000, 210000, 220000, 230000]));
      const outcome = await createService().getIndicator('initial_claims');

      expect(outcome.status).toBe('ok');
      expect(outcome.cached).toBe(false);
      expect(series.calls[0]).toEqual({ seriesId: 'ICSA', request: { limit: 52, frequency: 'w' } });
      if (outcome.status !== 'ok' || outcome.data.kind !== 'series') throw new Error('expected series data');
      expect(outcome.data.latest).toBe(230000);
      expect(outcome.data.latestDate).toBe('2024-01-27');
      expect(outcome.data.trendFlags.increasing).toBe(true);
    });

    it('asks for extra history to cover a year-over-year transform', async () => {
      series.set('PCE', monthlySeries([100, 101, 102]));
      await createService().getIndicator('pce');
      expect(series.calls[0].request).toEqual({ limit: 36, frequency: 'm' });
    });

    it('honours period and frequency overrides', async () => {
      series.set('ICSA', weeklySeries([1, 2, 3]));
      const service = createService();
      await service.getIndicator('initial_claims', { periods: 10, frequency: 'm' });

      expect(series.calls[0].request).toEqual({ limit: 10, frequency: 'm' });
      expect(service.keyFor('initial_claims', { periods: 10, frequency: 'm' })).toBe(
        'initial_claims|frequency:"m"|periods:10',
      );
    });

    it('serves the second request from the cache', async () => {
      series.set('ICSA', weeklySeries([1, 2, 3]));
      const service = createService();
      await service.getIndicator('initial_claims');
      const second = await service.getIndicator('initial_claims');

      expect(second.cached).toBe(true);
      expect(series.calls).toHaveLength(1);
    });

    it('reads results written by an earlier process from disk', async () => {
      series.set('ICSA', weeklySeries([1, 2, 3]));
      await createService().getIndicator('initial_claims');
      const restarted = await createService().getIndicator('initial_claims');

      expect(restarted.cached).toBe(true);
      expect(restarted.status).toBe('ok');
      expect(series.calls).toHaveLength(1);
    });

    it('fails with the upstream error kind and caches nothing', async () => {
      const metrics = createMetrics({ defaultMetrics: false });
      const service = createService(metrics);
      const outcome = await service.getIndicator('initial_claims');

      expect(outcome).toMatchObject({
        status: 'failed',
        key: 'initial_claims',
        error: { kind: 'NotFound', message: 'FRED request for ICSA failed: 404' },
      });
      expect((await service.getCacheStats()).diskEntries).toBe(0);
      const { values } = await metrics.fetchFailures.get();
      expect(values).toMatchObject([{ value: 1, labels: { source: 'FRED', kind: 'NotFound' } }]);
    });

    it('fails with NoData when the series is empty', async () => {
      series.set('ICSA', []);
      const outcome = await createService().getIndicator('initial_claims');
      expect(outcome).toMatchObject({ status: 'failed', error: { kind: 'NoData', message: 'No data received for ICSA' } });
    });
  });

  it('reports an unknown indicator without calling upstream', async () => {
    const outcome = await createService().getIndicator('nonexistent');
    expect(outcome).toMatchObject({
      status: 'failed',
      error: { kind: 'UnknownIndicator', message: "Indicator 'nonexistent' not found in registry" },
    });
    expect(series.calls).toHaveLength(0);
  });

  describe('composite', () => {
    beforeEach(() => {
      series.set('AMTMNO', monthlySeries([100, 102, 101, 104, 103, 106]));
      series.set('IPMAN', monthlySeries([50, 50.5, 51, 50.8, 51.2, 51.5]));
      series.set('AMDMUS', monthlySeries([20, 19.5, 19.8, 20.1, 20.4, 20.2]));
      series.set('MNFCTRIMSA', monthlySeries([300, 301, 303, 302, 304, 306]));
    });

    it('degrades when a component is missing and renormalizes the rest', async () => {
      const outcome = await createService().getIndicator('pmi_proxy');

      expect(outcome.status).toBe('degraded');
      if (outcome.status !== 'degraded' || outcome.data.kind !== 'composite') throw new Error('expected composite');
      expect(outcome.issues).toEqual([
        { component: 'employment', kind: 'NotFound', message: 'FRED request for MANEMP failed: 404' },
      ]);
      expect(outcome.data.missing).toEqual(['employment']);
      expect(outcome.data.weights.new_orders).toBeCloseTo(0.375, 10);
      expect(outcome.data.weights.production).toBeCloseTo(0.3125, 10);
      expect(outcome.data.weights.supplier_deliveries).toBeCloseTo(0.1875, 10);
      expect(outcome.data.weights.inventories).toBeCloseTo(0.125, 10);
      expect(outcome.data.latestDate).toBe('2023-06-30');
    });

    it('fetches every component from the configured start date', async () => {
      await createService().getIndicator('pmi_proxy');
      expect(series.calls.map((call) => call.seriesId).sort()).toEqual(
        ['AMDMUS', 'AMTMNO', 'IPMAN', 'MANEMP', 'MNFCTRIMSA'],
      );
      expect(series.calls.every((call) => call.request.start === '2000-01-01')).toBe(true);
    });

    it('keeps a degraded composite only briefly so a recovered component is picked up', async () => {
      let clock = NOW.getTime();
      const service = createService(undefined, new CacheManager(config.cache, { clock: () => clock }));
      series.set('MANEMP', new SeriesFetchError('Transient', 'FRED', 'MANEMP', 'FRED request for MANEMP failed: 503', 503));
      expect((await service.getIndicator('pmi_proxy')).status).toBe('degraded');

      series.set('MANEMP', monthlySeries([150, 151, 150, 152, 153, 152]));
      expect((await service.getIndicator('pmi_proxy')).cached).toBe(true);

      clock += (config.cache.degradedTtlSeconds + 1) * 1000;
      const recovered = await service.getIndicator('pmi_proxy');
      expect(recovered.status).toBe('ok');
      expect(recovered.cached).toBe(false);
    });

    it('keeps a healthy composite for the full FRED TTL', async () => {
      let clock = NOW.getTime();
      series.set('MANEMP', monthlySeries([150, 151, 150, 152, 153, 152]));
      const service = createService(undefined, new CacheManager(config.cache, { clock: () => clock }));
      expect((await service.getIndicator('pmi_proxy')).status).toBe('ok');

      clock += (config.cache.degradedTtlSeconds + 1) * 1000;
      expect((await service.getIndicator('pmi_proxy')).cached).toBe(true);
    });

    it('fails with NoViableInput when no component has data', async () => {
      series = new FakeSeriesSource();
      const outcome = await createService().getIndicator('pmi_proxy');
      expect(outcome).toMatchObject({ status: 'failed', error: { kind: 'NoViableInput' } });
    });
  });

  describe('liquidity', () => {
    it('combines the balance sheet, reverse repo and Treasury account', async () => {
      series.set('WALCL', [
        { date: '2024-01-03', value: 7_700_000 },
        { date: '2024-02-07', value: 7_650_000 },
        { date: '2024-03-06', value: 7_600_000 },
      ]);
      series.set('RRPONTTLD', [
        { date: '2024-01-03', value: 700 },
        { date: '2024-02-07', value: 600 },
        { date: '2024-03-06', value: 500 },
      ]);
      series.set('WTREGEN', [
        { date: '2024-01-03', value: 750 },
        { date: '2024-02-07', value: 800 },
        { date: '2024-03-06', value: 760 },
      ]);

      const outcome = await createService().getIndicator('usd_liquidity');

      if (outcome.status !== 'ok' || outcome.data.kind !== 'liquidity') throw new Error('expected liquidity data');
      expect(outcome.data.series.map((point) => point.liquidity)).toEqual([6_250_000, 6_250_000, 6_340_000]);
      expect(outcome.data.latest).toBe(6_340_000);
      expect(outcome.data.latestDate).toBe('2024-03-06');
      expect(series.calls[0].request).toEqual({ start: '2019-04-01' });
    });

    it('fails when any input is missing', async () => {
      series.set('WALCL', [{ date: '2024-01-03', value: 7_700_000 }]);
      series.set('RRPONTTLD', [{ date: '2024-01-03', value: 700 }]);
      const outcome = await createService().getIndicator('usd_liquidity');
      expect(outcome).toMatchObject({ status: 'failed', error: { kind: 'NotFound' } });
    });
  });

  describe('copper/gold ratio', () => {
    beforeEach(() => {
      quotes = new FakeQuoteSource({
        'HG=F': [
          { date: '2024-06-27', value: 4 },
          { date: '2024-06-28', value: 4.2 },
        ],
        'GC=F': [
          { date: '2024-06-27', value: 2000 },
          { date: '2024-06-28', value: 2100 },
        ],
      });
    });

    it('carries the 10Y yield forward onto trading days', async () => {
      series.set('DGS10', [{ date: '2024-06-26', value: 4.3 }]);
      const outcome = await createService().getIndicator('copper_gold_yield');

      if (outcome.status !== 'ok' || outcome.data.kind !== 'ratio') throw new Error('expected ratio data');
      expect(outcome.data.series.map((point) => point.yield)).toEqual([4.3, 4.3]);
      expect(outcome.data.latestRatio).toBeCloseTo(0.002, 10);
      expect(quotes.calls[0].request).toEqual({ start: '2023-05-23', end: '2024-06-30', interval: '1d' });
    });

    it('degrades when the yield series is unavailable', async () => {
      const outcome = await createService().getIndicator('copper_gold_yield');

      expect(outcome.status).toBe('degraded');
      if (outcome.status !== 'degraded' || outcome.data.kind !== 'ratio') throw new Error('expected ratio data');
      expect(outcome.issues).toEqual([
        { component: 'DGS10', kind: 'NotFound', message: 'FRED request for DGS10 failed: 404' },
      ]);
      expect(outcome.data.latestYield).toBeNull();
    });
  });

  describe('regime quadrant', () => {
    it('places the latest point in a quadrant', async () => {
      const days = 400;
      quotes = new FakeQuoteSource({
        CPER: dailySeries(days, (i) => 25 + 2 * Math.sin(i / 15) + i * 0.01),
        GLD: dailySeries(days, (i) => 180 + 5 * Math.cos(i / 20)),
        TIP: dailySeries(days, (i) => 108 + Math.sin(i / 25)),
        IEF: dailySeries(days, (i) => 95 + 0.8 * Math.cos(i / 18)),
      });

      const outcome = await createService().getIndicator('regime_quadrant');

      if (outcome.status !== 'ok' || outcome.data.kind !== 'regime') throw new Error('expected regime data');
      const { current, trail } = outcome.data;
      expect(current?.date).toBe(dailySeries(days, () => 0)[days - 1].date);
      expect(trail[trail.length - 1].date).toBe(current?.date);
      expect(['Reflation', 'Goldilocks', 'Stagflation', 'Deflation']).toContain(current?.regime);
    });

    it('degrades when there is too little history', async () => {
      quotes = new FakeQuoteSource({
        CPER: dailySeries(30, () => 25),
        GLD: dailySeries(30, () => 180),
        TIP: dailySeries(30, () => 108),
        IEF: dailySeries(30, () => 95),
      });
      const outcome = await createService().getIndicator('regime_quadrant');
      expect(outcome).toMatchObject({
        status: 'degraded',
        issues: [{ component: 'regime_quadrant', kind: 'NoData' }],
        data: { current: null, projected: null },
      });
    });
  });

  describe('getAllIndicators', () => {
    it('returns one outcome per indicator and collects the errors', async () => {
      series.set('ICSA', weeklySeries([1, 2, 3]));
      const result = await createService().getAllIndicators();

      expect(Object.keys(result.indicators)).toHaveLength(12);
      expect(result.indicators.initial_claims.status).toBe('ok');
      expect(result.errors).toHaveLength(11);
      expect(result.errors[0]).toBe('pce: FRED request for PCE failed: 404');
    });
  });

  describe('getReleaseCalendar', () => {
    it('prefers the published calendar and estimates the rest', async () => {
      const releases = new FakeReleaseSource({ 180: ['2024-06-27', '2024-07-03', '2024-07-11'] });
      const calendar = await createService(undefined, undefined, releases).getReleaseCalendar();

      expect(Object.keys(calendar)).toHaveLength(12);
      expect(calendar.initial_claims).toEqual({ date: '2024-07-03', source: 'fred' });
      expect(calendar.core_cpi).toEqual({ date: '2024-07-12', source: 'estimated' });
      expect(calendar.yield_curve).toEqual({ date: '2024-07-01', source: 'estimated' });
      expect(releases.calls.find((call) => call.releaseId === 180)?.request).toEqual({ from: '2024-06-30' });
    });

    it('estimates every date without a calendar source', async () => {
      const calendar = await createService().getReleaseCalendar();

      expect(calendar.pce).toEqual({ date: '2024-07-31', source: 'estimated' });
      expect(calendar.hours_worked).toEqual({ date: '2024-07-05', source: 'estimated' });
      expect(calendar.usd_liquidity).toEqual({ date: '2024-07-04', source: 'estimated' });
      expect(calendar.new_orders).toEqual({ date: '2024-07-25', source: 'estimated' });
    });

    it('falls back to the estimate when the calendar has nothing ahead', async () => {
      const releases = new FakeReleaseSource({ 10: ['2024-05-15', '2024-06-12'] });
      const calendar = await createService(undefined, undefined, releases).getReleaseCalendar();

      expect(calendar.core_cpi).toEqual({ date: '2024-07-12', source: 'estimated' });
    });

    it('caches published calendars', async () => {
      const releases = new FakeReleaseSource({ 180: ['2024-07-03'] });
      const service = createService(undefined, undefined, releases);

      await service.getReleaseCalendar();
      await service.getReleaseCalendar();

      expect(releases.calls.filter((call) => call.releaseId === 180)).toHaveLength(1);
    });

    it('is returned alongside the indicators', async () => {
      const result = await createService().getAllIndicators();

      expect(result.releases.initial_claims).toEqual({ date: '2024-07-04', source: 'estimated' });
    });
  });

  describe('invalidation', () => {
    it('drops every cached variant of an indicator', async () => {
      series.set('ICSA', weeklySeries([1, 2, 3]));
      const service = createService();
      await service.getIndicator('initial_claims');
      await service.getIndicator('initial_claims', { periods: 10 });

      expect(await service.invalidate('initial_claims')).toBe(2);
      await service.getIndicator('initial_claims');
      expect(series.calls).toHaveLength(3);
    });

    it('leaves keys that merely contain the indicator name', async () => {
      series.set('ICSA', weeklySeries([1, 2, 3]));
      const cache = new CacheManager(config.cache);
      await cache.set('old_initial_claims|periods:52', 1);
      const service = createService(undefined, cache);
      await service.getIndicator('initial_claims');

      expect(await service.invalidate('initial_claims')).toBe(1);
      expect(cache.memory.keys()).toEqual(['old_initial_claims|periods:52']);
    });

    it('drops one exact variant', async () => {
      series.set('ICSA', weeklySeries([1, 2, 3]));
      const service = createService();
      await service.getIndicator('initial_claims', { periods: 10 });

      expect(await service.invalidate('initial_claims', { periods: 52 })).toBe(0);
      expect(await service.invalidate('initial_claims', { periods: 10 })).toBe(1);
    });

    it('clears the whole cache', async () => {
      series.set('ICSA', weeklySeries([1, 2, 3]));
      const service = createService();
      await service.getIndicator('initial_claims');
      await service.clearCache();

      expect((await service.getCacheStats()).diskEntries).toBe(0);
    });
  });
});

describe('crossSignals', () => {
  const outcome = (key: string, data: IndicatorData): IndicatorOutcome => ({
    status: 'ok',
    data,
    key,
    cached: false,
    durationMs: 0,
  });

  const seriesOutcome = (key: string, values: number[]) =>
    outcome(
      key,
      buildSeriesIndicator(key, monthlySeries(values), {
        seriesId: key,
        transform: 'level',
        periods: 24,
        frequency: 'm',
        trendCount: 3,
      }),
    );

  const contractingPmi = outcome(
    'pmi_proxy',
    buildCompositeIndicator(
      'pmi_proxy',
      computeComposite({ a: monthlySeries([100, 110, 99]) }, { a: 1 }, { stdWindow: 3, minPeriods: 2, fallbackWindows: [] }),
      24,
    ),
  );

  it('flags the danger combination', () => {
    const signals = crossSignals({
      pmi_proxy: contractingPmi,
      initial_claims: seriesOutcome('initial_claims', [200, 210, 220, 230]),
      hours_worked: seriesOutcome('hours_worked', [35, 34.8, 34.6, 34.4]),
    });
    expect(signals).toEqual({ dangerCombination: true, riskOnOpportunity: false });
  });

  it('needs all three conditions for danger', () => {
    const signals = crossSignals({
      pmi_proxy: contractingPmi,
      initial_claims: seriesOutcome('initial_claims', [200, 210, 220, 230]),
      hours_worked: seriesOutcome('hours_worked', [35, 34.8, 34.9, 34.4]),
    });
    expect(signals.dangerCombination).toBe(false);
  });

  it('sees a risk-on opening when spending and claims are not rising', () => {
    const signals = crossSignals({
      pce: seriesOutcome('pce', [3, 2.9]),
      initial_claims: seriesOutcome('initial_claims', [230, 220, 210, 200]),
    });
    expect(signals).toEqual({ dangerCombination: false, riskOnOpportunity: true });
  });

  it('treats unavailable inputs as not signalling', () => {
    expect(crossSignals({})).toEqual({ dangerCombination: false, riskOnOpportunity: true });
  });
});
