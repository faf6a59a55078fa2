import type { CacheManager, CacheStats, CleanupReport } from './cache/cacheManager.js';
import { computeComposite } from './computeComposite.js';
import type { Config } from './config.js';
import { NoDataError, SeriesFetchError, UnknownIndicatorError, errorMessage } from './errors.js';
import {
  buildCompositeIndicator,
  buildLiquidityIndicator,
  buildRatioIndicator,
  buildRegimeIndicator,
  buildSeriesIndicator,
  transformLag,
} from './indicators.js';
import { createLimiter, settleAll, type Limiter } from './lib/fanout.js';
import type { DashboardMetrics } from './lib/metrics.js';
import { logger } from './logger.js';
import { isRecord, isStringArray } from './shared/guards.js';
import type { IndicatorRegistry } from './shared/indicatorRegistry.js';
import {
  failed,
  ok,
  toIssue,
  toOutcomeError,
  withIssues,
  type AvailableOutcome,
  type Issue,
  type Outcome,
} from './shared/result.js';
import type {
  CompositeIndicatorConfig,
  Frequency,
  IndicatorConfig,
  IndicatorData,
  IndicatorKind,
  NextRelease,
  Observation,
  QuoteSource,
  ReleaseDateSource,
  ReleaseSchedule,
  SeriesRequest,
  SeriesSource,
} from './shared/types.js';
import { daysBefore, monthsBefore, toIsoDate } from './utils/dates.js';
import { estimateNextRelease, firstUpcoming } from './utils/releases.js';

export interface IndicatorParams {
  periods?: number;
  frequency?: Frequency;
}

export type IndicatorOutcome = Outcome<IndicatorData> & {
  key: string;
  cached: boolean;
  durationMs: number;
};

export interface CrossSignals {
  /** composite below 50, claims up three weeks running and hours falling */
  dangerCombination: boolean;
  /** neither spending nor claims rising */
  riskOnOpportunity: boolean;
}

export interface AllIndicatorsResult {
  indicators: Record<string, IndicatorOutcome>;
  errors: string[];
  signals: CrossSignals;
  /** next publication per indicator key */
  releases: Record<string, NextRelease>;
}

export interface IndicatorServiceDeps {
  config: Config;
  registry: IndicatorRegistry;
  cache: CacheManager;
  series: SeriesSource;
  quotes: QuoteSource;
  /** without one, release dates are estimated from each schedule */
  releases?: ReleaseDateSource;
  metrics?: DashboardMetrics;
  now?: () => Date;
}

type StoredIndicator = AvailableOutcome<IndicatorData>;

const INDICATOR_KINDS = new Set<string>(['series', 'composite', 'liquidity', 'ratio', 'regime'] satisfies IndicatorKind[]);

/**
 * Shape check for payloads read back from the cache
 */
function isStoredIndicator(value: unknown): value is StoredIndicator {
  if (!isRecord(value) || !isRecord(value.data)) return false;
  if (typeof value.data.kind !== 'string' || !INDICATOR_KINDS.has(value.data.kind)) return false;
  return value.status === 'ok' || (value.status === 'degraded' && Array.isArray(value.issues));
}

/** calendar days covering the rate-of-change window, the z-score window and the trail */
const REGIME_LOOKBACK_DAYS = 900;
/** calendar days per trading day, with slack for holidays */
const RATIO_LOOKBACK_PADDING = 1.6;

/**
 * Cache-transparent access to every registered indicator.
 *
 * Every outbound request goes through one shared limiter, so fan-out inside
 * an indicator and across indicators never exceeds the configured number of
 * concurrent requests.
 */
export class IndicatorService {
  private readonly limit: Limiter;
  private readonly now: () => Date;

  constructor(private readonly deps: IndicatorServiceDeps) {
    this.limit = createLimiter(deps.config.api.maxConcurrentRequests);
    this.now = deps.now ?? (() => new Date());
  }

  get registry(): IndicatorRegistry {
    return this.deps.registry;
  }

  keyFor(key: string, params: IndicatorParams = {}): string {
    const indicator = this.deps.registry.get(key);
    return this.deps.cache.keyFor(key, [], { ...this.resolve(indicator, params) });
  }

  async getIndicator(key: string, params: IndicatorParams = {}): Promise<IndicatorOutcome> {
    const started = Date.now();
    const finish = (outcome: Outcome<IndicatorData>, cached: boolean): IndicatorOutcome => ({
      ...outcome,
      key,
      cached,
      durationMs: Date.now() - started,
    });

    const indicator = this.deps.registry.find(key);
    if (!indicator) {
      return finish(failed(toOutcomeError(new UnknownIndicatorError(key))), false);
    }

    const resolved = this.resolve(indicator, params);
    const cacheKey = this.deps.cache.keyFor(key, [], { ...resolved });
    try {
      const { value, source } = await this.deps.cache.getOrCompute(
        cacheKey,
        (value) => this.ttlFor(indicator, value),
        () => this.compute(indicator, resolved),
        isStoredIndicator,
      );
      logger.info(
        { indicator: key, source, status: value.status, durationMs: Date.now() - started },
        source === 'computed' ? 'Indicator computed' : 'Indicator served from cache',
      );
      return finish(value, source !== 'computed');
    } catch (error) {
      logger.error({ indicator: key, error: errorMessage(error) }, 'Indicator computation failed');
      return finish(failed(toOutcomeError(error)), false);
    }
  }

  /**
   * Every registered indicator, plus the cross-indicator signals
   */
  async getAllIndicators(): Promise<AllIndicatorsResult> {
    const keys = this.deps.registry.keys();
    const [{ results, failures }, releases] = await Promise.all([
      settleAll(
        keys.map((key) => ({ id: key, run: () => this.getIndicator(key) })),
        keys.length,
      ),
      this.getReleaseCalendar(),
    ]);

    const indicators: Record<string, IndicatorOutcome> = {};
    const errors: string[] = failures.map(({ id, error }) => `${id}: ${errorMessage(error)}`);
    for (const key of keys) {
      const outcome = results.get(key);
      if (!outcome) continue;
      indicators[key] = outcome;
      if (outcome.status === 'failed') {
        errors.push(`${key}: ${outcome.error.message}`);
      }
    }

    return { indicators, errors, signals: crossSignals(indicators), releases };
  }

  /**
   * Next publication date of every indicator. FRED's calendar is preferred;
   * an estimate from the schedule stands in when it is unavailable.
   */
  async getReleaseCalendar(): Promise<Record<string, NextRelease>> {
    const indicators = this.deps.registry.list();
    const releases = await Promise.all(indicators.map((indicator) => this.nextRelease(indicator.release)));
    return Object.fromEntries(indicators.map((indicator, i): [string, NextRelease] => [indicator.key, releases[i]]));
  }

  /**
   * Exact key when params are given, otherwise every cached variant of the
   * indicator still held in memory. Returns how many entries went.
   */
  async invalidate(key: string, params?: IndicatorParams): Promise<number> {
    if (params) {
      const removed = await this.deps.cache.invalidate(this.keyFor(key, params));
      return removed ? 1 : 0;
    }
    return this.deps.cache.invalidatePrefix(`${key}|`);
  }

  async clearCache(): Promise<void> {
    await this.deps.cache.clearAll();
  }

  async getCacheStats(): Promise<CacheStats> {
    return this.deps.cache.getStats();
  }

  async cleanupCache(): Promise<CleanupReport> {
    return this.deps.cache.cleanup();
  }

  private async nextRelease(schedule: ReleaseSchedule): Promise<NextRelease> {
    const { releaseId, cadence } = schedule;
    const now = this.now();
    const estimated: NextRelease = { date: estimateNextRelease(cadence, now), source: 'estimated' };
    const source = this.deps.releases;
    if (releaseId === null || !source) return estimated;

    const from = toIsoDate(now);
    try {
      const { value: dates } = await this.deps.cache.getOrCompute(
        this.deps.cache.keyFor('release_dates', [releaseId], { from }),
        this.deps.config.cache.defaultTtlSeconds,
        () => this.limit(() => source.fetchReleaseDates(releaseId, { from })),
        isStringArray,
      );
      const date = firstUpcoming(dates, now);
      return date === null ? estimated : { date, source: 'fred' };
    } catch (error) {
      this.recordFailure(error);
      logger.warn({ releaseId, error: errorMessage(error) }, 'Release calendar unavailable, using estimate');
      return estimated;
    }
  }

  private resolve(indicator: IndicatorConfig, params: IndicatorParams): Required<IndicatorParams> | { periods: number } {
    const periods = params.periods ?? indicator.periods;
    const frequency = params.frequency ?? indicator.frequency;
    return indicator.kind === 'series' && frequency !== null ? { periods, frequency } : { periods };
  }

  /**
   * Degraded results expire early so a recovered input is picked up on the
   * next refresh.
   */
  private ttlFor(indicator: IndicatorConfig, value: StoredIndicator): number {
    const { cache } = this.deps.config;
    const ttl = indicator.cacheSource === 'yahoo' ? cache.yahooTtlSeconds : cache.fredTtlSeconds;
    return value.status === 'degraded' ? Math.min(ttl, cache.degradedTtlSeconds) : ttl;
  }

  private compute(
    indicator: IndicatorConfig,
    params: Required<IndicatorParams> | { periods: number },
  ): Promise<StoredIndicator> {
    const frequency = 'frequency' in params ? params.frequency : indicator.frequency;
    switch (indicator.kind) {
      case 'series':
        return this.computeSeries(indicator, params.periods, frequency);
      case 'composite':
        return this.computeComposite(indicator, params.periods);
      case 'liquidity':
        return this.computeLiquidity(indicator, params.periods);
      case 'ratio':
        return this.computeRatio(indicator, params.periods);
      case 'regime':
        return this.computeRegime(indicator);
    }
  }

  private async computeSeries(
    indicator: IndicatorConfig,
    periods: number,
    frequency: Frequency | null,
  ): Promise<StoredIndicator> {
    const [seriesId] = indicator.fredSeries;
    const limit = periods + transformLag(indicator.transform, frequency);
    const observations = await this.fetchSeries(seriesId, { limit, frequency: frequency ?? undefined });
    if (observations.length === 0) throw new NoDataError(seriesId);

    return ok(
      buildSeriesIndicator(indicator.key, observations, {
        seriesId,
        transform: indicator.transform,
        periods,
        frequency,
        trendCount: indicator.trendCount,
        changeCap: indicator.changeCap,
      }),
    );
  }

  private async computeComposite(indicator: CompositeIndicatorConfig, periods: number): Promise<StoredIndicator> {
    const { pmi } = this.deps.config;
    const entries = Object.entries(indicator.components);
    const { results, failures } = await settleAll(
      entries.map(([name, seriesId]) => ({
        id: name,
        run: () => this.fetchSeries(seriesId, { start: pmi.startDate }),
      })),
      entries.length,
    );

    const issues: Issue[] = failures.map(({ id, error }) => toIssue(id, error));
    for (const [name, observations] of results) {
      if (observations.length === 0) {
        issues.push(toIssue(name, new NoDataError(indicator.components[name])));
      }
    }

    const result = computeComposite(Object.fromEntries(results), indicator.weights, {
      stdWindow: pmi.stdWindow,
      minPeriods: pmi.minPeriods,
      fallbackWindows: pmi.fallbackWindows,
    });
    for (const name of result.missing) {
      if (!issues.some((issue) => issue.component === name)) {
        issues.push({ component: name, kind: 'NoData', message: `Not enough history for ${name}` });
      }
    }

    if (issues.length > 0) {
      logger.warn(
        { indicator: indicator.key, missing: result.missing, weights: result.weights },
        'Composite computed without some components',
      );
    }
    return withIssues(buildCompositeIndicator(indicator.key, result, periods, indicator.trendCount), issues);
  }

  private async computeLiquidity(indicator: IndicatorConfig, periods: number): Promise<StoredIndicator> {
    const { liquidity } = this.deps.config;
    const start = monthsBefore(this.now(), periods + 2);
    const [fedBalance, reverseRepo, treasuryAccount] = await Promise.all(
      [liquidity.fedBalance, liquidity.reverseRepo, liquidity.treasuryAccount].map((seriesId) =>
        this.requireSeries(seriesId, { start }),
      ),
    );
    return ok(buildLiquidityIndicator(indicator.key, { fedBalance, reverseRepo, treasuryAccount }, periods));
  }

  private async computeRatio(indicator: IndicatorConfig, periods: number): Promise<StoredIndicator> {
    const [copperSymbol, goldSymbol] = indicator.yahooSymbols;
    const [yieldSeries] = indicator.fredSeries;
    const end = toIsoDate(this.now());
    const start = daysBefore(this.now(), Math.ceil(periods * RATIO_LOOKBACK_PADDING));

    const [copper, gold] = await Promise.all(
      [copperSymbol, goldSymbol].map((symbol) => this.requireQuotes(symbol, start, end)),
    );

    const issues: Issue[] = [];
    let yields: Observation[] | null = null;
    try {
      yields = await this.fetchSeries(yieldSeries, { start, end });
    } catch (error) {
      issues.push(toIssue(yieldSeries, error));
    }

    return withIssues(buildRatioIndicator(indicator.key, copper, gold, yields, periods), issues);
  }

  private async computeRegime(indicator: IndicatorConfig): Promise<StoredIndicator> {
    const end = toIsoDate(this.now());
    const start = daysBefore(this.now(), REGIME_LOOKBACK_DAYS);
    const [copper, gold, tips, treasuries] = await Promise.all(
      indicator.yahooSymbols.map((symbol) => this.requireQuotes(symbol, start, end)),
    );
    const data = buildRegimeIndicator(indicator.key, { copper, gold, tips, treasuries }, { trailLength: indicator.periods });
    const issues: Issue[] = data.current
      ? []
      : [{ component: indicator.key, kind: 'NoData', message: 'Not enough history to place the regime' }];
    return withIssues(data, issues);
  }

  private async fetchSeries(seriesId: string, request: SeriesRequest): Promise<Observation[]> {
    try {
      return await this.limit(() => this.deps.series.fetchSeries(seriesId, request));
    } catch (error) {
      this.recordFailure(error);
      throw error;
    }
  }

  private async requireSeries(seriesId: string, request: SeriesRequest): Promise<Observation[]> {
    const observations = await this.fetchSeries(seriesId, request);
    if (observations.length === 0) throw new NoDataError(seriesId);
    return observations;
  }

  private async requireQuotes(symbol: string, start: string, end: string): Promise<Observation[]> {
    let observations: Observation[];
    try {
      observations = await this.limit(() => this.deps.quotes.fetchQuotes(symbol, { start, end, interval: '1d' }));
    } catch (error) {
      this.recordFailure(error);
      throw error;
    }
    if (observations.length === 0) throw new NoDataError(symbol);
    return observations;
  }

  private recordFailure(error: unknown): void {
    if (error instanceof SeriesFetchError) {
      this.deps.metrics?.recordFetchFailure(error.source, error.kind);
    }
  }
}

const seriesFlags = (outcome: IndicatorOutcome | undefined) =>
  outcome && outcome.status !== 'failed' && outcome.data.kind === 'series' ? outcome.data.trendFlags : null;

/**
 * Signals that need several indicators at once. Unavailable inputs count as
 * "not signalling".
 */
export function crossSignals(indicators: Readonly<Record<string, IndicatorOutcome>>): CrossSignals {
  const pmi = indicators.pmi_proxy;
  const pmiBelowMidpoint =
    pmi !== undefined && pmi.status !== 'failed' && pmi.data.kind === 'composite' && pmi.data.belowMidpoint;
  const claims = seriesFlags(indicators.initial_claims);
  const hours = seriesFlags(indicators.hours_worked);
  const pce = seriesFlags(indicators.pce);

  const claimsRising = claims?.increasing ?? false;
  const hoursWeakening = (hours?.consecutiveDeclines ?? 0) >= 3;
  const pceRising = pce?.rising ?? false;

  return {
    dangerCombination: pmiBelowMidpoint && claimsRising && hoursWeakening,
    riskOnOpportunity: !pceRising && !claimsRising,
  };
}
