/**
 * Indicator builders
 *
 * Pure functions turning fetched observations into the structured records the
 * dashboard consumes. Fetching and caching live in the service.
 */
import { nullable } from './shared/guards.js';
import type {
  CompositeIndicatorData,
  CompositeResult,
  Frequency,
  LiquidityIndicatorData,
  LiquidityPoint,
  Observation,
  RatioIndicatorData,
  RatioPoint,
  Regime,
  RegimeIndicatorData,
  RegimePoint,
  SeriesIndicatorData,
  SeriesPoint,
  ValueTransform,
} from './shared/types.js';
import {
  alignByDate,
  capOutliers,
  consecutiveTrend,
  countConsecutiveChanges,
  emaSmooth,
  lastFinite,
  monthEnd,
  percentChange,
  rocZscore,
  valuesOf,
} from './utils/transforms.js';

const PERIODS_PER_YEAR: Record<Frequency, number> = { d: 252, w: 52, m: 12, q: 4 };

export const periodsPerYear = (frequency: Frequency | null): number => PERIODS_PER_YEAR[frequency ?? 'm'];

/**
 * How many extra observations a transform consumes before its first value
 */
export function transformLag(transform: ValueTransform, frequency: Frequency | null): number {
  switch (transform) {
    case 'level':
      return 0;
    case 'mom':
      return 1;
    case 'yoy':
      return periodsPerYear(frequency);
  }
}

const numbersOf = (values: readonly (number | null)[]): number[] =>
  values.flatMap((value) => (value === null ? [] : [value]));

const lastOf = <T>(items: readonly T[]): T | undefined => items[items.length - 1];

export interface SeriesBuildOptions {
  seriesId: string;
  transform: ValueTransform;
  periods: number;
  frequency: Frequency | null;
  trendCount: number;
  changeCap?: readonly [number, number] | null;
}

/**
 * Single-series indicator: level, year-over-year or month-over-month change,
 * trimmed to the last `periods` defined points.
 */
export function buildSeriesIndicator(
  key: string,
  observations: readonly Observation[],
  options: SeriesBuildOptions,
): SeriesIndicatorData {
  const raw = valuesOf(observations);
  const lag = transformLag(options.transform, options.frequency);
  const values = lag === 0 ? raw : percentChange(raw, lag);

  const series: SeriesPoint[] = observations
    .map((observation, i) => ({ date: observation.date, raw: nullable(raw[i]), value: nullable(values[i]) }))
    .filter((point) => point.value !== null)
    .slice(-options.periods);

  const shown = numbersOf(series.map((point) => point.value));
  const count = options.trendCount;
  const changes = percentChange(raw, 1);
  const [lower, upper]: readonly [number, number] = options.changeCap ?? [-Infinity, Infinity];

  return {
    kind: 'series',
    key,
    seriesId: options.seriesId,
    transform: options.transform,
    series,
    latest: lastOf(shown) ?? null,
    latestDate: lastOf(series)?.date ?? null,
    previous: shown.length >= 2 ? shown[shown.length - 2] : null,
    latestChange: nullable(lastFinite(changes)),
    latestChangeDisplay: nullable(lastFinite(capOutliers(changes, lower, upper))),
    trendFlags: {
      increasing: consecutiveTrend(shown, count, 'increasing'),
      decreasing: consecutiveTrend(shown, count, 'decreasing'),
      rising: shown.length >= 2 && shown[shown.length - 1] > shown[shown.length - 2],
      consecutiveIncreases: countConsecutiveChanges(shown, 'increasing'),
      consecutiveDeclines: countConsecutiveChanges(shown, 'decreasing'),
    },
  };
}

/**
 * Wraps a composite result, keeping the last `periods` months for display.
 * Trend flags look at the whole composite history.
 */
export function buildCompositeIndicator(
  key: string,
  result: CompositeResult,
  periods: number,
  trendCount = 3,
): CompositeIndicatorData {
  const history = valuesOf(result.series);
  return {
    ...result,
    kind: 'composite',
    key,
    series: result.series.slice(-periods),
    components: result.components.map((component) => ({
      ...component,
      rows: component.rows.slice(-periods),
    })),
    trendFlags: {
      belowMidpoint: result.belowMidpoint,
      increasing: consecutiveTrend(history, trendCount, 'increasing'),
      decreasing: consecutiveTrend(history, trendCount, 'decreasing'),
    },
  };
}

export interface LiquidityInputs {
  fedBalance: readonly Observation[];
  reverseRepo: readonly Observation[];
  treasuryAccount: readonly Observation[];
}

/**
 * Net liquidity = Fed balance sheet − reverse repo × 1000 − TGA × 1000,
 * on the date-aligned series, sampled at each month's last aligned date.
 */
export function buildLiquidityIndicator(
  key: string,
  inputs: LiquidityInputs,
  periods: number,
  trendCount = 3,
): LiquidityIndicatorData {
  const { dates, columns } = alignByDate({
    fedBalance: inputs.fedBalance,
    reverseRepo: inputs.reverseRepo,
    treasuryAccount: inputs.treasuryAccount,
  });

  const monthly = new Map<string, LiquidityPoint>();
  dates.forEach((date, i) => {
    const fedBalance = columns.fedBalance[i];
    const reverseRepo = columns.reverseRepo[i];
    const treasuryAccount = columns.treasuryAccount[i];
    if (![fedBalance, reverseRepo, treasuryAccount].every(Number.isFinite)) return;
    monthly.set(monthEnd(date), {
      date,
      fedBalance,
      reverseRepo,
      treasuryAccount,
      liquidity: fedBalance - reverseRepo * 1000 - treasuryAccount * 1000,
    });
  });

  const series = Array.from(monthly.values()).slice(-periods);
  const liquidity = series.map((point) => point.liquidity);
  const latest = lastOf(series);

  return {
    kind: 'liquidity',
    key,
    series,
    latest: latest?.liquidity ?? null,
    latestDate: latest?.date ?? null,
    trendFlags: {
      increasing: consecutiveTrend(liquidity, trendCount, 'increasing'),
      decreasing: consecutiveTrend(liquidity, trendCount, 'decreasing'),
    },
  };
}

const risingOver = (values: readonly number[], lookback: number): boolean =>
  values.length > lookback && values[values.length - 1] > values[values.length - 1 - lookback];

/**
 * Copper/gold close ratio on common trading days, with the 10Y yield carried
 * forward onto each of them. A missing yield series leaves `yield` null.
 */
export function buildRatioIndicator(
  key: string,
  copper: readonly Observation[],
  gold: readonly Observation[],
  yields: readonly Observation[] | null,
  periods: number,
  lookback = 20,
): RatioIndicatorData {
  const goldByDate = new Map(gold.map((o): [string, number] => [o.date, o.value]));
  const sortedYields = [...(yields ?? [])].sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));

  let cursor = 0;
  let currentYield: number | null = null;
  const series: RatioPoint[] = [];
  for (const { date, value: copperClose } of copper) {
    while (cursor < sortedYields.length && sortedYields[cursor].date <= date) {
      currentYield = sortedYields[cursor].value;
      cursor++;
    }
    const goldClose = goldByDate.get(date);
    if (goldClose === undefined || goldClose === 0) continue;
    series.push({ date, copper: copperClose, gold: goldClose, ratio: copperClose / goldClose, yield: currentYield });
  }

  const shown = series.slice(-periods);
  const ratios = shown.map((point) => point.ratio);
  const yieldValues = numbersOf(shown.map((point) => point.yield));
  const ratioRising = risingOver(ratios, lookback);
  const yieldRising = risingOver(yieldValues, lookback);
  const latest = lastOf(shown);

  return {
    kind: 'ratio',
    key,
    series: shown,
    latestRatio: latest?.ratio ?? null,
    latestYield: latest?.yield ?? null,
    latestDate: latest?.date ?? null,
    trendFlags: {
      ratioRising,
      yieldRising,
      divergence: yieldValues.length > lookback && ratioRising !== yieldRising,
    },
  };
}

export function classifyRegime(growth: number, inflation: number): Regime {
  if (growth >= 0) return inflation >= 0 ? 'Reflation' : 'Goldilocks';
  return inflation >= 0 ? 'Stagflation' : 'Deflation';
}

export const REGIME_DESCRIPTIONS: Record<Regime, string> = {
  Reflation: 'Growth and inflation both accelerating: commodities and cyclicals have tended to lead.',
  Goldilocks: 'Growth accelerating while inflation cools: equities and technology have tended to lead.',
  Stagflation: 'Growth slowing while inflation accelerates: gold and energy have tended to hold up best.',
  Deflation: 'Growth and inflation both slowing: bonds and cash have tended to outperform.',
};

export interface RegimeInputs {
  /** copper miners/futures proxy, e.g. CPER */
  copper: readonly Observation[];
  gold: readonly Observation[];
  /** inflation-protected Treasuries, e.g. TIP */
  tips: readonly Observation[];
  /** nominal Treasuries, e.g. IEF */
  treasuries: readonly Observation[];
}

export interface RegimeOptions {
  rocPeriod?: number;
  zscoreWindow?: number;
  smoothingSpan?: number;
  trailLength?: number;
  /** trading days between trail points */
  step?: number;
}

function priceRatio(numerator: readonly Observation[], denominator: readonly Observation[]): Observation[] {
  const byDate = new Map(denominator.map((o): [string, number] => [o.date, o.value]));
  return numerator.flatMap(({ date, value }) => {
    const base = byDate.get(date);
    return base === undefined || base === 0 ? [] : [{ date, value: value / base }];
  });
}

function momentum(ratio: readonly Observation[], options: Required<RegimeOptions>): Map<string, number> {
  const scores = emaSmooth(
    rocZscore(valuesOf(ratio), options.rocPeriod, options.zscoreWindow),
    options.smoothingSpan,
  );
  return new Map(
    ratio.flatMap(({ date }, i): [string, number][] => (Number.isFinite(scores[i]) ? [[date, scores[i]]] : [])),
  );
}

/**
 * Growth momentum (copper/gold) against inflation momentum (TIPS/Treasuries),
 * each an EMA-smoothed rolling z-score of the ratio's rate of change.
 */
export function buildRegimeIndicator(
  key: string,
  inputs: RegimeInputs,
  options: RegimeOptions = {},
): RegimeIndicatorData {
  const settings: Required<RegimeOptions> = {
    rocPeriod: options.rocPeriod ?? 60,
    zscoreWindow: options.zscoreWindow ?? 252,
    smoothingSpan: options.smoothingSpan ?? 10,
    trailLength: options.trailLength ?? 26,
    step: options.step ?? 5,
  };

  const growthRatio = priceRatio(inputs.copper, inputs.gold);
  const growth = momentum(growthRatio, settings);
  const inflation = momentum(priceRatio(inputs.tips, inputs.treasuries), settings);

  const joined: RegimePoint[] = growthRatio.flatMap(({ date }) => {
    const g = growth.get(date);
    const i = inflation.get(date);
    return g === undefined || i === undefined ? [] : [{ date, growth: g, inflation: i }];
  });

  const trail: RegimePoint[] = [];
  for (let i = joined.length - 1; i >= 0 && trail.length < settings.trailLength; i -= settings.step) {
    trail.unshift(joined[i]);
  }

  const latest = lastOf(trail);
  if (!latest) {
    return { kind: 'regime', key, trail, current: null, projected: null, description: 'Not enough history to place the regime.' };
  }

  const regime = classifyRegime(latest.growth, latest.inflation);
  const before = trail.length >= 2 ? trail[trail.length - 2] : latest;
  return {
    kind: 'regime',
    key,
    trail,
    current: { ...latest, regime },
    projected: {
      growth: latest.growth + (latest.growth - before.growth),
      inflation: latest.inflation + (latest.inflation - before.inflation),
    },
    description: REGIME_DESCRIPTIONS[regime],
  };
}
