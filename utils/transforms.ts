/**
 * Time-series transforms
 *
 * Pure functions over aligned value arrays, oldest first. `NaN` marks a
 * missing or undefined value in both inputs and outputs; none of these
 * functions throw for structurally valid input.
 */
import type { Observation, TrendDirection } from '../shared/types.js';
import { clamp, finiteValues, mean, sampleStd } from './statistics.js';

export const DIFFUSION_NEUTRAL = 50;

export interface PercentChangeOptions {
  annualize?: boolean;
  periodsPerYear?: number;
  fillForward?: boolean;
}

/**
 * Carries the last finite value over gaps. Leading gaps stay NaN.
 */
export function forwardFill(values: readonly number[]): number[] {
  let last = NaN;
  return values.map((value) => {
    if (Number.isFinite(value)) {
      last = value;
      return value;
    }
    return last;
  });
}

/**
 * `(v[t] - v[t-lag]) / v[t-lag] * 100`; the first `lag` outputs are NaN, as is
 * any output whose base is zero or missing.
 */
export function percentChange(
  values: readonly number[],
  lag = 1,
  options: PercentChangeOptions = {},
): number[] {
  if (!Number.isInteger(lag) || lag < 1) {
    throw new RangeError(`lag must be a positive integer, got ${lag}`);
  }
  const { annualize = false, periodsPerYear = 12, fillForward = true } = options;
  const source = fillForward ? forwardFill(values) : [...values];
  const factor = annualize ? periodsPerYear / lag : 1;

  return source.map((value, i) => {
    if (i < lag) return NaN;
    const base = source[i - lag];
    if (!Number.isFinite(value) || !Number.isFinite(base) || base === 0) return NaN;
    return ((value - base) / base) * 100 * factor;
  });
}

function trailingStd(values: readonly number[], window: number, minPeriods: number): number[] {
  const required = Math.max(minPeriods, 2);
  return values.map((_, i) => {
    const slice = finiteValues(values.slice(Math.max(0, i - window + 1), i + 1));
    return slice.length >= required ? sampleStd(slice) : NaN;
  });
}

/**
 * Trailing sample standard deviation with a degrading window policy.
 *
 * Each window (preferred first, then the fallbacks in order) is tried until
 * one yields at least one valid value. If none does, the overall standard
 * deviation is used everywhere. Gaps after the first valid value are
 * forward-filled.
 */
export function rollingStd(
  values: readonly number[],
  window: number,
  minPeriods = window,
  fallbackWindows: readonly number[] = [],
): number[] {
  if (values.length === 0) return [];

  for (const size of [window, ...fallbackWindows]) {
    const result = trailingStd(values, size, Math.min(minPeriods, size));
    if (result.some(Number.isFinite)) {
      return forwardFill(result);
    }
  }

  const overall = sampleStd(finiteValues(values));
  return values.map(() => overall);
}

/**
 * Maps a percent change onto [0, 100] around 50, scaled by its own volatility
 */
export function diffusionIndex(pctChange: number, localStd: number | null | undefined): number {
  if (localStd === null || localStd === undefined || !Number.isFinite(localStd) || localStd <= 0) {
    return DIFFUSION_NEUTRAL;
  }
  if (!Number.isFinite(pctChange)) return DIFFUSION_NEUTRAL;
  const scaled = clamp(pctChange / localStd, -3, 3);
  return clamp(DIFFUSION_NEUTRAL + 10 * scaled, 0, 100);
}

const ZERO_VARIANCE = 1e-12;

/**
 * Rolling z-score of the `rocPeriod` rate of change. The first
 * `rocPeriod + zscoreWindow - 1` outputs are NaN.
 */
export function rocZscore(values: readonly number[], rocPeriod = 60, zscoreWindow = 252): number[] {
  const roc = percentChange(values, rocPeriod);
  return roc.map((current, i) => {
    if (i < rocPeriod + zscoreWindow - 1) return NaN;
    const window = roc.slice(i - zscoreWindow + 1, i + 1);
    if (!window.every(Number.isFinite)) return NaN;
    const sd = sampleStd(window);
    if (!(sd > ZERO_VARIANCE)) return NaN;
    return (current - mean(window)) / sd;
  });
}

/**
 * Exponential moving average, `alpha = 2 / (span + 1)`, no bias adjustment.
 * Seeded with the first finite value; gaps repeat the previous average.
 */
export function emaSmooth(values: readonly number[], span: number): number[] {
  if (!(span >= 1)) {
    throw new RangeError(`span must be at least 1, got ${span}`);
  }
  const alpha = 2 / (span + 1);
  let previous = NaN;
  return values.map((value) => {
    if (!Number.isFinite(value)) return previous;
    previous = Number.isFinite(previous) ? alpha * value + (1 - alpha) * previous : value;
    return previous;
  });
}

const moves = (direction: TrendDirection) =>
  direction === 'increasing'
    ? (before: number, after: number): boolean => after > before
    : (before: number, after: number): boolean => after < before;

/**
 * True iff the last `count + 1` values are strictly monotonic in `direction`
 */
export function consecutiveTrend(
  values: readonly number[],
  count: number,
  direction: TrendDirection,
): boolean {
  if (count < 1 || values.length < count + 1) return false;
  const step = moves(direction);
  const tail = values.slice(-(count + 1));
  for (let i = 1; i < tail.length; i++) {
    if (!step(tail[i - 1], tail[i])) return false;
  }
  return true;
}

/**
 * Length of the trailing strictly monotonic run, counted in steps
 */
export function countConsecutiveChanges(values: readonly number[], direction: TrendDirection): number {
  const step = moves(direction);
  let count = 0;
  for (let i = values.length - 1; i > 0; i--) {
    if (!step(values[i - 1], values[i])) break;
    count++;
  }
  return count;
}

export function capOutliers(values: readonly number[], lower = -2, upper = 2): number[] {
  return values.map((value) => (Number.isFinite(value) ? clamp(value, lower, upper) : value));
}

export function monthEnd(date: string): string {
  const year = Number(date.slice(0, 4));
  const month = Number(date.slice(5, 7));
  // Day 0 of the next month is the last day of this one
  return new Date(Date.UTC(year, month, 0)).toISOString().slice(0, 10);
}

/**
 * One observation per calendar month (the last finite one), dated at month end
 */
export function resampleMonthlyLast(observations: readonly Observation[]): Observation[] {
  const byMonth = new Map<string, Observation>();
  for (const observation of observations) {
    if (!Number.isFinite(observation.value)) continue;
    byMonth.set(monthEnd(observation.date), observation);
  }
  return Array.from(byMonth, ([date, { value }]) => ({ date, value })).sort((a, b) =>
    a.date < b.date ? -1 : a.date > b.date ? 1 : 0,
  );
}

export interface AlignedSeries {
  dates: string[];
  columns: Record<string, number[]>;
}

/**
 * Outer join on date. Each column is forward-filled; dates before a series
 * starts stay NaN for that series.
 */
export function alignByDate(seriesMap: Readonly<Record<string, readonly Observation[]>>): AlignedSeries {
  const entries = Object.entries(seriesMap);
  const dates = Array.from(new Set(entries.flatMap(([, series]) => series.map((o) => o.date)))).sort();

  const columns = Object.fromEntries(
    entries.map(([name, series]): [string, number[]] => {
      const byDate = new Map(series.map((o): [string, number] => [o.date, o.value]));
      return [name, forwardFill(dates.map((date) => byDate.get(date) ?? NaN))];
    }),
  );
  return { dates, columns };
}

export const valuesOf = (observations: readonly Observation[]): number[] =>
  observations.map((o) => o.value);

/**
 * Last finite value, or NaN when there is none
 */
export function lastFinite(values: readonly number[]): number {
  for (let i = values.length - 1; i >= 0; i--) {
    if (Number.isFinite(values[i])) return values[i];
  }
  return NaN;
}
