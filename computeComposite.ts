import { NoViableInputError } from './errors.js';
import { nullable } from './shared/guards.js';
import type {
  ComponentBreakdown,
  CompositeRegime,
  CompositeResult,
  Observation,
} from './shared/types.js';
import {
  DIFFUSION_NEUTRAL,
  alignByDate,
  diffusionIndex,
  percentChange,
  resampleMonthlyLast,
  rollingStd,
} from './utils/transforms.js';

export interface CompositeOptions {
  /** months */
  stdWindow?: number;
  minPeriods?: number;
  fallbackWindows?: readonly number[];
}

const DEFAULT_STD_WINDOW = 120;
const DEFAULT_MIN_PERIODS = 24;
const DEFAULT_FALLBACK_WINDOWS = [60, 36, 24];

/**
 * Redistributes weight proportionally over the available components.
 *
 * @throws NoViableInputError when nothing with positive weight is available
 */
export function renormalizeWeights(
  weights: Readonly<Record<string, number>>,
  available: readonly string[],
): Record<string, number> {
  const usable = available.filter((name) => (weights[name] ?? 0) > 0);
  const total = usable.reduce((sum, name) => sum + weights[name], 0);
  if (usable.length === 0 || !(total > 0)) {
    throw new NoViableInputError(Object.keys(weights));
  }
  return Object.fromEntries(usable.map((name): [string, number] => [name, weights[name] / total]));
}

const regimeOf = (value: number): CompositeRegime =>
  value > DIFFUSION_NEUTRAL ? 'expansion' : value < DIFFUSION_NEUTRAL ? 'contraction' : 'neutral';

/**
 * Weighted diffusion-index composite.
 *
 * Each component is resampled to month-end, converted to month-over-month
 * percent change and scaled by its own rolling volatility into a [0, 100]
 * diffusion index. Components without at least two months of data are
 * dropped and the remaining weights renormalized.
 *
 * @param components - component name → observations; absent or empty means unavailable
 * @param weights - configured weight per component name
 * @throws NoViableInputError when no component is usable
 */
export function computeComposite(
  components: Readonly<Record<string, readonly Observation[] | undefined>>,
  weights: Readonly<Record<string, number>>,
  options: CompositeOptions = {},
): CompositeResult {
  const stdWindow = options.stdWindow ?? DEFAULT_STD_WINDOW;
  const minPeriods = options.minPeriods ?? DEFAULT_MIN_PERIODS;
  const fallbackWindows = options.fallbackWindows ?? DEFAULT_FALLBACK_WINDOWS;

  const requested = Object.keys(weights);
  const monthly = new Map<string, Observation[]>();
  for (const name of requested) {
    const resampled = resampleMonthlyLast(components[name] ?? []);
    if (resampled.length >= 2) monthly.set(name, resampled);
  }

  if (monthly.size === 0) throw new NoViableInputError(requested);
  const normalized = renormalizeWeights(weights, Array.from(monthly.keys()));
  const used = Object.keys(normalized);
  const missing = requested.filter((name) => !(name in normalized));

  const { dates, columns } = alignByDate(
    Object.fromEntries(used.map((name): [string, Observation[]] => [name, monthly.get(name) ?? []])),
  );

  const scored = used.map((name) => {
    const raw = columns[name];
    const pct = percentChange(raw, 1);
    const std = rollingStd(pct, stdWindow, minPeriods, fallbackWindows);
    const diffusion = pct.map((value, i) => diffusionIndex(value, std[i]));
    return { name, raw, pct, std, diffusion };
  });

  const series: Observation[] = [];
  dates.forEach((date, i) => {
    // Nothing has moved yet on the first aligned month
    if (scored.every(({ pct }) => !Number.isFinite(pct[i]))) return;
    const value = scored.reduce((sum, { name, diffusion }) => sum + normalized[name] * diffusion[i], 0);
    series.push({ date, value });
  });

  if (series.length === 0) throw new NoViableInputError(requested);
  const last = series[series.length - 1];
  const lastIndex = dates.length - 1;

  const breakdowns: ComponentBreakdown[] = scored.map(({ name, raw, pct, std, diffusion }) => ({
    name,
    baseWeight: weights[name],
    weight: normalized[name],
    latestPctChange: nullable(pct[lastIndex]),
    latestStd: nullable(std[lastIndex]),
    latestDiffusion: diffusion[lastIndex],
    rows: dates.map((date, i) => ({
      date,
      raw: nullable(raw[i]),
      pctChange: nullable(pct[i]),
      rollingStd: nullable(std[i]),
      diffusion: diffusion[i],
    })),
  }));

  return {
    series,
    latest: last.value,
    latestDate: last.date,
    regime: regimeOf(last.value),
    belowMidpoint: last.value < DIFFUSION_NEUTRAL,
    weights: normalized,
    missing,
    components: breakdowns,
  };
}
