/**
 * Status badges for indicator cards
 *
 * Each `StatusStrategy` named in the registry maps to one function here.
 */
import type { IndicatorConfig, IndicatorData, Regime, StatusStrategy } from '../shared/types.js';
import { DIFFUSION_NEUTRAL } from './transforms.js';

export type SignalStatus = 'Bullish' | 'Bearish' | 'Neutral';
export type SignalColor = 'green' | 'red' | 'grey';

export interface StatusBadge {
  status: SignalStatus;
  indicator: SignalColor;
  headline: string;
  displayValue: string;
  trend: string;
  description: string;
}

type Verdict = Pick<StatusBadge, 'status' | 'headline' | 'displayValue'>;

type StatusFn = (data: IndicatorData, config: IndicatorConfig) => Verdict;

const COLORS: Record<SignalStatus, SignalColor> = {
  Bullish: 'green',
  Bearish: 'red',
  Neutral: 'grey',
};

/**
 * Compact number for display: tiny values keep five decimals, large ones
 * get thousands separators.
 */
export function formatValue(value: number | null): string {
  if (value === null || !Number.isFinite(value)) return 'N/A';
  const magnitude = Math.abs(value);
  if (magnitude < 0.01) return value.toFixed(5);
  if (magnitude < 1000) return value.toFixed(2);
  return value.toLocaleString('en-US', { maximumFractionDigits: 0 });
}

/**
 * Liquidity figures arrive in millions of dollars
 */
export function formatMillions(value: number | null): string {
  if (value === null || !Number.isFinite(value)) return 'N/A';
  const sign = value < 0 ? '-' : '';
  const magnitude = Math.abs(value);
  if (magnitude >= 1_000_000) return `${sign}$${(magnitude / 1_000_000).toFixed(2)}T`;
  if (magnitude >= 1_000) return `${sign}$${(magnitude / 1_000).toFixed(1)}B`;
  return `${sign}$${magnitude.toFixed(0)}M`;
}

const formatChange = (value: number): string => `${value >= 0 ? '+' : ''}${value.toFixed(2)}%`;

/**
 * Direction of the last `periods` values
 */
export function trendLabel(values: readonly number[], periods = 3): string {
  if (periods < 2 || values.length < periods) return 'Insufficient data';
  const recent = values.slice(-periods);
  const steps = recent.slice(1).map((value, i) => value - recent[i]);
  if (steps.every((step) => step > 0)) return 'Increasing';
  if (steps.every((step) => step < 0)) return 'Decreasing';
  const first = recent[0];
  const last = recent[recent.length - 1];
  if (last > first) return 'Mixed (upward bias)';
  if (last < first) return 'Mixed (downward bias)';
  return 'Flat';
}

/**
 * The number a card leads with
 */
export function headlineValue(data: IndicatorData): number | null {
  switch (data.kind) {
    case 'series':
    case 'composite':
    case 'liquidity':
      return data.latest;
    case 'ratio':
      return data.latestRatio;
    case 'regime':
      return data.current?.growth ?? null;
  }
}

export function valueHistory(data: IndicatorData): number[] {
  switch (data.kind) {
    case 'series':
      return data.series.flatMap((point) => (point.value === null ? [] : [point.value]));
    case 'composite':
      return data.series.map((point) => point.value);
    case 'liquidity':
      return data.series.map((point) => point.liquidity);
    case 'ratio':
      return data.series.map((point) => point.ratio);
    case 'regime':
      return data.trail.map((point) => point.growth);
  }
}

function direction(data: IndicatorData): 'increasing' | 'decreasing' | null {
  switch (data.kind) {
    case 'series':
    case 'composite':
    case 'liquidity':
      if (data.trendFlags.increasing) return 'increasing';
      if (data.trendFlags.decreasing) return 'decreasing';
      return null;
    case 'ratio':
      return data.trendFlags.ratioRising ? 'increasing' : 'decreasing';
    case 'regime':
      return null;
  }
}

const neutral = (headline: string, displayValue = 'N/A'): Verdict => ({ status: 'Neutral', headline, displayValue });

const threshold =
  (bullishWhenBelow: boolean): StatusFn =>
  (data, config) => {
    const value = headlineValue(data);
    const displayValue = formatValue(value);
    if (value === null || config.threshold === null) return neutral('No data', displayValue);
    const below = value < config.threshold;
    const side = below ? 'below' : value > config.threshold ? 'above' : 'at';
    return {
      status: below === bullishWhenBelow ? 'Bullish' : 'Bearish',
      headline: `${displayValue} is ${side} ${formatValue(config.threshold)}`,
      displayValue,
    };
  };

const trend: StatusFn = (data, config) => {
  const displayValue = formatValue(headlineValue(data));
  const moving = direction(data);
  if (moving === null) return neutral('No clear trend', displayValue);
  const bullish = (moving === 'increasing') === config.risingIsBullish;
  return {
    status: bullish ? 'Bullish' : 'Bearish',
    headline: `${moving === 'increasing' ? 'Rising' : 'Falling'} ${config.trendCount} periods in a row`,
    displayValue,
  };
};

const compositeMidpoint: StatusFn = (data) => {
  if (data.kind !== 'composite') return neutral('Not a composite');
  const displayValue = data.latest.toFixed(1);
  if (data.latest > DIFFUSION_NEUTRAL) return { status: 'Bullish', headline: 'Expansion', displayValue };
  if (data.latest < DIFFUSION_NEUTRAL) return { status: 'Bearish', headline: 'Contraction', displayValue };
  return neutral('At the midpoint', displayValue);
};

const liquidityTrend: StatusFn = (data) => {
  if (data.kind !== 'liquidity') return neutral('Not a liquidity series');
  const displayValue = formatMillions(data.latest);
  if (data.trendFlags.increasing) return { status: 'Bullish', headline: 'Liquidity rising', displayValue };
  if (data.trendFlags.decreasing) return { status: 'Bearish', headline: 'Liquidity falling', displayValue };
  return neutral('No Trend', displayValue);
};

const ratioTrend: StatusFn = (data) => {
  if (data.kind !== 'ratio') return neutral('Not a ratio');
  const displayValue = formatValue(data.latestRatio);
  if (data.latestRatio === null) return neutral('No data', displayValue);
  const { ratioRising, divergence } = data.trendFlags;
  const headline = `Ratio ${ratioRising ? 'rising' : 'falling'}${divergence ? ', diverging from yields' : ''}`;
  return { status: ratioRising ? 'Bullish' : 'Bearish', headline, displayValue };
};

const REGIME_STATUS: Record<Regime, SignalStatus> = {
  Goldilocks: 'Bullish',
  Reflation: 'Neutral',
  Stagflation: 'Bearish',
  Deflation: 'Bearish',
};

const regime: StatusFn = (data) => {
  if (data.kind !== 'regime' || data.current === null) return neutral('Insufficient data');
  const { regime: current, growth, inflation } = data.current;
  return {
    status: REGIME_STATUS[current],
    headline: current,
    displayValue: `growth ${growth.toFixed(2)}, inflation ${inflation.toFixed(2)}`,
  };
};

const STRATEGIES: Record<StatusStrategy, StatusFn> = {
  below_threshold: threshold(true),
  above_threshold: threshold(false),
  trend,
  composite_midpoint: compositeMidpoint,
  liquidity_trend: liquidityTrend,
  ratio_trend: ratioTrend,
  regime,
};

export function evaluateStatus(data: IndicatorData, config: IndicatorConfig): StatusBadge {
  const verdict = STRATEGIES[config.status](data, config);
  // Indicators with a change cap show the clamped last change beside the level
  const change = data.kind === 'series' && config.changeCap !== null ? data.latestChangeDisplay : null;
  return {
    ...verdict,
    displayValue: change === null ? verdict.displayValue : `${verdict.displayValue} (${formatChange(change)})`,
    indicator: COLORS[verdict.status],
    trend: trendLabel(valueHistory(data), config.trendCount),
    description: data.kind === 'regime' ? data.description : config.description,
  };
}
