/**
 * Core type definitions for the macro dashboard
 */

/**
 * One dated value, oldest first in every series
 */
export interface Observation {
  /** YYYY-MM-DD */
  date: string;
  value: number;
}

export type TrendDirection = 'increasing' | 'decreasing';

/**
 * FRED aggregation frequency codes
 */
export type Frequency = 'd' | 'w' | 'm' | 'q';

export interface SeriesRequest {
  start?: string;
  end?: string;
  frequency?: Frequency;
  /** keep only the most recent N observations */
  limit?: number;
}

/**
 * Statistics API collaborator
 */
export interface SeriesSource {
  fetchSeries(seriesId: string, request?: SeriesRequest): Promise<Observation[]>;
}

export type QuoteInterval = '1d' | '1wk' | '1mo';

export interface QuoteRequest {
  start: string;
  end: string;
  interval?: QuoteInterval;
}

/**
 * Financial quotes collaborator; values are closing prices
 */
export interface QuoteSource {
  fetchQuotes(symbol: string, request: QuoteRequest): Promise<Observation[]>;
}

export interface ReleaseDatesRequest {
  /** first date of interest, ISO */
  from: string;
  limit?: number;
}

/**
 * Upcoming publication dates of a statistical release
 */
export interface ReleaseDateSource {
  fetchReleaseDates(releaseId: number, request: ReleaseDatesRequest): Promise<string[]>;
}

/** weekdays count from 0 = Sunday */
export type ReleaseCadence =
  | { kind: 'daily' }
  | { kind: 'weekly'; weekday: number }
  | { kind: 'monthly'; day: number | 'last_business_day' }
  | { kind: 'monthly_weekday'; weekday: number };

export interface ReleaseSchedule {
  /** FRED release id; null when only an estimate is possible */
  releaseId: number | null;
  cadence: ReleaseCadence;
}

export interface NextRelease {
  date: string;
  source: 'fred' | 'estimated';
}

export type IndicatorKind = 'series' | 'composite' | 'liquidity' | 'ratio' | 'regime';

export type ValueTransform = 'level' | 'yoy' | 'mom';

export type ChartKind = 'line' | 'bar' | 'dual_axis' | 'composite' | 'regime_quadrant';

export type StatusStrategy =
  | 'below_threshold'
  | 'above_threshold'
  | 'trend'
  | 'composite_midpoint'
  | 'liquidity_trend'
  | 'ratio_trend'
  | 'regime';

export type CacheSourceKind = 'fred' | 'yahoo';

interface BaseIndicatorConfig {
  key: string;
  displayName: string;
  emoji: string;
  fredSeries: readonly string[];
  yahooSymbols: readonly string[];
  transform: ValueTransform;
  /** number of points shown */
  periods: number;
  frequency: Frequency | null;
  threshold: number | null;
  risingIsBullish: boolean;
  trendCount: number;
  /** bounds, in percent, for the period-over-period change shown on the card */
  changeCap: readonly [number, number] | null;
  chart: ChartKind;
  status: StatusStrategy;
  description: string;
  chartColor: string;
  cardChartHeight: number;
  fredLink: string | null;
  release: ReleaseSchedule;
  cacheSource: CacheSourceKind;
}

export interface SimpleIndicatorConfig extends BaseIndicatorConfig {
  kind: Exclude<IndicatorKind, 'composite'>;
}

export interface CompositeIndicatorConfig extends BaseIndicatorConfig {
  kind: 'composite';
  /** component name → FRED series id */
  components: Readonly<Record<string, string>>;
  weights: Readonly<Record<string, number>>;
}

export type IndicatorConfig = SimpleIndicatorConfig | CompositeIndicatorConfig;

export interface SeriesPoint {
  date: string;
  raw: number | null;
  value: number | null;
}

export interface SeriesTrendFlags {
  increasing: boolean;
  decreasing: boolean;
  rising: boolean;
  consecutiveIncreases: number;
  consecutiveDeclines: number;
}

export interface SeriesIndicatorData {
  kind: 'series';
  key: string;
  seriesId: string;
  transform: ValueTransform;
  series: SeriesPoint[];
  latest: number | null;
  latestDate: string | null;
  previous: number | null;
  /** percent change of the raw series over its last period */
  latestChange: number | null;
  /** `latestChange` clamped to the indicator's `changeCap` */
  latestChangeDisplay: number | null;
  trendFlags: SeriesTrendFlags;
}

export interface ComponentRow {
  date: string;
  raw: number | null;
  pctChange: number | null;
  rollingStd: number | null;
  diffusion: number;
}

export interface ComponentBreakdown {
  name: string;
  baseWeight: number;
  weight: number;
  latestPctChange: number | null;
  latestStd: number | null;
  latestDiffusion: number;
  rows: ComponentRow[];
}

export type CompositeRegime = 'expansion' | 'contraction' | 'neutral';

export interface CompositeResult {
  series: Observation[];
  latest: number;
  latestDate: string;
  regime: CompositeRegime;
  belowMidpoint: boolean;
  /** renormalized over the components actually used */
  weights: Record<string, number>;
  missing: string[];
  components: ComponentBreakdown[];
}

export interface CompositeIndicatorData extends CompositeResult {
  kind: 'composite';
  key: string;
  trendFlags: {
    belowMidpoint: boolean;
    increasing: boolean;
    decreasing: boolean;
  };
}

export interface LiquidityPoint {
  date: string;
  fedBalance: number;
  reverseRepo: number;
  treasuryAccount: number;
  liquidity: number;
}

export interface LiquidityIndicatorData {
  kind: 'liquidity';
  key: string;
  series: LiquidityPoint[];
  latest: number | null;
  latestDate: string | null;
  trendFlags: {
    increasing: boolean;
    decreasing: boolean;
  };
}

export interface RatioPoint {
  date: string;
  copper: number;
  gold: number;
  ratio: number;
  yield: number | null;
}

export interface RatioIndicatorData {
  kind: 'ratio';
  key: string;
  series: RatioPoint[];
  latestRatio: number | null;
  latestYield: number | null;
  latestDate: string | null;
  trendFlags: {
    ratioRising: boolean;
    yieldRising: boolean;
    divergence: boolean;
  };
}

export type Regime = 'Reflation' | 'Goldilocks' | 'Stagflation' | 'Deflation';

export interface RegimePoint {
  date: string;
  growth: number;
  inflation: number;
}

export interface RegimeIndicatorData {
  kind: 'regime';
  key: string;
  trail: RegimePoint[];
  current: (RegimePoint & { regime: Regime }) | null;
  projected: { growth: number; inflation: number } | null;
  description: string;
}

export type IndicatorData =
  | SeriesIndicatorData
  | CompositeIndicatorData
  | LiquidityIndicatorData
  | RatioIndicatorData
  | RegimeIndicatorData;
