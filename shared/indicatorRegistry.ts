import type { Config } from '../config.js';
import { UnknownIndicatorError } from '../errors.js';
import type { ChartKind, IndicatorConfig } from './types.js';

const fredLink = (seriesId: string): string => `https://fred.stlouisfed.org/series/${seriesId}`;

const defaults = {
  yahooSymbols: [],
  transform: 'level',
  threshold: null,
  trendCount: 3,
  changeCap: null,
  cardChartHeight: 360,
  cacheSource: 'fred',
} as const;

/**
 * Indicator definitions in display order. The composite and liquidity entries
 * take their series from configuration.
 */
function definitions(config: Config): IndicatorConfig[] {
  const { pmi, liquidity } = config;
  return [
    {
      ...defaults,
      key: 'initial_claims',
      displayName: 'Initial Jobless Claims',
      emoji: '🏢',
      kind: 'series',
      fredSeries: ['ICSA'],
      periods: 52,
      frequency: 'w',
      risingIsBullish: false,
      chart: 'line',
      status: 'trend',
      description:
        'Weekly first-time unemployment filings. Three straight weekly increases tend to show up ahead of broader labour-market stress.',
      chartColor: '#1a7fe0',
      fredLink: fredLink('ICSA'),
      release: { releaseId: 180, cadence: { kind: 'weekly', weekday: 4 } },
    },
    {
      ...defaults,
      key: 'pce',
      displayName: 'Personal Consumption Expenditures',
      emoji: '💰',
      kind: 'series',
      fredSeries: ['PCE'],
      transform: 'yoy',
      periods: 24,
      frequency: 'm',
      threshold: 3.5,
      risingIsBullish: false,
      chart: 'line',
      status: 'below_threshold',
      description:
        'Year-over-year growth in consumer spending. Readings above 3.5% point to inflation pressure the central bank has to lean against.',
      chartColor: '#00c853',
      fredLink: fredLink('PCE'),
      release: { releaseId: 54, cadence: { kind: 'monthly', day: 'last_business_day' } },
    },
    {
      ...defaults,
      key: 'core_cpi',
      displayName: 'Core Consumer Price Index',
      emoji: '📊',
      kind: 'series',
      fredSeries: ['CPILFESL'],
      transform: 'mom',
      periods: 24,
      frequency: 'm',
      risingIsBullish: false,
      chart: 'line',
      status: 'trend',
      description:
        'Month-over-month core inflation. Three accelerating prints in a row signal re-acceleration; three decelerating prints open room for easier policy.',
      chartColor: '#ff9800',
      fredLink: fredLink('CPILFESL'),
      release: { releaseId: 10, cadence: { kind: 'monthly', day: 12 } },
    },
    {
      ...defaults,
      key: 'hours_worked',
      displayName: 'Average Weekly Hours Worked',
      emoji: '⏰',
      kind: 'series',
      fredSeries: ['AWHAETP'],
      periods: 24,
      frequency: 'm',
      threshold: 34,
      changeCap: [-2, 2],
      risingIsBullish: true,
      chart: 'line',
      status: 'above_threshold',
      description:
        'Employers cut hours before they cut jobs. Sustained declines, or a level under 34 hours, are an early sign of weakening demand for labour.',
      chartColor: '#78909c',
      fredLink: fredLink('AWHAETP'),
      release: { releaseId: 50, cadence: { kind: 'monthly_weekday', weekday: 5 } },
    },
    {
      ...defaults,
      key: 'yield_curve',
      displayName: '2-10 Year Treasury Spread',
      emoji: '📈',
      kind: 'series',
      fredSeries: ['T10Y2Y'],
      periods: 60,
      frequency: 'm',
      threshold: 0,
      risingIsBullish: true,
      chart: 'line',
      status: 'above_threshold',
      description:
        'Ten-year minus two-year Treasury yield. A negative spread (inversion) has preceded past recessions; re-steepening after inversion often marks the onset.',
      chartColor: '#f44336',
      fredLink: fredLink('T10Y2Y'),
      release: { releaseId: null, cadence: { kind: 'daily' } },
    },
    {
      ...defaults,
      key: 'credit_spread',
      displayName: 'High Yield Credit Spread',
      emoji: '💎',
      kind: 'series',
      fredSeries: ['BAMLH0A0HYM2'],
      periods: 60,
      frequency: 'm',
      threshold: 5,
      risingIsBullish: false,
      chart: 'line',
      status: 'below_threshold',
      description:
        'Option-adjusted spread on high-yield corporate bonds. Above 5% the credit market is pricing in stress; sharp widening tends to lead equity drawdowns.',
      chartColor: '#9c27b0',
      fredLink: fredLink('BAMLH0A0HYM2'),
      release: { releaseId: null, cadence: { kind: 'daily' } },
    },
    {
      ...defaults,
      key: 'pscf_price',
      displayName: 'Copper Price (PSCF)',
      emoji: '🔩',
      kind: 'series',
      fredSeries: ['PSCF'],
      periods: 24,
      frequency: 'm',
      risingIsBullish: true,
      chart: 'line',
      status: 'trend',
      description:
        'Global copper price. Industrial demand makes it a cycle barometer: rising prices track expanding manufacturing and construction.',
      chartColor: '#ff5722',
      fredLink: fredLink('PSCF'),
      release: { releaseId: null, cadence: { kind: 'monthly', day: 15 } },
    },
    {
      ...defaults,
      key: 'new_orders',
      displayName: 'New Orders Index',
      emoji: '📦',
      kind: 'series',
      fredSeries: ['NEWORDER'],
      transform: 'mom',
      periods: 24,
      frequency: 'm',
      threshold: 0,
      risingIsBullish: true,
      chart: 'bar',
      status: 'above_threshold',
      description:
        'Month-over-month change in manufacturers’ new orders for core capital goods. Consecutive declines usually lead factory weakness by a few months.',
      chartColor: '#607d8b',
      fredLink: fredLink('NEWORDER'),
      release: { releaseId: 95, cadence: { kind: 'monthly', day: 25 } },
    },
    {
      ...defaults,
      key: 'pmi_proxy',
      displayName: 'Manufacturing PMI Proxy',
      emoji: '🏭',
      kind: 'composite',
      fredSeries: Object.values(pmi.components),
      components: pmi.components,
      weights: pmi.weights,
      periods: 24,
      frequency: 'm',
      threshold: 50,
      risingIsBullish: true,
      chart: 'composite',
      status: 'composite_midpoint',
      description:
        'Weighted diffusion index of new orders, production, employment, supplier deliveries and inventories. Above 50 is expansion, below 50 contraction.',
      chartColor: '#4caf50',
      fredLink: null,
      release: { releaseId: 13, cadence: { kind: 'monthly', day: 16 } },
    },
    {
      ...defaults,
      key: 'usd_liquidity',
      displayName: 'USD Liquidity Conditions',
      emoji: '💧',
      kind: 'liquidity',
      fredSeries: [liquidity.fedBalance, liquidity.reverseRepo, liquidity.treasuryAccount],
      periods: 60,
      frequency: 'm',
      risingIsBullish: true,
      chart: 'line',
      status: 'liquidity_trend',
      description:
        'Fed balance sheet less reverse repo and the Treasury General Account. Three months of rising net liquidity have historically supported risk assets.',
      chartColor: '#2196f3',
      fredLink: null,
      release: { releaseId: 20, cadence: { kind: 'weekly', weekday: 4 } },
    },
    {
      ...defaults,
      key: 'copper_gold_yield',
      displayName: 'Copper/Gold vs 10Y Treasury',
      emoji: '🥇',
      kind: 'ratio',
      fredSeries: ['DGS10'],
      yahooSymbols: ['HG=F', 'GC=F'],
      periods: 252,
      frequency: 'd',
      risingIsBullish: true,
      chart: 'dual_axis',
      status: 'ratio_trend',
      description:
        'Copper/gold price ratio against the 10-year yield. A rising ratio reflects growth expectations; divergence from yields tends to resolve with a repricing.',
      chartColor: '#ff6f00',
      fredLink: fredLink('DGS10'),
      release: { releaseId: null, cadence: { kind: 'daily' } },
      cacheSource: 'yahoo',
    },
    {
      ...defaults,
      key: 'regime_quadrant',
      displayName: 'Growth / Inflation Regime',
      emoji: '🧭',
      kind: 'regime',
      fredSeries: [],
      yahooSymbols: ['CPER', 'GLD', 'TIP', 'IEF'],
      periods: 26,
      frequency: null,
      risingIsBullish: true,
      chart: 'regime_quadrant',
      status: 'regime',
      description:
        'Growth momentum from copper versus gold and inflation momentum from TIPS versus Treasuries, placed on a four-quadrant regime map.',
      chartColor: '#3f51b5',
      cardChartHeight: 420,
      fredLink: null,
      release: { releaseId: null, cadence: { kind: 'daily' } },
      cacheSource: 'yahoo',
    },
  ];
}

/**
 * Immutable, explicitly constructed indicator lookup
 */
export class IndicatorRegistry {
  private readonly entries: ReadonlyMap<string, IndicatorConfig>;

  constructor(indicators: readonly IndicatorConfig[]) {
    this.entries = new Map(indicators.map((indicator): [string, IndicatorConfig] => [indicator.key, Object.freeze(indicator)]));
  }

  get size(): number {
    return this.entries.size;
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  find(key: string): IndicatorConfig | undefined {
    return this.entries.get(key);
  }

  /**
   * @throws UnknownIndicatorError
   */
  get(key: string): IndicatorConfig {
    const indicator = this.entries.get(key);
    if (!indicator) throw new UnknownIndicatorError(key);
    return indicator;
  }

  keys(): string[] {
    return Array.from(this.entries.keys());
  }

  list(): IndicatorConfig[] {
    return Array.from(this.entries.values());
  }

  byChart(chart: ChartKind): IndicatorConfig[] {
    return this.list().filter((indicator) => indicator.chart === chart);
  }

  fredIndicators(): IndicatorConfig[] {
    return this.list().filter((indicator) => indicator.fredSeries.length > 0);
  }

  yahooIndicators(): IndicatorConfig[] {
    return this.list().filter((indicator) => indicator.yahooSymbols.length > 0);
  }
}

export const createIndicatorRegistry = (config: Config): IndicatorRegistry =>
  new IndicatorRegistry(definitions(config));
