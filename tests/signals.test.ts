import { describe, it, expect } from 'vitest';
import { computeComposite } from '../computeComposite.js';
import { buildCompositeIndicator, buildSeriesIndicator } from '../indicators.js';
import { createIndicatorRegistry } from '../shared/indicatorRegistry.js';
import type { LiquidityIndicatorData, RegimeIndicatorData } from '../shared/types.js';
import { evaluateStatus, formatMillions, formatValue, trendLabel } from '../utils/signals.js';
import { monthlySeries, testConfig } from './fakes.js';

const registry = createIndicatorRegistry(testConfig('data/cache'));

const seriesData = (key: string, values: number[]) =>
  buildSeriesIndicator(key, monthlySeries(values), {
    seriesId: key,
    transform: 'level',
    periods: 24,
    frequency: 'm',
    trendCount: 3,
  });

describe('formatting', () => {
  it('formats headline numbers by magnitude', () => {
    expect(formatValue(null)).toBe('N/A');
    expect(formatValue(NaN)).toBe('N/A');
    expect(formatValue(0.005)).toBe('0.00500');
    expect(formatValue(12.5)).toBe('12.50');
    expect(formatValue(1234567)).toBe('1,234,567');
  });

  it('formats millions of dollars', () => {
    expect(formatMillions(6_340_000)).toBe('$6.34T');
    expect(formatMillions(2_500)).toBe('$2.5B');
    expect(formatMillions(500)).toBe('$500M');
    expect(formatMillions(-2_500)).toBe('-$2.5B');
    expect(formatMillions(null)).toBe('N/A');
  });
});

describe('trendLabel', () => {
  it('describes the recent direction', () => {
    expect(trendLabel([1, 2, 3])).toBe('Increasing');
    expect(trendLabel([3, 2, 1])).toBe('Decreasing');
    expect(trendLabel([1, 3, 2])).toBe('Mixed (upward bias)');
    expect(trendLabel([3, 1, 2])).toBe('Mixed (downward bias)');
    expect(trendLabel([1, 2, 1])).toBe('Flat');
    expect(trendLabel([1])).toBe('Insufficient data');
  });
});

describe('evaluateStatus', () => {
  it('reads a threshold strategy', () => {
    const badge = evaluateStatus(seriesData('pce', [3, 4.2]), registry.get('pce'));
    expect(badge).toEqual({
      status: 'Bearish',
      indicator: 'red',
      headline: '4.20 is above 3.50',
      displayValue: '4.20',
      trend: 'Insufficient data',
      description: registry.get('pce').description,
    });
  });

  it('shows the capped last change next to the level for hours worked', () => {
    const hours = registry.get('hours_worked');
    const data = buildSeriesIndicator('hours_worked', monthlySeries([34, 34.2, 35]), {
      seriesId: 'AWHAETP',
      transform: 'level',
      periods: 24,
      frequency: 'm',
      trendCount: 3,
      changeCap: hours.changeCap,
    });

    expect(data.latestChange).toBeCloseTo(2.33918, 4);
    expect(data.latestChangeDisplay).toBe(2);
    expect(evaluateStatus(data, hours)).toMatchObject({
      status: 'Bullish',
      headline: '35.00 is above 34.00',
      displayValue: '35.00 (+2.00%)',
    });
  });

  it('leaves the display value alone without a change cap', () => {
    const data = seriesData('pce', [3, 4.2]);
    expect(data.latestChange).toBeCloseTo(40, 10);
    expect(data.latestChangeDisplay).toBeCloseTo(40, 10);
    expect(evaluateStatus(data, registry.get('pce')).displayValue).toBe('4.20');
  });

  it('reads a trend strategy against the indicator polarity', () => {
    const badge = evaluateStatus(seriesData('initial_claims', [200, 210, 220, 230]), registry.get('initial_claims'));
    expect(badge.status).toBe('Bearish');
    expect(badge.headline).toBe('Rising 3 periods in a row');
    expect(badge.trend).toBe('Increasing');
  });

  it('is neutral without a clear trend', () => {
    const badge = evaluateStatus(seriesData('pscf_price', [1, 3, 2, 4]), registry.get('pscf_price'));
    expect(badge).toMatchObject({ status: 'Neutral', indicator: 'grey', headline: 'No clear trend' });
  });

  it('reads the composite midpoint', () => {
    const composite = buildCompositeIndicator(
      'pmi_proxy',
      computeComposite({ a: monthlySeries([100, 110, 99]) }, { a: 1 }, { stdWindow: 3, minPeriods: 2, fallbackWindows: [] }),
      24,
    );
    const badge = evaluateStatus(composite, registry.get('pmi_proxy'));
    expect(badge).toMatchObject({ status: 'Bearish', headline: 'Contraction', displayValue: '42.9' });
  });

  it('reads net liquidity', () => {
    const data: LiquidityIndicatorData = {
      kind: 'liquidity',
      key: 'usd_liquidity',
      series: [],
      latest: 6_340_000,
      latestDate: '2024-03-06',
      trendFlags: { increasing: true, decreasing: false },
    };
    expect(evaluateStatus(data, registry.get('usd_liquidity'))).toMatchObject({
      status: 'Bullish',
      headline: 'Liquidity rising',
      displayValue: '$6.34T',
    });
  });

  it('reads the regime and uses its own description', () => {
    const data: RegimeIndicatorData = {
      kind: 'regime',
      key: 'regime_quadrant',
      trail: [],
      current: { date: '2024-06-28', growth: 0.5, inflation: -0.25, regime: 'Goldilocks' },
      projected: { growth: 0.7, inflation: -0.3 },
      description: 'Growth up, inflation down.',
    };
    expect(evaluateStatus(data, registry.get('regime_quadrant'))).toMatchObject({
      status: 'Bullish',
      headline: 'Goldilocks',
      displayValue: 'growth 0.50, inflation -0.25',
      description: 'Growth up, inflation down.',
    });
  });
});
