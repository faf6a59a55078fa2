/**
 * JSON chart specifications for indicator cards
 *
 * A front end renders these; nothing here draws.
 */
import type { ChartKind, IndicatorConfig, IndicatorData } from '../shared/types.js';
import { DIFFUSION_NEUTRAL } from './transforms.js';

export interface ChartPoint {
  x: string | number;
  y: number | null;
  label?: string;
}

export interface ChartTrace {
  name: string;
  axis: 'y' | 'y2';
  style: 'line' | 'bar' | 'markers';
  color: string;
  points: ChartPoint[];
}

export interface ChartThreshold {
  value: number;
  label: string;
  axis: 'x' | 'y';
}

export interface ChartSpec {
  kind: ChartKind;
  title: string;
  height: number;
  color: string;
  axes: { x: string; y: string; y2?: string };
  traces: ChartTrace[];
  thresholds: ChartThreshold[];
}

type ChartBuilder = (data: IndicatorData, config: IndicatorConfig) => ChartSpec;

const SECONDARY_COLOR = '#9e9e9e';
const PROJECTION_COLOR = '#e91e63';

const TRANSFORM_LABELS = { level: 'Level', yoy: 'YoY %', mom: 'MoM %' } as const;

function primaryTrace(data: IndicatorData, config: IndicatorConfig): { name: string; points: ChartPoint[] } {
  switch (data.kind) {
    case 'series':
      return {
        name: `${config.displayName} (${TRANSFORM_LABELS[data.transform]})`,
        points: data.series.map((point) => ({ x: point.date, y: point.value })),
      };
    case 'composite':
      return { name: 'Composite', points: data.series.map((point) => ({ x: point.date, y: point.value })) };
    case 'liquidity':
      return { name: 'Net liquidity', points: data.series.map((point) => ({ x: point.date, y: point.liquidity })) };
    case 'ratio':
      return { name: 'Copper/Gold', points: data.series.map((point) => ({ x: point.date, y: point.ratio })) };
    case 'regime':
      return { name: 'Growth momentum', points: data.trail.map((point) => ({ x: point.date, y: point.growth })) };
  }
}

const thresholdsOf = (config: IndicatorConfig): ChartThreshold[] =>
  config.threshold === null
    ? []
    : [{ value: config.threshold, label: `Threshold ${config.threshold}`, axis: 'y' }];

const base = (config: IndicatorConfig, kind: ChartKind): Omit<ChartSpec, 'traces' | 'thresholds' | 'axes'> => ({
  kind,
  title: `${config.emoji} ${config.displayName}`,
  height: config.cardChartHeight,
  color: config.chartColor,
});

const simple =
  (style: 'line' | 'bar'): ChartBuilder =>
  (data, config) => {
    const primary = primaryTrace(data, config);
    return {
      ...base(config, style),
      axes: { x: 'Date', y: primary.name },
      traces: [{ ...primary, axis: 'y', style, color: config.chartColor }],
      thresholds: thresholdsOf(config),
    };
  };

/**
 * Ratio against yield for the ratio indicator; transformed value against raw
 * level for anything else.
 */
const dualAxis: ChartBuilder = (data, config) => {
  const primary = primaryTrace(data, config);
  let secondary: { name: string; points: ChartPoint[] } | null = null;
  if (data.kind === 'ratio') {
    secondary = { name: '10Y yield', points: data.series.map((point) => ({ x: point.date, y: point.yield })) };
  } else if (data.kind === 'series') {
    secondary = { name: 'Level', points: data.series.map((point) => ({ x: point.date, y: point.raw })) };
  }

  const traces: ChartTrace[] = [{ ...primary, axis: 'y', style: 'line', color: config.chartColor }];
  if (secondary) traces.push({ ...secondary, axis: 'y2', style: 'line', color: SECONDARY_COLOR });
  return {
    ...base(config, 'dual_axis'),
    axes: { x: 'Date', y: primary.name, y2: secondary?.name },
    traces,
    thresholds: thresholdsOf(config),
  };
};

/**
 * Composite line with each component's diffusion index underneath
 */
const composite: ChartBuilder = (data, config) => {
  if (data.kind !== 'composite') return simple('line')(data, config);
  const traces: ChartTrace[] = [
    {
      name: 'Composite',
      axis: 'y',
      style: 'line',
      color: config.chartColor,
      points: data.series.map((point) => ({ x: point.date, y: point.value })),
    },
    ...data.components.map(
      (component): ChartTrace => ({
        name: `${component.name} (${(component.weight * 100).toFixed(0)}%)`,
        axis: 'y',
        style: 'line',
        color: SECONDARY_COLOR,
        points: component.rows.map((row) => ({ x: row.date, y: row.diffusion })),
      }),
    ),
  ];
  return {
    ...base(config, 'composite'),
    axes: { x: 'Date', y: 'Diffusion index' },
    traces,
    thresholds: [{ value: DIFFUSION_NEUTRAL, label: 'Expansion / contraction', axis: 'y' }],
  };
};

/**
 * Growth on x, inflation on y, quadrant lines through the origin
 */
const regimeQuadrant: ChartBuilder = (data, config) => {
  if (data.kind !== 'regime') return simple('line')(data, config);
  const traces: ChartTrace[] = [
    {
      name: 'Trail',
      axis: 'y',
      style: 'markers',
      color: config.chartColor,
      points: data.trail.map((point) => ({ x: point.growth, y: point.inflation, label: point.date })),
    },
  ];
  if (data.current && data.projected) {
    traces.push({
      name: 'Projection',
      axis: 'y',
      style: 'line',
      color: PROJECTION_COLOR,
      points: [
        { x: data.current.growth, y: data.current.inflation, label: data.current.date },
        { x: data.projected.growth, y: data.projected.inflation, label: 'projected' },
      ],
    });
  }
  return {
    ...base(config, 'regime_quadrant'),
    axes: { x: 'Growth momentum (z)', y: 'Inflation momentum (z)' },
    traces,
    thresholds: [
      { value: 0, label: 'Growth neutral', axis: 'x' },
      { value: 0, label: 'Inflation neutral', axis: 'y' },
    ],
  };
};

const BUILDERS: Record<ChartKind, ChartBuilder> = {
  line: simple('line'),
  bar: simple('bar'),
  dual_axis: dualAxis,
  composite,
  regime_quadrant: regimeQuadrant,
};

export function buildChart(data: IndicatorData, config: IndicatorConfig): ChartSpec {
  return BUILDERS[config.chart](data, config);
}
