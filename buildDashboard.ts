import type { AllIndicatorsResult, CrossSignals, IndicatorOutcome } from './indicatorService.js';
import type { IndicatorRegistry } from './shared/indicatorRegistry.js';
import type { Issue, OutcomeError } from './shared/result.js';
import type { IndicatorConfig, NextRelease } from './shared/types.js';
import { buildChart, type ChartSpec } from './utils/charts.js';
import { formatReleaseLabel } from './utils/releases.js';
import { evaluateStatus, type StatusBadge } from './utils/signals.js';

interface CardHeader {
  key: string;
  title: string;
  emoji: string;
  description: string;
  fredLink: string | null;
  cached: boolean;
  nextRelease: ReleaseView | null;
}

export interface ReleaseView extends NextRelease {
  /** e.g. "Next release: July 12, 2024 (12 days)" */
  label: string;
}

export interface AvailableCard extends CardHeader {
  availability: 'available';
  degraded: boolean;
  badge: StatusBadge;
  chart: ChartSpec;
  /** pieces that could not be produced */
  issues: Issue[];
}

/**
 * Explicit "data unavailable" marker in place of a card
 */
export interface UnavailableCard extends CardHeader {
  availability: 'unavailable';
  error: OutcomeError;
}

export type DashboardCard = AvailableCard | UnavailableCard;

export interface DashboardSnapshot {
  generatedAt: string;
  cards: DashboardCard[];
  alerts: CrossSignals;
  errors: string[];
  summary: {
    available: number;
    degraded: number;
    unavailable: number;
  };
}

export function buildCard(
  indicator: IndicatorConfig,
  outcome: IndicatorOutcome | undefined,
  release?: NextRelease,
  now: Date = new Date(),
): DashboardCard {
  const header: CardHeader = {
    key: indicator.key,
    title: indicator.displayName,
    emoji: indicator.emoji,
    description: indicator.description,
    fredLink: indicator.fredLink,
    cached: outcome?.cached ?? false,
    nextRelease: release ? { ...release, label: formatReleaseLabel(release.date, now) } : null,
  };

  if (!outcome) {
    return { ...header, availability: 'unavailable', error: { kind: 'Internal', message: 'Indicator was not computed' } };
  }
  if (outcome.status === 'failed') {
    return { ...header, availability: 'unavailable', error: outcome.error };
  }

  return {
    ...header,
    availability: 'available',
    degraded: outcome.status === 'degraded',
    badge: evaluateStatus(outcome.data, indicator),
    chart: buildChart(outcome.data, indicator),
    issues: outcome.status === 'degraded' ? outcome.issues : [],
  };
}

/**
 * One card per registered indicator, in registry order
 */
export function buildDashboard(
  result: AllIndicatorsResult,
  registry: IndicatorRegistry,
  now: Date = new Date(),
): DashboardSnapshot {
  const cards = registry
    .list()
    .map((indicator) => buildCard(indicator, result.indicators[indicator.key], result.releases[indicator.key], now));
  const available = cards.filter((card): card is AvailableCard => card.availability === 'available');

  return {
    generatedAt: now.toISOString(),
    cards,
    alerts: result.signals,
    errors: result.errors,
    summary: {
      available: available.length,
      degraded: available.filter((card) => card.degraded).length,
      unavailable: cards.length - available.length,
    },
  };
}
