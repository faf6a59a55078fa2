/**
 * Release calendar: estimated publication dates and the label shown on cards.
 * All arithmetic is on UTC calendar days.
 */
import type { ReleaseCadence } from '../shared/types.js';
import { toIsoDate } from './dates.js';

const DAY_MS = 86_400_000;

type MonthlyCadence = Extract<ReleaseCadence, { kind: 'monthly' | 'monthly_weekday' }>;

const startOfDay = (date: Date): Date =>
  new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));

const addDays = (date: Date, days: number): Date => new Date(date.getTime() + days * DAY_MS);

const isWeekend = (date: Date): boolean => date.getUTCDay() === 0 || date.getUTCDay() === 6;

function rollForward(date: Date): Date {
  let day = date;
  while (isWeekend(day)) day = addDays(day, 1);
  return day;
}

function rollBack(date: Date): Date {
  let day = date;
  while (isWeekend(day)) day = addDays(day, -1);
  return day;
}

/**
 * Release day within a calendar month; `month` may overflow into the next year
 */
function releaseInMonth(year: number, month: number, cadence: MonthlyCadence): Date {
  if (cadence.kind === 'monthly_weekday') {
    const first = new Date(Date.UTC(year, month, 1));
    return addDays(first, (cadence.weekday - first.getUTCDay() + 7) % 7);
  }
  const lastDay = new Date(Date.UTC(year, month + 1, 0));
  if (cadence.day === 'last_business_day') return rollBack(lastDay);
  return rollForward(new Date(Date.UTC(year, month, Math.min(cadence.day, lastDay.getUTCDate()))));
}

/**
 * Next expected release strictly after the day of `now`, from the cadence alone
 */
export function estimateNextRelease(cadence: ReleaseCadence, now: Date): string {
  const today = startOfDay(now);
  switch (cadence.kind) {
    case 'daily':
      return toIsoDate(rollForward(addDays(today, 1)));
    case 'weekly': {
      const ahead = (cadence.weekday - today.getUTCDay() + 7) % 7 || 7;
      return toIsoDate(addDays(today, ahead));
    }
    case 'monthly':
    case 'monthly_weekday': {
      const year = today.getUTCFullYear();
      const month = today.getUTCMonth();
      const thisMonth = releaseInMonth(year, month, cadence);
      return toIsoDate(
        thisMonth.getTime() > today.getTime() ? thisMonth : releaseInMonth(year, month + 1, cadence),
      );
    }
  }
}

/**
 * First published date on or after the day of `now`; `dates` are ISO days
 */
export function firstUpcoming(dates: readonly string[], now: Date): string | null {
  const today = toIsoDate(now);
  const upcoming = dates.filter((date) => date >= today).sort();
  return upcoming[0] ?? null;
}

export function formatReleaseLabel(date: string | null, now: Date): string {
  if (date === null) return 'Next release date not available';
  const release = new Date(`${date}T00:00:00Z`);
  const days = Math.round((release.getTime() - startOfDay(now).getTime()) / DAY_MS);
  if (!Number.isFinite(days) || days < 0) return 'Next release date not available';
  if (days === 0) return 'Next release: Today';
  if (days === 1) return 'Next release: Tomorrow';

  const formatted = release.toLocaleDateString('en-US', {
    month: 'long',
    day: '2-digit',
    year: 'numeric',
    timeZone: 'UTC',
  });
  return `Next release: ${formatted} (${days} days)`;
}
