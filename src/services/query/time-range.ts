/**
 * Time range helpers.
 *
 * All calendar math is done in UTC so results do not depend on the host timezone.
 */

import type { TimePeriod, TimeRange } from '../../core/types.js';

const DAY_MS = 24 * 60 * 60 * 1000;

function utcDay(year: number, month: number, day: number): Date {
  return new Date(Date.UTC(year, month, day));
}

export function startOfUtcDay(date: Date): Date {
  return utcDay(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate());
}

export function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * DAY_MS);
}

/** Monday = 0 ... Sunday = 6 */
function daysSinceMonday(date: Date): number {
  return (date.getUTCDay() + 6) % 7;
}

export function startOfUtcWeek(date: Date): Date {
  return addDays(startOfUtcDay(date), -daysSinceMonday(date));
}

export function toIsoDate(date: Date): string {
  return date.toISOString().split('T')[0] ?? '';
}

/**
 * Build an open-ended range for a named period; the end comes from effectiveEnd().
 */
export function timeRangeForPeriod(period: TimePeriod, now: Date): TimeRange {
  const year = now.getUTCFullYear();
  const month = now.getUTCMonth();
  let start: Date;

  switch (period) {
    case 'today':
      start = startOfUtcDay(now);
      break;
    case 'thisWeek':
      start = startOfUtcWeek(now);
      break;
    case 'lastWeek':
      start = addDays(startOfUtcWeek(now), -7);
      break;
    case 'thisMonth':
      start = utcDay(year, month, 1);
      break;
    case 'lastMonth':
      start = utcDay(year, month - 1, 1);
      break;
    case 'thisYear':
      start = utcDay(year, 0, 1);
      break;
    case 'lastYear':
      start = utcDay(year - 1, 0, 1);
      break;
  }

  return { start, period };
}

/**
 * Explicit end, or the exclusive end of a period range.
 */
export function effectiveEnd(range: TimeRange): Date | undefined {
  if (range.end) return range.end;
  if (!range.period || !range.start) return undefined;

  const start = range.start;
  switch (range.period) {
    case 'today':
      return addDays(start, 1);
    case 'thisWeek':
    case 'lastWeek':
      return addDays(start, 7);
    case 'thisMonth':
    case 'lastMonth':
      return utcDay(start.getUTCFullYear(), start.getUTCMonth() + 1, 1);
    case 'thisYear':
    case 'lastYear':
      return utcDay(start.getUTCFullYear() + 1, 0, 1);
  }
}

/**
 * Whether a timestamp falls in the range. A period's computed end is exclusive;
 * an explicit end is inclusive.
 */
export function isWithinRange(range: TimeRange | undefined, timestamp: Date): boolean {
  if (!range) return true;
  const time = timestamp.getTime();
  if (range.start && time < range.start.getTime()) return false;
  if (range.end) return time <= range.end.getTime();
  const end = effectiveEnd(range);
  return end === undefined || time < end.getTime();
}

const PERIOD_LABELS: Record<TimePeriod, string> = {
  today: 'today',
  thisWeek: 'this week',
  lastWeek: 'last week',
  thisMonth: 'this month',
  lastMonth: 'last month',
  thisYear: 'this year',
  lastYear: 'last year',
};

export function describeTimeRange(range: TimeRange | undefined): string {
  if (!range) return 'all time';
  if (range.period) return PERIOD_LABELS[range.period];
  if (range.start && range.end) {
    return `from ${toIsoDate(range.start)} to ${toIsoDate(range.end)}`;
  }
  if (range.start) return `since ${toIsoDate(range.start)}`;
  return 'all time';
}
