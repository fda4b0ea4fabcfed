/**
 * Shared value formatting for processing output
 */

import { toIsoDate } from '../query/time-range.js';
import type { DataPoint } from '../aggregation/types.js';

/** Integers as-is, other numbers with two decimals */
export function formatValue(value: number | string): string {
  if (typeof value === 'string') return value;
  return Number.isInteger(value) ? String(value) : value.toFixed(2);
}

export function formatDateRange(dataPoints: readonly DataPoint[]): string {
  if (dataPoints.length === 0) return 'No data';

  const times = dataPoints.map((point) => point.timestamp.getTime()).sort((a, b) => a - b);
  const start = toIsoDate(new Date(times[0] ?? 0));
  const end = toIsoDate(new Date(times[times.length - 1] ?? 0));
  return start === end ? start : `${start} to ${end}`;
}

export function bulletList(entries: Readonly<Record<string, number | string>>, bold = false): string[] {
  return Object.entries(entries).map(([key, value]) =>
    bold ? `• **${key}**: ${formatValue(value)}` : `• ${key}: ${formatValue(value)}`
  );
}
