/**
 * Aggregation types
 */

import type { FilterValue, TimeRange } from '../../core/types.js';

export interface DataPoint {
  id: string;
  value: number;
  description: string;
  timestamp: Date;
  category?: string;
  metadata?: Record<string, unknown>;
}

export type AggregationKind = 'sum' | 'average' | 'count';

export interface AggregationMetadata {
  aggregationType: AggregationKind;
  recordCount: number;
  /** "yyyy-mm-dd to yyyy-mm-dd" when the range has an explicit start and end */
  timeRange?: string;
  filtersApplied: string[];
  domains?: string[];
  total?: number;
}

export interface AggregationResult {
  value: number;
  dataPoints: DataPoint[];
  metadata: AggregationMetadata;
}

/**
 * Query filters plus aggregation switches:
 * `type` (expense | income), `category`, `include_meals`, `domains`.
 */
export type AggregationFilters = Readonly<Record<string, FilterValue | boolean>>;

export type TrendMetric = 'spending' | 'meals';
export type TrendInterval = 'daily' | 'weekly' | 'monthly';

export interface TrendPoint {
  /** Bucket key: yyyy-mm-dd (daily, weekly from Monday) or yyyy-mm (monthly) */
  period: string;
  value: number;
  count: number;
}

export interface DailyAverages {
  daily_spending?: number;
  daily_calories?: number;
}

export interface SpendingAnalysis {
  totalSpent: number;
  averagePerTransaction: number;
  dailyAverage: number;
  categoryBreakdown: Record<string, number>;
  transactionCount: number;
  timeRange?: TimeRange;
}
