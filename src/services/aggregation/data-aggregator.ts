/**
 * Data aggregator
 *
 * Numeric aggregations over personal records: sums, averages, counts,
 * category breakdowns, daily averages and time-bucketed trends.
 */

import { createComponentLogger } from '../../utils/logger.js';
import {
  isDomainName,
  type DateBounds,
  type DomainDataAccess,
  type DomainName,
  type DomainRecord,
  type FilterValue,
  type TimeRange,
} from '../../core/types.js';
import { effectiveEnd, isWithinRange, startOfUtcDay, startOfUtcWeek, toIsoDate } from '../query/time-range.js';
import {
  eventFieldsSchema,
  financeFieldsSchema,
  healthFieldsSchema,
  mealFieldsSchema,
  parseRecords,
  type FinanceFields,
  type TypedRecord,
} from './record-fields.js';
import type {
  AggregationFilters,
  AggregationResult,
  DailyAverages,
  DataPoint,
  SpendingAnalysis,
  TrendInterval,
  TrendMetric,
  TrendPoint,
} from './types.js';

const logger = createComponentLogger('aggregator');

const DAY_MS = 24 * 60 * 60 * 1000;

/** Keys that steer the aggregation instead of filtering record fields */
const CONTROL_KEYS = new Set(['include_meals', 'domains']);

/** Finance keys that exclude records lacking the field */
const STRICT_FINANCE_KEYS = new Set(['type', 'category']);

const DOMAIN_ALIASES: Readonly<Record<string, DomainName>> = {
  finance: 'finance_records',
  health: 'health_metrics',
};

export function resolveDomain(name: string): DomainName | undefined {
  if (isDomainName(name)) return name;
  return DOMAIN_ALIASES[name];
}

function transactionLabel(type: string): string {
  switch (type) {
    case 'expense':
      return '支出';
    case 'income':
      return '收入';
    default:
      return type;
  }
}

function describeFinance(fields: FinanceFields): string {
  return `${transactionLabel(fields.type)}: ${fields.notes ?? 'Unnamed'} - ${fields.currency ?? '¥'}${fields.amount.toFixed(2)}`;
}

function formatRange(range: TimeRange | undefined): string | undefined {
  if (!range?.start || !range.end) return undefined;
  return `${toIsoDate(range.start)} to ${toIsoDate(range.end)}`;
}

function matchesValue(actual: unknown, expected: FilterValue): boolean {
  if (typeof expected === 'string') return actual === expected;
  return typeof actual === 'string' && expected.includes(actual);
}

/**
 * Equality or membership filters over record data. Keys the record lacks are
 * ignored unless listed in strictKeys.
 */
function matchesFilters(
  data: Record<string, unknown>,
  filters: AggregationFilters,
  strictKeys: ReadonlySet<string> = new Set()
): boolean {
  for (const [key, expected] of Object.entries(filters)) {
    if (CONTROL_KEYS.has(key) || typeof expected === 'boolean') continue;
    const actual = data[key];
    if (actual === undefined || actual === null) {
      if (strictKeys.has(key)) return false;
      continue;
    }
    if (!matchesValue(actual, expected)) return false;
  }
  return true;
}

function domainList(value: FilterValue | boolean | undefined): readonly string[] {
  if (typeof value === 'string') return [value];
  if (value === undefined || typeof value === 'boolean') return ['finance_records'];
  return value;
}

function filterKeys(filters: AggregationFilters): string[] {
  return Object.keys(filters);
}

/**
 * Days covered by a range: inclusive of an explicit end, exclusive of a period's computed end.
 */
function spanDays(range: TimeRange | undefined): number | undefined {
  if (!range?.start) return undefined;
  if (range.end) {
    return Math.floor((range.end.getTime() - range.start.getTime()) / DAY_MS) + 1;
  }
  const end = effectiveEnd(range);
  if (!end) return undefined;
  return Math.max(1, Math.round((end.getTime() - range.start.getTime()) / DAY_MS));
}

function bucketKey(date: Date, interval: TrendInterval): string {
  switch (interval) {
    case 'daily':
      return toIsoDate(startOfUtcDay(date));
    case 'weekly':
      return toIsoDate(startOfUtcWeek(date));
    case 'monthly':
      return toIsoDate(date).slice(0, 7);
  }
}

export class DataAggregator {
  constructor(private readonly dataAccess: DomainDataAccess) {}

  /**
   * Records of a domain inside the time range
   */
  private async loadRecords(domain: DomainName, timeRange?: TimeRange): Promise<DomainRecord[]> {
    const bounds: DateBounds = timeRange ? { start: timeRange.start, end: effectiveEnd(timeRange) } : {};
    const records = await this.dataAccess.getRecords(domain, bounds);
    return records.filter((record) => isWithinRange(timeRange, record.timestamp));
  }

  private async loadFinance(
    filters: AggregationFilters,
    timeRange: TimeRange | undefined
  ): Promise<TypedRecord<FinanceFields>[]> {
    const parsed = parseRecords(await this.loadRecords('finance_records', timeRange), financeFieldsSchema);
    // Filters see parsed fields, schema defaults included
    return parsed.filter(({ record, fields }) =>
      matchesFilters({ ...record.data, ...fields }, filters, STRICT_FINANCE_KEYS)
    );
  }

  private async loadDomain(
    domain: DomainName,
    filters: AggregationFilters,
    timeRange: TimeRange | undefined
  ): Promise<DomainRecord[]> {
    if (domain === 'finance_records') {
      return (await this.loadFinance(filters, timeRange)).map(({ record }) => record);
    }
    const records = await this.loadRecords(domain, timeRange);
    return records.filter((record) => matchesFilters(record.data, filters));
  }

  private async mealCaloriePoints(filters: AggregationFilters, timeRange: TimeRange | undefined): Promise<DataPoint[]> {
    const records = (await this.loadRecords('meals', timeRange)).filter((record) =>
      matchesFilters(record.data, filters)
    );
    const points: DataPoint[] = [];
    for (const { record, fields } of parseRecords(records, mealFieldsSchema)) {
      if (fields.calories === undefined) continue;
      points.push({
        id: record.id,
        value: fields.calories,
        description: `Meal: ${fields.name} - ${fields.calories} calories`,
        timestamp: record.timestamp,
        category: 'nutrition',
        metadata: { type: 'calories', location: fields.location },
      });
    }
    return points;
  }

  /**
   * Sum of expense amounts (income with `type: 'income'`), plus meal calories
   * when `include_meals` is set.
   */
  async calculateSum(filters: AggregationFilters = {}, timeRange?: TimeRange): Promise<AggregationResult> {
    const financeFilters: AggregationFilters = { ...filters, type: filters.type ?? 'expense' };
    const dataPoints: DataPoint[] = (await this.loadFinance(financeFilters, timeRange)).map(({ record, fields }) => ({
      id: record.id,
      value: fields.amount,
      description: describeFinance(fields),
      timestamp: record.timestamp,
      category: fields.category,
      metadata: { type: fields.type, currency: fields.currency, category: fields.category },
    }));

    if (filters.include_meals === true) {
      dataPoints.push(...(await this.mealCaloriePoints(filters, timeRange)));
    }

    const value = dataPoints.reduce((sum, point) => sum + point.value, 0);
    logger.debug({ value, points: dataPoints.length }, 'Calculated sum');

    return {
      value,
      dataPoints,
      metadata: {
        aggregationType: 'sum',
        recordCount: dataPoints.length,
        timeRange: formatRange(timeRange),
        filtersApplied: filterKeys(filters),
      },
    };
  }

  async calculateAverage(filters: AggregationFilters = {}, timeRange?: TimeRange): Promise<AggregationResult> {
    const sum = await this.calculateSum(filters, timeRange);

    if (sum.dataPoints.length === 0) {
      return {
        value: 0,
        dataPoints: [],
        metadata: { aggregationType: 'average', recordCount: 0, filtersApplied: filterKeys(filters) },
      };
    }

    return {
      value: sum.value / sum.dataPoints.length,
      dataPoints: sum.dataPoints,
      metadata: {
        aggregationType: 'average',
        recordCount: sum.dataPoints.length,
        total: sum.value,
        timeRange: formatRange(timeRange),
        filtersApplied: filterKeys(filters),
      },
    };
  }

  /**
   * Record count over `filters.domains` (finance by default); each record contributes 1.
   */
  async calculateCount(filters: AggregationFilters = {}, timeRange?: TimeRange): Promise<AggregationResult> {
    const domains: DomainName[] = [];
    for (const name of domainList(filters.domains)) {
      const domain = resolveDomain(name);
      if (domain) {
        domains.push(domain);
      } else {
        logger.debug({ domain: name }, 'Ignoring unknown domain in count');
      }
    }

    const dataPoints: DataPoint[] = [];
    for (const domain of domains) {
      const records = await this.loadDomain(domain, filters, timeRange);
      dataPoints.push(...this.countPoints(domain, records));
    }

    return {
      value: dataPoints.length,
      dataPoints,
      metadata: {
        aggregationType: 'count',
        recordCount: dataPoints.length,
        domains,
        timeRange: formatRange(timeRange),
        filtersApplied: filterKeys(filters),
      },
    };
  }

  private countPoints(domain: DomainName, records: DomainRecord[]): DataPoint[] {
    const point = (record: DomainRecord, description: string, category?: string): DataPoint => ({
      id: record.id,
      value: 1,
      description,
      timestamp: record.timestamp,
      category,
    });

    switch (domain) {
      case 'finance_records':
        return parseRecords(records, financeFieldsSchema).map(({ record, fields }) =>
          point(record, describeFinance(fields), fields.category)
        );
      case 'meals':
        return parseRecords(records, mealFieldsSchema).map(({ record, fields }) =>
          point(record, `Meal: ${fields.name}`, 'nutrition')
        );
      case 'events':
        return parseRecords(records, eventFieldsSchema).map(({ record, fields }) =>
          point(record, `Event: ${fields.title}`, 'schedule')
        );
      case 'journals':
        return records.map((record) => point(record, 'Journal entry', 'thoughts'));
      case 'health_metrics':
        return parseRecords(records, healthFieldsSchema).map(({ record, fields }) =>
          point(record, `Health: ${fields.metric_type} - ${fields.value} ${fields.unit}`, 'health')
        );
      default:
        return records.map((record) => point(record, `${domain} entry`));
    }
  }

  /**
   * Expense totals per category; records without one count as `other`.
   */
  async calculateSpendingByCategory(timeRange?: TimeRange): Promise<Record<string, number>> {
    const totals: Record<string, number> = {};
    for (const { fields } of await this.loadFinance({ type: 'expense' }, timeRange)) {
      const category = fields.category ?? 'other';
      totals[category] = (totals[category] ?? 0) + fields.amount;
    }
    return totals;
  }

  /**
   * `daily_spending` over the range's day span, `daily_calories` over the distinct days with meals.
   */
  async calculateDailyAverages(timeRange?: TimeRange): Promise<DailyAverages> {
    const averages: DailyAverages = {};

    const spending = await this.calculateSum({ type: 'expense' }, timeRange);
    const days = spanDays(timeRange);
    if (days !== undefined && days > 0 && spending.value > 0) {
      averages.daily_spending = spending.value / days;
    }

    const mealPoints = await this.mealCaloriePoints({}, timeRange);
    if (mealPoints.length > 0) {
      const mealDays = new Set(mealPoints.map((point) => toIsoDate(point.timestamp))).size;
      const calories = mealPoints.reduce((sum, point) => sum + point.value, 0);
      averages.daily_calories = calories / mealDays;
    }

    return averages;
  }

  async calculateTrends(metric: TrendMetric, interval: TrendInterval, timeRange?: TimeRange): Promise<TrendPoint[]> {
    const entries: Array<{ timestamp: Date; value: number }> =
      metric === 'spending'
        ? (await this.loadFinance({ type: 'expense' }, timeRange)).map(({ record, fields }) => ({
            timestamp: record.timestamp,
            value: fields.amount,
          }))
        : (await this.loadRecords('meals', timeRange)).map((record) => ({ timestamp: record.timestamp, value: 1 }));

    const buckets = new Map<string, TrendPoint>();
    for (const entry of entries) {
      const period = bucketKey(entry.timestamp, interval);
      const bucket = buckets.get(period) ?? { period, value: 0, count: 0 };
      bucket.value += entry.value;
      bucket.count += 1;
      buckets.set(period, bucket);
    }

    return [...buckets.values()].sort((a, b) => a.period.localeCompare(b.period));
  }

  async analyzeSpending(timeRange?: TimeRange): Promise<SpendingAnalysis> {
    const total = await this.calculateSum({ type: 'expense' }, timeRange);
    const average = await this.calculateAverage({ type: 'expense' }, timeRange);
    const categoryBreakdown = await this.calculateSpendingByCategory(timeRange);
    const dailyAverages = await this.calculateDailyAverages(timeRange);

    return {
      totalSpent: total.value,
      averagePerTransaction: average.value,
      dailyAverage: dailyAverages.daily_spending ?? 0,
      categoryBreakdown,
      transactionCount: total.dataPoints.length,
      timeRange,
    };
  }
}

export function createDataAggregator(dataAccess: DomainDataAccess): DataAggregator {
  return new DataAggregator(dataAccess);
}
