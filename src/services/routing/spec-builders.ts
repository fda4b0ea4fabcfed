/**
 * Builds executable calculation and retrieval specs from a query and its context.
 */

import type { QueryContext } from '../../core/types.js';
import type {
  AggregationType,
  CalculationOperation,
  CalculationSpecs,
  ContextNeeds,
  GenerationType,
  GroupBy,
  RetrievalSpecs,
} from './types.js';

const SUM_TRIGGERS = ['total', 'sum', 'how much', 'spend', 'spent', 'cost', 'expense', 'paid'];
const AVERAGE_TRIGGERS = ['average', 'mean'];
const COUNT_TRIGGERS = ['count', 'number'];
const TREND_TRIGGERS = ['trend', 'pattern'];
const GROUPING_TRIGGERS = ['group', 'categorize'];

const GROUP_BY_PHRASES: ReadonlyArray<readonly [string, GroupBy]> = [
  ['by category', 'category'],
  ['by day', 'day'],
  ['by month', 'month'],
];

const EXPLANATORY_PATTERNS = [
  'why am i',
  'why do i',
  'why is',
  'how am i',
  'how do i',
  'what is causing',
  'what makes',
  'explain why',
  'tell me why',
];

export const CONTEXT_LIMITS: Record<ContextNeeds, number> = {
  minimal: 3,
  moderate: 5,
  extensive: 10,
  historical: 15,
  comparative: 8,
};

function containsAny(text: string, triggers: readonly string[]): boolean {
  return triggers.some((trigger) => text.includes(trigger));
}

export function buildCalculationSpecs(query: string, context: QueryContext): CalculationSpecs {
  const lower = query.toLowerCase();
  const operations: CalculationOperation[] = [];
  const aggregations: AggregationType[] = [];

  if (containsAny(lower, SUM_TRIGGERS)) {
    operations.push('sum');
    aggregations.push('sum');
  }
  if (containsAny(lower, AVERAGE_TRIGGERS)) {
    operations.push('average');
    aggregations.push('average');
  }
  if (containsAny(lower, COUNT_TRIGGERS)) {
    operations.push('count');
    aggregations.push('count');
  }
  if (containsAny(lower, TREND_TRIGGERS)) {
    operations.push('trend');
    aggregations.push('timeSeriesAverage');
  }
  if (containsAny(lower, GROUPING_TRIGGERS)) {
    operations.push('grouping');
  }

  if (operations.length === 0) {
    operations.push('sum');
    aggregations.push('sum');
  }

  const groupBy = GROUP_BY_PHRASES.filter(([phrase]) => lower.includes(phrase)).map(([, key]) => key);

  return {
    operations,
    aggregations,
    filters: context.filters,
    timeRange: context.timeRange,
    groupBy: groupBy.length > 0 ? groupBy : undefined,
  };
}

export function isExplanatoryQuery(query: string): boolean {
  return containsAny(query.toLowerCase(), EXPLANATORY_PATTERNS);
}

export function buildRetrievalSpecs(query: string, context: QueryContext): RetrievalSpecs {
  const isAdvice = context.intent === 'advice';

  let generationType: GenerationType = 'factual';
  if (isAdvice) {
    generationType = 'advisory';
  } else if (isExplanatoryQuery(query)) {
    generationType = 'narrative';
  }

  return {
    searchTerms: [...context.keywords],
    contextNeeds: isAdvice ? 'extensive' : 'moderate',
    generationType,
    domainFocus: [...context.targetDomains],
  };
}
