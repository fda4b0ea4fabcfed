/**
 * Default query planner
 *
 * Derives a QueryContext from raw text with keyword lists: target domains,
 * time range, coarse intent, search keywords and record filters.
 */

import {
  DOMAIN_NAMES,
  type DomainName,
  type FilterValue,
  type QueryContext,
  type QueryIntent,
  type QueryPlanner,
  type TimePeriod,
  type TimeRange,
} from '../../core/types.js';
import { addDays, timeRangeForPeriod } from './time-range.js';
import { extractKeywords } from '../../utils/text.js';

const DOMAIN_KEYWORDS: Record<DomainName, readonly string[]> = {
  events: ['event', 'happened', 'occurred', 'celebration', 'meeting'],
  education: ['school', 'university', 'degree', 'course', 'study', 'learn', 'education'],
  career: ['work', 'job', 'career', 'company', 'project', 'achievement'],
  meals: ['eat', 'food', 'meal', 'breakfast', 'lunch', 'dinner', 'restaurant', 'cooking'],
  journals: ['journal', 'diary', 'thought', 'reflection', 'mood', 'feeling'],
  health_metrics: ['health', 'weight', 'exercise', 'sleep', 'fitness', 'wellness'],
  finance_records: ['money', 'spend', 'cost', 'expense', 'income', 'budget', 'financial'],
  tasks_habits: ['task', 'habit', 'routine', 'goal', 'todo', 'productivity'],
  relations: ['friend', 'family', 'relationship', 'social', 'people', 'contact'],
  media_logs: ['read', 'watch', 'movie', 'book', 'music', 'podcast', 'media'],
  travel_logs: ['travel', 'trip', 'vacation', 'visit', 'journey', 'destination'],
};

// Checked in order; the first list with a hit wins
const INTENT_KEYWORDS: ReadonlyArray<readonly [QueryIntent, readonly string[]]> = [
  [
    'advice',
    ['how should', 'what should', 'recommend', 'suggest', 'advice', 'help me', 'plan', 'improve', 'optimize', 'better', 'strategy'],
  ],
  [
    'analysis',
    ['analyze', 'pattern', 'trend', 'correlation', 'relationship', 'compare', 'difference', 'change', 'over time', 'statistics'],
  ],
  [
    'comparison',
    ['vs', 'versus', 'compared to', 'difference between', 'better than', 'worse than', 'more than', 'less than'],
  ],
  ['summary', ['summarize', 'summary', 'overview', 'total', 'average', 'most', 'least', 'top', 'bottom']],
];

/** Finance categories that count as food spending */
export const FOOD_CATEGORIES = ['food', 'groceries', 'takeout', 'dining', 'restaurant', 'snacks'] as const;

const NAMED_PERIODS: ReadonlyArray<readonly [string, TimePeriod]> = [
  ['today', 'today'],
  ['this week', 'thisWeek'],
  ['last week', 'lastWeek'],
  ['this month', 'thisMonth'],
  ['last month', 'lastMonth'],
  ['this year', 'thisYear'],
  ['last year', 'lastYear'],
];

export interface QueryPlannerOptions {
  now?: () => Date;
}

export class DefaultQueryPlanner implements QueryPlanner {
  private readonly now: () => Date;

  constructor(options: QueryPlannerOptions = {}) {
    this.now = options.now ?? (() => new Date());
  }

  plan(query: string): QueryContext {
    return {
      originalQuery: query,
      intent: this.identifyIntent(query),
      targetDomains: this.identifyTargetDomains(query),
      timeRange: this.extractTimeRange(query),
      keywords: this.extractKeywords(query),
      filters: this.extractFilters(query),
    };
  }

  identifyTargetDomains(query: string): DomainName[] {
    const lower = query.toLowerCase();
    const domains = DOMAIN_NAMES.filter((domain) =>
      DOMAIN_KEYWORDS[domain].some((keyword) => lower.includes(keyword))
    );
    return domains.length > 0 ? domains : [...DOMAIN_NAMES];
  }

  extractTimeRange(query: string): TimeRange | undefined {
    const lower = query.toLowerCase();
    const now = this.now();

    for (const [phrase, period] of NAMED_PERIODS) {
      if (lower.includes(phrase)) return timeRangeForPeriod(period, now);
    }

    // Years 1900-2099 only
    const yearMatch = /\b((?:19|20)\d{2})\b/.exec(lower);
    if (yearMatch?.[1]) {
      const year = parseInt(yearMatch[1], 10);
      return {
        start: new Date(Date.UTC(year, 0, 1)),
        end: new Date(Date.UTC(year + 1, 0, 1) - 1),
      };
    }

    if (lower.includes('recent') || lower.includes('lately')) {
      return timeRangeForPeriod('thisMonth', now);
    }

    const daysMatch = /(?:past|last) (\d+) days?/.exec(lower);
    if (daysMatch?.[1]) {
      return { start: addDays(now, -parseInt(daysMatch[1], 10)), end: now };
    }

    const weeksMatch = /(?:past|last) (\d+) weeks?/.exec(lower);
    if (weeksMatch?.[1]) {
      return { start: addDays(now, -parseInt(weeksMatch[1], 10) * 7), end: now };
    }

    return undefined;
  }

  identifyIntent(query: string): QueryIntent {
    const lower = query.toLowerCase();
    for (const [intent, keywords] of INTENT_KEYWORDS) {
      if (keywords.some((keyword) => lower.includes(keyword))) return intent;
    }
    return 'search';
  }

  extractKeywords(query: string): string[] {
    return extractKeywords(query);
  }

  extractFilters(query: string): Record<string, FilterValue> {
    const lower = query.toLowerCase();
    const filters: Record<string, FilterValue> = {};

    for (const mealType of ['breakfast', 'lunch', 'dinner']) {
      if (lower.includes(mealType)) filters.meal_type = mealType;
    }

    if (lower.includes('food') || lower.includes('食物')) {
      filters.category = FOOD_CATEGORIES;
    }
    if (lower.includes('外卖') || lower.includes('takeout') || lower.includes('delivery')) {
      filters.category = 'takeout';
    }

    if (lower.includes('weight')) filters.metric_type = 'weight';
    if (lower.includes('sleep')) filters.metric_type = 'sleep';

    return filters;
  }
}

export function createQueryPlanner(options: QueryPlannerOptions = {}): DefaultQueryPlanner {
  return new DefaultQueryPlanner(options);
}
