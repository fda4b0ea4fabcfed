import { describe, it, expect } from 'vitest';
import { DefaultQueryPlanner, FOOD_CATEGORIES } from '../../src/services/query/index.js';
import { DOMAIN_NAMES } from '../../src/core/types.js';
import { fixedClock } from '../fixtures/records.js';

const planner = new DefaultQueryPlanner({ now: fixedClock });

describe('DefaultQueryPlanner', () => {
  it('plans a food spending question', () => {
    const context = planner.plan('How much did I spend on food this month?');

    expect(context.intent).toBe('search');
    expect(context.targetDomains).toEqual(['meals', 'finance_records']);
    expect(context.keywords).toEqual(['much', 'spend', 'food', 'month']);
    expect(context.filters).toEqual({ category: FOOD_CATEGORIES });
    expect(context.timeRange?.period).toBe('thisMonth');
    expect(context.timeRange?.start?.toISOString()).toBe('2026-03-01T00:00:00.000Z');
  });

  it('targets every domain when nothing matches', () => {
    expect(planner.plan('Why am I always tired?').targetDomains).toEqual([...DOMAIN_NAMES]);
  });

  it('detects intent in priority order', () => {
    expect(planner.identifyIntent('How should I improve my sleep?')).toBe('advice');
    expect(planner.identifyIntent('Any pattern in my mood?')).toBe('analysis');
    expect(planner.identifyIntent('Coffee vs tea')).toBe('comparison');
    expect(planner.identifyIntent('Give me an overview')).toBe('summary');
    expect(planner.identifyIntent('Where did I go?')).toBe('search');
  });

  describe('time ranges', () => {
    it('reads named periods', () => {
      const range = planner.extractTimeRange('What did I eat for breakfast last week?');
      expect(range?.period).toBe('lastWeek');
      expect(range?.start?.toISOString()).toBe('2026-03-09T00:00:00.000Z');
    });

    it('reads a year', () => {
      const range = planner.extractTimeRange('Trips in 2025');
      expect(range?.start?.toISOString()).toBe('2025-01-01T00:00:00.000Z');
      expect(range?.end?.toISOString()).toBe('2025-12-31T23:59:59.999Z');
    });

    it('does not read an amount as a year', () => {
      expect(planner.extractTimeRange('Did I spend over 1500 on rent?')).toBeUndefined();
      expect(planner.extractTimeRange('Paid 12000 for the car')).toBeUndefined();
      expect(planner.extractTimeRange('Anything from 1999?')?.start?.toISOString()).toBe('1999-01-01T00:00:00.000Z');
    });

    it('reads a count of days back from now', () => {
      const range = planner.extractTimeRange('Sleep over the past 10 days');
      expect(range?.start?.toISOString()).toBe('2026-03-08T12:00:00.000Z');
      expect(range?.end?.toISOString()).toBe('2026-03-18T12:00:00.000Z');
    });

    it('reads a count of weeks', () => {
      const range = planner.extractTimeRange('workouts in the last 2 weeks');
      expect(range?.start?.toISOString()).toBe('2026-03-04T12:00:00.000Z');
    });

    it('treats recent as this month', () => {
      expect(planner.extractTimeRange('anything recent?')?.period).toBe('thisMonth');
    });

    it('leaves the range open otherwise', () => {
      expect(planner.extractTimeRange('Why am I always tired?')).toBeUndefined();
    });
  });

  describe('filters', () => {
    it('sets meal type', () => {
      expect(planner.extractFilters('What did I eat for breakfast?')).toEqual({ meal_type: 'breakfast' });
    });

    it('prefers takeout over the food category list', () => {
      expect(planner.extractFilters('food delivery costs')).toEqual({ category: 'takeout' });
      expect(planner.extractFilters('我的外卖')).toEqual({ category: 'takeout' });
    });

    it('sets the health metric', () => {
      expect(planner.extractFilters('How is my sleep?')).toEqual({ metric_type: 'sleep' });
    });
  });
});
