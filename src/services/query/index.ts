export { DefaultQueryPlanner, createQueryPlanner, FOOD_CATEGORIES } from './query-planner.js';
export type { QueryPlannerOptions } from './query-planner.js';
export {
  timeRangeForPeriod,
  effectiveEnd,
  isWithinRange,
  describeTimeRange,
  startOfUtcDay,
  startOfUtcWeek,
  addDays,
  toIsoDate,
} from './time-range.js';
