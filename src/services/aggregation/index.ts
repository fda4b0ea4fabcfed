export { DataAggregator, createDataAggregator, resolveDomain } from './data-aggregator.js';
export { formatSpendingAnalysis } from './spending-summary.js';
export type * from './types.js';
