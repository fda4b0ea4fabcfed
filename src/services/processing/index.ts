export {
  RequestProcessor,
  createRequestProcessor,
  calculationSummary,
  ruleBasedCalculationSummary,
  ruleBasedSynthesis,
  errorResult,
} from './request-processor.js';
export type { RequestProcessorDeps } from './request-processor.js';
export { toResponseText } from './response-text.js';
export { extractAdvice } from './advice.js';
export type * from './types.js';
