/**
 * Intent classification
 *
 * Three stages: weighted keyword rules, prototype similarity, and an LLM
 * verdict for queries the first two leave undecided.
 */

export { IntentClassifier, createIntentClassifier } from './intent-classifier.js';
export type { StageResults, IntentClassifierOptions } from './intent-classifier.js';
export { RuleClassifier } from './rule-classifier.js';
export { SemanticClassifier, semanticThreshold, type SemanticThresholdOptions } from './semantic-classifier.js';
export { LlmClassifier, heuristicClassification, parseLlmVerdict } from './llm-classifier.js';
export { loadClassificationResources, getResourcesDir } from './resources.js';
export { INTENT_TYPES } from './types.js';
export type * from './types.js';
