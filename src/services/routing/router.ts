/**
 * Request router
 *
 * Plans the query, classifies it through the staged classifier, fuses the
 * stage scores and emits the specs for the chosen processing path.
 */

import { config } from '../../config/index.js';
import type { QueryPlanner } from '../../core/types.js';
import { createComponentLogger } from '../../utils/logger.js';
import type { IntentClassifier } from '../classification/intent-classifier.js';
import { makeDecision, processingPathFor } from './fusion.js';
import { buildCalculationSpecs, buildRetrievalSpecs } from './spec-builders.js';
import type { FusionWeights, Routing } from './types.js';

const logger = createComponentLogger('router');

export function fusionWeightsFromConfig(): FusionWeights {
  const c = config.classification;
  return {
    rule: c.ruleWeight,
    semantic: c.semanticWeight,
    llm: c.llmWeight,
    penalty: c.penaltyWeight,
    hybridThreshold: c.hybridThreshold,
  };
}

export class RequestRouter {
  constructor(
    private readonly planner: QueryPlanner,
    private readonly classifier: IntentClassifier,
    private readonly weights: FusionWeights = fusionWeightsFromConfig()
  ) {}

  async route(query: string): Promise<Routing> {
    const context = this.planner.plan(query);
    const stages = await this.classifier.classify(query, context);
    const decision = makeDecision(stages, context, this.weights);
    const path = processingPathFor(decision);

    logger.debug(
      {
        path,
        intent: decision.primaryIntent,
        confidence: decision.confidence,
        fused: decision.fusedScores,
      },
      'Routed query'
    );

    const base = { query, context, confidence: decision.confidence, decision };
    switch (path) {
      case 'calculation':
        return {
          ...base,
          processingPath: 'calculation',
          calculationSpecs: buildCalculationSpecs(query, context),
        };
      case 'retrieval':
        return {
          ...base,
          processingPath: 'retrieval',
          retrievalSpecs: buildRetrievalSpecs(query, context),
        };
      case 'hybrid':
        return {
          ...base,
          processingPath: 'hybrid',
          calculationSpecs: buildCalculationSpecs(query, context),
          retrievalSpecs: buildRetrievalSpecs(query, context),
        };
    }
  }
}

export function createRequestRouter(
  planner: QueryPlanner,
  classifier: IntentClassifier,
  weights?: FusionWeights
): RequestRouter {
  return new RequestRouter(planner, classifier, weights);
}
