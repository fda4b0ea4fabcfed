/**
 * Weighted fusion of the classifier stages into one routing decision.
 */

import type { QueryContext } from '../../core/types.js';
import { clamp } from '../../utils/text.js';
import type { StageResults } from '../classification/intent-classifier.js';
import { INTENT_TYPES, type IntentScores, type IntentType } from '../classification/types.js';
import type { FusionWeights, ProcessingPath, RoutingDecision } from './types.js';

const FINANCE_PENALTY = 0.1;
const FALLBACK_CONFIDENCE = 0.3;

export const DEFAULT_FUSION_WEIGHTS: FusionWeights = {
  rule: 0.4,
  semantic: 0.3,
  llm: 0.3,
  penalty: 0.2,
  hybridThreshold: 0.5,
};

function addScore(scores: IntentScores, intent: IntentType, amount: number): void {
  if (amount <= 0) return;
  scores[intent] = (scores[intent] ?? 0) + amount;
}

/**
 * Penalty applied to data-bound intents, in [0,1]
 */
export function dataAvailabilityPenalty(context: QueryContext): number {
  return clamp(context.targetDomains.includes('finance_records') ? FINANCE_PENALTY : 0);
}

export function fuseScores(
  stages: StageResults,
  context: QueryContext,
  weights: FusionWeights = DEFAULT_FUSION_WEIGHTS
): IntentScores {
  const fused: IntentScores = {};

  for (const intent of INTENT_TYPES) {
    addScore(fused, intent, (stages.rule.scores[intent] ?? 0) * weights.rule);
    addScore(fused, intent, stages.semantic.scores[intent] * weights.semantic);
  }
  if (stages.llm) {
    addScore(fused, stages.llm.intent, weights.llm * stages.llm.confidence);
  }

  const penalty = weights.penalty * dataAvailabilityPenalty(context);
  for (const intent of ['aggregate', 'retrieval'] as const) {
    const score = fused[intent];
    if (score !== undefined) fused[intent] = score - penalty;
  }

  return fused;
}

function pickTopIntent(
  fused: IntentScores,
  stages: StageResults
): { intent: IntentType; confidence: number } {
  let top: { intent: IntentType; confidence: number } | null = null;
  for (const intent of INTENT_TYPES) {
    const score = fused[intent];
    if (score === undefined) continue;
    if (!top || score > top.confidence) top = { intent, confidence: score };
  }
  if (top) return top;

  if (stages.semantic.meetsThreshold) {
    return {
      intent: stages.semantic.topIntent,
      confidence: stages.semantic.scores[stages.semantic.topIntent],
    };
  }
  return { intent: 'retrieval', confidence: FALLBACK_CONFIDENCE };
}

export function makeDecision(
  stages: StageResults,
  context: QueryContext,
  weights: FusionWeights = DEFAULT_FUSION_WEIGHTS
): RoutingDecision {
  const fusedScores = fuseScores(stages, context, weights);
  const top = pickTopIntent(fusedScores, stages);
  const isMixedQuery = stages.rule.isMixedQuery;
  const hybrid =
    isMixedQuery ||
    ((fusedScores.aggregate ?? 0) > weights.hybridThreshold &&
      (fusedScores.retrieval ?? 0) > weights.hybridThreshold);

  return {
    primaryIntent: top.intent,
    confidence: clamp(top.confidence),
    hybrid,
    isMixedQuery,
    fusedScores,
    rule: stages.rule,
    semantic: stages.semantic,
    llm: stages.llm,
  };
}

export function processingPathFor(decision: RoutingDecision): ProcessingPath {
  if (decision.hybrid) return 'hybrid';
  switch (decision.primaryIntent) {
    case 'aggregate':
      return 'calculation';
    case 'retrieval':
    case 'reminder':
      return 'retrieval';
  }
}
