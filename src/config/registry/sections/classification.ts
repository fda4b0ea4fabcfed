/**
 * Classification Configuration Section
 *
 * Intent stage fusion weights and thresholds.
 */

import { z } from 'zod';
import type { ConfigSectionMeta } from '../types.js';

export const classificationSection = {
  name: 'classification',
  description: 'Intent classification and routing configuration.',
  options: {
    ruleWeight: {
      envKey: 'LIFEQ_CLASSIFY_RULE_WEIGHT',
      defaultValue: 0.4,
      description: 'Fusion weight of the keyword rule stage.',
      schema: z.number().min(0).max(1),
    },
    semanticWeight: {
      envKey: 'LIFEQ_CLASSIFY_SEMANTIC_WEIGHT',
      defaultValue: 0.3,
      description: 'Fusion weight of the prototype similarity stage.',
      schema: z.number().min(0).max(1),
    },
    llmWeight: {
      envKey: 'LIFEQ_CLASSIFY_LLM_WEIGHT',
      defaultValue: 0.3,
      description: 'Fusion weight of the LLM stage.',
      schema: z.number().min(0).max(1),
    },
    penaltyWeight: {
      envKey: 'LIFEQ_CLASSIFY_PENALTY_WEIGHT',
      defaultValue: 0.2,
      description: 'Weight of the data-availability penalty on data-bound intents.',
      schema: z.number().min(0).max(1),
    },
    hybridThreshold: {
      envKey: 'LIFEQ_CLASSIFY_HYBRID_THRESHOLD',
      defaultValue: 0.5,
      description: 'Aggregate and retrieval must both exceed this to route hybrid.',
      schema: z.number().min(0).max(1),
    },
    semanticBaseThreshold: {
      envKey: 'LIFEQ_CLASSIFY_SEMANTIC_BASE',
      defaultValue: 0.53,
      description: 'Semantic acceptance threshold for a five-word query.',
      schema: z.number().min(0).max(1),
    },
    semanticThresholdStep: {
      envKey: 'LIFEQ_CLASSIFY_SEMANTIC_STEP',
      defaultValue: 0.02,
      description: 'Change in the semantic threshold per word beyond five.',
      schema: z.number().min(-1).max(1),
    },
    semanticMinThreshold: {
      envKey: 'LIFEQ_CLASSIFY_SEMANTIC_MIN',
      defaultValue: 0.4,
      description: 'Lower bound of the semantic threshold.',
      schema: z.number().min(0).max(1),
    },
    semanticMaxThreshold: {
      envKey: 'LIFEQ_CLASSIFY_SEMANTIC_MAX',
      defaultValue: 0.7,
      description: 'Upper bound of the semantic threshold.',
      schema: z.number().min(0).max(1),
    },
    highConfidenceThreshold: {
      envKey: 'LIFEQ_CLASSIFY_HIGH_CONFIDENCE',
      defaultValue: 0.8,
      description: 'Rule stage score above which the LLM stage is skipped.',
      schema: z.number().min(0).max(1),
    },
    useLlm: {
      envKey: 'LIFEQ_CLASSIFY_USE_LLM',
      defaultValue: true,
      description: 'Ask the chat model in the LLM stage; when false only heuristics run.',
      schema: z.boolean(),
    },
  },
} satisfies ConfigSectionMeta;
