/**
 * Semantic intent classifier
 *
 * Word-set Jaccard similarity against labelled example queries.
 */

import { config } from '../../config/index.js';
import { clamp, jaccardSimilarity } from '../../utils/text.js';
import { INTENT_TYPES, type IntentType, type SemanticClassification, type SemanticPrototypes } from './types.js';

const REFERENCE_WORD_COUNT = 5;

export interface SemanticThresholdOptions {
  semanticBaseThreshold?: number;
  semanticThresholdStep?: number;
  semanticMinThreshold?: number;
  semanticMaxThreshold?: number;
}

function splitWords(text: string): string[] {
  return text
    .toLowerCase()
    .split(' ')
    .filter((word) => word.length > 0);
}

function toWordSet(text: string): Set<string> {
  return new Set(splitWords(text));
}

/**
 * Acceptance threshold for a query of `wordCount` words: the base value at five
 * words, moved by the step for each word more or fewer, clamped to [min, max].
 */
export function semanticThreshold(wordCount: number, options: SemanticThresholdOptions = {}): number {
  const cls = config.classification;
  const base = options.semanticBaseThreshold ?? cls.semanticBaseThreshold;
  const step = options.semanticThresholdStep ?? cls.semanticThresholdStep;
  const min = options.semanticMinThreshold ?? cls.semanticMinThreshold;
  const max = options.semanticMaxThreshold ?? cls.semanticMaxThreshold;
  return clamp(base + (wordCount - REFERENCE_WORD_COUNT) * step, min, max);
}

export class SemanticClassifier {
  private readonly prototypeSets: Record<IntentType, Set<string>[]>;

  constructor(
    prototypes: SemanticPrototypes,
    private readonly options: SemanticThresholdOptions = {}
  ) {
    this.prototypeSets = {
      aggregate: prototypes.aggregate.map(toWordSet),
      retrieval: prototypes.retrieval.map(toWordSet),
      reminder: prototypes.reminder.map(toWordSet),
    };
  }

  classify(query: string): SemanticClassification {
    const queryWords = splitWords(query);
    const words = new Set(queryWords);

    const scores: Record<IntentType, number> = { aggregate: 0, retrieval: 0, reminder: 0 };
    for (const intent of INTENT_TYPES) {
      for (const prototype of this.prototypeSets[intent]) {
        scores[intent] = Math.max(scores[intent], jaccardSimilarity(words, prototype));
      }
    }

    const ranked = [...INTENT_TYPES].sort((a, b) => scores[b] - scores[a]);
    const topIntent = ranked[0] ?? 'retrieval';
    const top = scores[topIntent];
    const second = ranked[1] ? scores[ranked[1]] : 0;
    const threshold = semanticThreshold(queryWords.length, this.options);

    return {
      stage: 'semantic',
      scores,
      threshold,
      meetsThreshold: top >= threshold,
      margin: top - second,
      topIntent,
    };
  }
}
