/**
 * Intent classifier
 *
 * Runs the rule and semantic stages on every query. The LLM stage runs only
 * when neither is decisive.
 */

import { createComponentLogger } from '../../utils/logger.js';
import type { ChatCompleter, QueryContext } from '../../core/types.js';
import { loadClassificationResources } from './resources.js';
import { RuleClassifier, type RuleClassifierOptions } from './rule-classifier.js';
import { SemanticClassifier, type SemanticThresholdOptions } from './semantic-classifier.js';
import { LlmClassifier, type LlmClassifierOptions } from './llm-classifier.js';
import type {
  ClassificationResources,
  LlmClassification,
  RuleClassification,
  SemanticClassification,
} from './types.js';

const logger = createComponentLogger('classification');

export interface StageResults {
  rule: RuleClassification;
  semantic: SemanticClassification;
  /** Null when the LLM stage was skipped */
  llm: LlmClassification | null;
}

export interface IntentClassifierOptions
  extends RuleClassifierOptions,
    SemanticThresholdOptions,
    LlmClassifierOptions {
  resources?: ClassificationResources;
}

export class IntentClassifier {
  private readonly rules: RuleClassifier;
  private readonly semantic: SemanticClassifier;
  private readonly llm: LlmClassifier;

  constructor(chat: ChatCompleter | null, options: IntentClassifierOptions = {}) {
    const resources = options.resources ?? loadClassificationResources();
    this.rules = new RuleClassifier(resources.ruleKeywords, resources.translations, options);
    this.semantic = new SemanticClassifier(resources.prototypes, options);
    this.llm = new LlmClassifier(chat, options);
  }

  async classify(query: string, context?: QueryContext): Promise<StageResults> {
    const rule = this.rules.classify(query);
    const semantic = this.semantic.classify(query);

    const needsLlm = !rule.isHighConfidence && !semantic.meetsThreshold;
    const llm = needsLlm ? await this.llm.classify(query, context) : null;

    logger.debug(
      {
        ruleScores: rule.scores,
        semanticScores: semantic.scores,
        llmIntent: llm?.intent,
        llmSource: llm?.source,
      },
      'Classified query'
    );

    return { rule, semantic, llm };
  }
}

export function createIntentClassifier(
  chat: ChatCompleter | null,
  options: IntentClassifierOptions = {}
): IntentClassifier {
  return new IntentClassifier(chat, options);
}
