/**
 * Rule-based intent classifier
 *
 * Weighted bilingual keyword tables scored over the query and its phrase
 * translation, plus regexes for queries that ask for a number and an
 * explanation at once.
 */

import { createComponentLogger } from '../../utils/logger.js';
import { config } from '../../config/index.js';
import { clamp, detectLanguage, type Language } from '../../utils/text.js';
import {
  INTENT_TYPES,
  type IntentScores,
  type IntentType,
  type PhraseTranslations,
  type RuleClassification,
  type RuleKeywordTables,
} from './types.js';

const logger = createComponentLogger('classification:rules');

// =============================================================================
// MIXED QUERY PATTERNS
// =============================================================================

const MIXED_PATTERNS: readonly RegExp[] = [
  /(how much|total|amount|spent).*and.*(why|explain|suggest|improve|advice)/i,
  /(calculate|sum).*and.*(analyze|recommend)/i,
  /(show me).*and.*(help|advice)/i,
  /(多少钱|总计|花费).*为什么/,
  /(总计|计算).*建议/,
  /(多少|数量).*分析/,
  /(支出|消费).*改进/,
];

/** Raw keyword weight both aggregate and retrieval must exceed to count as mixed */
const MIXED_RAW_SCORE = 1.0;

// =============================================================================
// CLASSIFIER
// =============================================================================

export interface RuleClassifierOptions {
  highConfidenceThreshold?: number;
}

export class RuleClassifier {
  constructor(
    private readonly tables: RuleKeywordTables,
    private readonly translations: PhraseTranslations,
    private readonly options: RuleClassifierOptions = {}
  ) {}

  classify(query: string): RuleClassification {
    const language = detectLanguage(query);
    const variants = this.buildVariants(query, language);

    const rawScores: Record<IntentType, number> = { aggregate: 0, retrieval: 0, reminder: 0 };
    const scores: IntentScores = {};
    const matchedKeywords: string[] = [];

    for (const intent of INTENT_TYPES) {
      const table = this.tables[intent];
      const seen = new Set<string>();
      for (const entry of [...table.keywords.zh, ...table.keywords.en]) {
        const keyword = entry.keyword.toLowerCase();
        if (seen.has(keyword)) continue;
        if (variants.some((variant) => variant.includes(keyword))) {
          seen.add(keyword);
          rawScores[intent] += entry.weight;
          matchedKeywords.push(entry.keyword);
        }
      }

      const normalized = clamp(rawScores[intent] / table.normalizer);
      if (normalized > 0) scores[intent] = normalized;
    }

    const isMixedQuery =
      MIXED_PATTERNS.some((pattern) => pattern.test(query)) ||
      (rawScores.aggregate > MIXED_RAW_SCORE && rawScores.retrieval > MIXED_RAW_SCORE);

    const threshold = this.options.highConfidenceThreshold ?? config.classification.highConfidenceThreshold;
    const maxScore = Math.max(0, ...Object.values(scores));

    logger.debug({ scores, isMixedQuery, language }, 'Rule classification');

    return {
      stage: 'rule',
      scores,
      rawScores,
      language,
      variants,
      matchedKeywords,
      isHighConfidence: maxScore > threshold,
      isMixedQuery,
    };
  }

  /**
   * The lowercased query and its phrase translation into the other language.
   */
  buildVariants(query: string, language: Language): string[] {
    const lower = query.toLowerCase();
    const pairs = language === 'zh' ? this.translations.zhToEn : this.translations.enToZh;

    let translated = lower;
    for (const [from, to] of pairs) {
      translated = translated.replaceAll(from, to);
    }

    return translated === lower ? [lower] : [lower, translated];
  }
}
