/**
 * Intent classification types
 */

import type { Language } from '../../utils/text.js';

export const INTENT_TYPES = ['aggregate', 'retrieval', 'reminder'] as const;

export type IntentType = (typeof INTENT_TYPES)[number];

export type IntentScores = Partial<Record<IntentType, number>>;

export interface RuleClassification {
  stage: 'rule';
  scores: IntentScores;
  /** Un-normalised keyword weight sums */
  rawScores: Record<IntentType, number>;
  language: Language;
  variants: string[];
  matchedKeywords: string[];
  isHighConfidence: boolean;
  isMixedQuery: boolean;
}

export interface SemanticClassification {
  stage: 'semantic';
  scores: Record<IntentType, number>;
  threshold: number;
  meetsThreshold: boolean;
  margin: number;
  topIntent: IntentType;
}

export type LlmSlots = Record<string, unknown>;

export interface LlmClassification {
  stage: 'llm';
  intent: IntentType;
  confidence: number;
  scores: IntentScores;
  slots: LlmSlots;
  reasoning?: string;
  source: 'llm' | 'heuristic';
}

export type ClassificationResult = RuleClassification | SemanticClassification | LlmClassification;

export interface KeywordEntry {
  keyword: string;
  weight: number;
  domains: string[];
}

export interface IntentKeywordTable {
  normalizer: number;
  keywords: Record<Language, KeywordEntry[]>;
}

export type RuleKeywordTables = Record<IntentType, IntentKeywordTable>;

export type SemanticPrototypes = Record<IntentType, string[]>;

export interface PhraseTranslations {
  zhToEn: Array<[string, string]>;
  enToZh: Array<[string, string]>;
}

export interface ClassificationResources {
  ruleKeywords: RuleKeywordTables;
  prototypes: SemanticPrototypes;
  translations: PhraseTranslations;
}
