/**
 * Routing types
 */

import type { DomainName, QueryContext, QueryFilters, TimeRange } from '../../core/types.js';
import type {
  IntentScores,
  IntentType,
  LlmClassification,
  RuleClassification,
  SemanticClassification,
} from '../classification/types.js';

export interface RoutingDecision {
  primaryIntent: IntentType;
  confidence: number;
  hybrid: boolean;
  isMixedQuery: boolean;
  fusedScores: IntentScores;
  rule: RuleClassification;
  semantic: SemanticClassification;
  llm: LlmClassification | null;
}

export type ProcessingPath = 'calculation' | 'retrieval' | 'hybrid';

export type CalculationOperation = 'sum' | 'average' | 'count' | 'trend' | 'grouping';

export type AggregationType = 'sum' | 'average' | 'count' | 'timeSeriesAverage';

export type GroupBy = 'category' | 'day' | 'month';

export interface CalculationSpecs {
  operations: CalculationOperation[];
  aggregations: AggregationType[];
  filters: QueryFilters;
  timeRange?: TimeRange;
  groupBy?: GroupBy[];
}

export type ContextNeeds = 'minimal' | 'moderate' | 'extensive' | 'historical' | 'comparative';

export type GenerationType = 'factual' | 'analytical' | 'advisory' | 'narrative' | 'summary';

export interface RetrievalSpecs {
  searchTerms: string[];
  contextNeeds: ContextNeeds;
  generationType: GenerationType;
  domainFocus?: DomainName[];
}

interface RoutingBase {
  query: string;
  context: QueryContext;
  confidence: number;
  decision: RoutingDecision;
}

export interface CalculationRouting extends RoutingBase {
  processingPath: 'calculation';
  calculationSpecs: CalculationSpecs;
}

export interface RetrievalRouting extends RoutingBase {
  processingPath: 'retrieval';
  retrievalSpecs: RetrievalSpecs;
}

export interface HybridRouting extends RoutingBase {
  processingPath: 'hybrid';
  calculationSpecs: CalculationSpecs;
  retrievalSpecs: RetrievalSpecs;
}

export type Routing = CalculationRouting | RetrievalRouting | HybridRouting;

export interface FusionWeights {
  rule: number;
  semantic: number;
  llm: number;
  penalty: number;
  hybridThreshold: number;
}
