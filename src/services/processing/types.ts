/**
 * Processing result types
 *
 * One variant per processing path; consumers switch on `kind`.
 */

import type { DataPoint, TrendInterval, TrendPoint } from '../aggregation/types.js';
import type { GenerationType } from '../routing/types.js';

export interface SourceCitation {
  readonly id: string;
  readonly title: string;
  readonly type: string;
  readonly relevanceScore: number;
  readonly snippet: string;
}

export interface TrendSeries {
  readonly interval: TrendInterval;
  readonly points: readonly TrendPoint[];
}

interface ResultBase {
  readonly query: string;
  readonly processingTimeMs: number;
  readonly confidence: number;
}

export interface CalculationResult extends ResultBase {
  readonly kind: 'calculation';
  /** Keyed by `Total`, `Average`, `Count` and `Period Average` */
  readonly calculations: Readonly<Record<string, number>>;
  /** `Data Points` and `Date Range` */
  readonly aggregations: Readonly<Record<string, number | string>>;
  readonly dataPoints: readonly DataPoint[];
  readonly categoryBreakdown?: Readonly<Record<string, number>>;
  readonly trend?: TrendSeries;
  readonly aiExplanation?: string;
}

export interface RetrievalResult extends ResultBase {
  readonly kind: 'retrieval';
  readonly response: string;
  readonly sources: readonly SourceCitation[];
  readonly generationType: GenerationType;
  readonly advice?: string;
}

export interface HybridResult extends ResultBase {
  readonly kind: 'hybrid';
  readonly calculation: CalculationResult;
  readonly retrieval: RetrievalResult;
  readonly synthesis: string;
}

export type ProcessingResult = CalculationResult | RetrievalResult | HybridResult;
