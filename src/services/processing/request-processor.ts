/**
 * Request processor
 *
 * Executes a routing: aggregation for the calculation path, search plus
 * generation for the retrieval path, both concurrently for the hybrid path.
 * Never throws; failures become an apologetic retrieval result.
 */

import { createComponentLogger } from '../../utils/logger.js';
import { clamp } from '../../utils/text.js';
import { getErrorMessage } from '../../core/errors.js';
import type { DataAggregator } from '../aggregation/data-aggregator.js';
import type { DataPoint, TrendInterval } from '../aggregation/types.js';
import type { RagPipeline } from '../rag/rag-pipeline.js';
import type { PromptTemplates, SearchResult } from '../rag/types.js';
import { CONTEXT_LIMITS } from '../routing/spec-builders.js';
import type { CalculationSpecs, GroupBy, RetrievalSpecs, Routing } from '../routing/types.js';
import { extractAdvice } from './advice.js';
import { bulletList, formatDateRange } from './format.js';
import type {
  CalculationResult,
  HybridResult,
  ProcessingResult,
  RetrievalResult,
  SourceCitation,
  TrendSeries,
} from './types.js';

const logger = createComponentLogger('processor');

const CALCULATION_CONFIDENCE = 0.9;
const TITLE_LENGTH = 50;

export interface RequestProcessorDeps {
  aggregator: DataAggregator;
  rag: RagPipeline;
  promptTemplates?: PromptTemplates;
  /** Milliseconds clock used for processing times */
  clock?: () => number;
}

// =============================================================================
// HELPERS
// =============================================================================

function toCitation(result: SearchResult): SourceCitation {
  const text = result.chunkText;
  return {
    id: result.objectId,
    title: text.length > TITLE_LENGTH ? `${text.slice(0, TITLE_LENGTH)}...` : text,
    type: result.objectType,
    relevanceScore: result.similarity,
    snippet: text,
  };
}

function retrievalConfidence(results: readonly SearchResult[]): number {
  if (results.length === 0) return 0;
  const total = results.reduce((sum, result) => sum + result.similarity, 0);
  return clamp(total / results.length);
}

function trendInterval(groupBy: readonly GroupBy[] | undefined): TrendInterval {
  if (groupBy?.includes('day')) return 'daily';
  if (groupBy?.includes('month')) return 'monthly';
  return 'weekly';
}

function mergePoints(target: DataPoint[], seen: Set<string>, points: readonly DataPoint[]): void {
  for (const point of points) {
    if (seen.has(point.id)) continue;
    seen.add(point.id);
    target.push(point);
  }
}

/**
 * Plain bullets handed to the chat model alongside the retrieved context
 */
export function calculationSummary(
  calculations: Readonly<Record<string, number>>,
  aggregations: Readonly<Record<string, number | string>>
): string {
  return [...bulletList(calculations), ...bulletList(aggregations)].join('\n');
}

export function ruleBasedCalculationSummary(
  calculations: Readonly<Record<string, number>>,
  aggregations: Readonly<Record<string, number | string>>
): string {
  const sections: string[] = [];
  if (Object.keys(calculations).length > 0) {
    sections.push(['**Calculation Results:**', ...bulletList(calculations, true)].join('\n'));
  }
  if (Object.keys(aggregations).length > 0) {
    sections.push(['**Data Summary:**', ...bulletList(aggregations)].join('\n'));
  }
  return sections.join('\n\n');
}

/**
 * Leads with the first calculation, then the retrieval answer, then any advice.
 */
export function ruleBasedSynthesis(calculation: CalculationResult, retrieval: RetrievalResult): string {
  const sections: string[] = [];
  const [first] = bulletList(calculation.calculations, true);
  if (first) {
    sections.push(`Based on your data analysis:\n${first}`);
  }
  sections.push(`**Analysis**: ${retrieval.response}`);
  if (retrieval.advice) {
    sections.push(`**Key Insights**: ${retrieval.advice}`);
  }
  return sections.join('\n\n');
}

/**
 * Apologetic result returned in place of a failed request
 */
export function errorResult(query: string, error: unknown, processingTimeMs = 0): RetrievalResult {
  return {
    kind: 'retrieval',
    query,
    processingTimeMs,
    confidence: 0,
    response: `Sorry, I encountered an error while processing your request: ${getErrorMessage(error)}`,
    sources: [],
    generationType: 'factual',
  };
}

// =============================================================================
// PROCESSOR
// =============================================================================

export class RequestProcessor {
  private readonly aggregator: DataAggregator;
  private readonly rag: RagPipeline;
  private readonly promptTemplates?: PromptTemplates;
  private readonly clock: () => number;

  constructor(deps: RequestProcessorDeps) {
    this.aggregator = deps.aggregator;
    this.rag = deps.rag;
    this.promptTemplates = deps.promptTemplates;
    this.clock = deps.clock ?? (() => Date.now());
  }

  async processRequest(routing: Routing): Promise<ProcessingResult> {
    const started = this.clock();

    try {
      switch (routing.processingPath) {
        case 'calculation':
          return await this.executeCalculation(routing.calculationSpecs, routing.query);
        case 'retrieval':
          return await this.executeRetrieval(routing.retrievalSpecs, routing.query);
        case 'hybrid':
          return await this.executeHybrid(routing.calculationSpecs, routing.retrievalSpecs, routing.query);
      }
    } catch (error) {
      logger.error({ path: routing.processingPath, error: getErrorMessage(error) }, 'Request processing failed');
      return errorResult(routing.query, error, this.clock() - started);
    }
  }

  async executeCalculation(specs: CalculationSpecs, query: string): Promise<CalculationResult> {
    const started = this.clock();
    const calculations: Record<string, number> = {};
    const dataPoints: DataPoint[] = [];
    const seen = new Set<string>();

    for (const aggregation of specs.aggregations) {
      switch (aggregation) {
        case 'sum': {
          const result = await this.aggregator.calculateSum(specs.filters, specs.timeRange);
          calculations.Total = result.value;
          mergePoints(dataPoints, seen, result.dataPoints);
          break;
        }
        case 'average': {
          const result = await this.aggregator.calculateAverage(specs.filters, specs.timeRange);
          calculations.Average = result.value;
          mergePoints(dataPoints, seen, result.dataPoints);
          break;
        }
        case 'count': {
          const result = await this.aggregator.calculateCount(specs.filters, specs.timeRange);
          calculations.Count = result.value;
          mergePoints(dataPoints, seen, result.dataPoints);
          break;
        }
        case 'timeSeriesAverage':
          // Computed with the trend series below
          break;
      }
    }

    let trend: TrendSeries | undefined;
    const wantsTrend =
      specs.aggregations.includes('timeSeriesAverage') ||
      specs.groupBy?.includes('day') === true ||
      specs.groupBy?.includes('month') === true;
    if (wantsTrend) {
      const interval = trendInterval(specs.groupBy);
      const points = await this.aggregator.calculateTrends('spending', interval, specs.timeRange);
      trend = { interval, points };
      if (specs.aggregations.includes('timeSeriesAverage') && points.length > 0) {
        calculations['Period Average'] = points.reduce((sum, point) => sum + point.value, 0) / points.length;
      }
    }

    let categoryBreakdown: Record<string, number> | undefined;
    if (specs.operations.includes('grouping') || specs.groupBy?.includes('category') === true) {
      categoryBreakdown = await this.aggregator.calculateSpendingByCategory(specs.timeRange);
    }

    const aggregations: Record<string, number | string> = {};
    if (dataPoints.length > 0) {
      aggregations['Data Points'] = dataPoints.length;
      aggregations['Date Range'] = formatDateRange(dataPoints);
    }

    const aiExplanation = await this.explainCalculation(query, calculations, aggregations);

    return {
      kind: 'calculation',
      query,
      processingTimeMs: this.clock() - started,
      confidence: CALCULATION_CONFIDENCE,
      calculations,
      aggregations,
      dataPoints,
      categoryBreakdown,
      trend,
      aiExplanation,
    };
  }

  private async explainCalculation(
    query: string,
    calculations: Record<string, number>,
    aggregations: Record<string, number | string>
  ): Promise<string> {
    try {
      const answer = await this.rag.generateAnswer(query, {
        calculationSummary: calculationSummary(calculations, aggregations),
        promptTemplates: this.promptTemplates,
      });
      if (answer.source === 'llm') return answer.text;
    } catch (error) {
      logger.warn({ error: getErrorMessage(error) }, 'Calculation explanation failed, using summary');
    }
    return ruleBasedCalculationSummary(calculations, aggregations);
  }

  async executeRetrieval(specs: RetrievalSpecs, query: string): Promise<RetrievalResult> {
    const started = this.clock();

    const results = await this.rag.search(query, {
      objectTypes: specs.domainFocus,
      limit: CONTEXT_LIMITS[specs.contextNeeds],
    });
    const answer = await this.rag.generateAnswer(query, {
      filters: { objectTypes: specs.domainFocus },
      promptTemplates: this.promptTemplates,
    });

    return {
      kind: 'retrieval',
      query,
      processingTimeMs: this.clock() - started,
      confidence: retrievalConfidence(results),
      response: answer.text,
      sources: results.map(toCitation),
      generationType: specs.generationType,
      advice: specs.generationType === 'advisory' ? extractAdvice(answer.text) : undefined,
    };
  }

  async executeHybrid(
    calculationSpecs: CalculationSpecs,
    retrievalSpecs: RetrievalSpecs,
    query: string
  ): Promise<HybridResult> {
    const started = this.clock();

    const [calculation, retrieval] = await Promise.all([
      this.executeCalculation(calculationSpecs, query),
      this.executeRetrieval(retrievalSpecs, query),
    ]);

    const synthesis = await this.synthesize(query, calculation, retrieval);

    return {
      kind: 'hybrid',
      query,
      processingTimeMs: this.clock() - started,
      confidence: (calculation.confidence + retrieval.confidence) / 2,
      calculation,
      retrieval,
      synthesis,
    };
  }

  private async synthesize(
    query: string,
    calculation: CalculationResult,
    retrieval: RetrievalResult
  ): Promise<string> {
    try {
      const answer = await this.rag.generateAnswer(query, {
        calculationSummary: calculationSummary(calculation.calculations, calculation.aggregations),
        promptTemplates: this.promptTemplates,
      });
      if (answer.source === 'llm') return answer.text;
    } catch (error) {
      logger.warn({ error: getErrorMessage(error) }, 'Synthesis generation failed, using rule-based synthesis');
    }
    return ruleBasedSynthesis(calculation, retrieval);
  }
}

export function createRequestProcessor(deps: RequestProcessorDeps): RequestProcessor {
  return new RequestProcessor(deps);
}
