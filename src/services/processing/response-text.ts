/**
 * Markdown-like rendering of processing results
 */

import { bulletList, formatValue } from './format.js';
import type { CalculationResult, HybridResult, ProcessingResult, RetrievalResult } from './types.js';

const KEY_POINT_LIMIT = 5;

function calculationDetails(result: CalculationResult): string[] {
  const lines = bulletList(result.calculations, true);

  if (Object.keys(result.aggregations).length > 0) {
    lines.push('', '📈 **Summary Statistics**', ...bulletList(result.aggregations));
  }

  if (result.categoryBreakdown && Object.keys(result.categoryBreakdown).length > 0) {
    const sorted = Object.entries(result.categoryBreakdown).sort(([, a], [, b]) => b - a);
    lines.push('', '🗂️ **By Category**', ...sorted.map(([category, amount]) => `• ${category}: ${formatValue(amount)}`));
  }

  if (result.trend && result.trend.points.length > 0) {
    lines.push(
      '',
      `📉 **Trend** (${result.trend.interval})`,
      ...result.trend.points.map(
        (point) => `• ${point.period}: ${formatValue(point.value)} (${point.count} records)`
      )
    );
  }

  if (result.dataPoints.length > 0) {
    lines.push(
      '',
      `🔍 **Key Data Points** (${result.dataPoints.length} records analyzed)`,
      ...result.dataPoints.slice(0, KEY_POINT_LIMIT).map((point) => `• ${point.description}`)
    );
  }

  return lines;
}

function renderCalculation(result: CalculationResult): string {
  if (result.aiExplanation) {
    return [
      '🤖 **AI Analysis**',
      '',
      result.aiExplanation,
      '',
      '---',
      '',
      '📊 **Detailed Results**',
      '',
      ...calculationDetails(result),
    ].join('\n');
  }
  return ['📊 **Calculation Results**', '', ...calculationDetails(result)].join('\n');
}

function renderRetrieval(result: RetrievalResult): string {
  const lines = [result.response];

  if (result.advice) {
    lines.push('', '💡 **Recommendations**', result.advice);
  }

  if (result.sources.length > 0) {
    lines.push(
      '',
      '📚 **Sources**',
      ...result.sources.map((source, i) => `${i + 1}. ${source.title} (${source.type})`)
    );
  }

  return lines.join('\n');
}

function renderHybrid(result: HybridResult): string {
  const lines = ['🔬 **Comprehensive Analysis**', ''];

  if (result.synthesis) {
    lines.push(result.synthesis, '');
  }

  lines.push(
    '📊 **Quantitative Analysis**',
    ...bulletList(result.calculation.calculations, true),
    '',
    '🧠 **Contextual Insights**',
    result.retrieval.response
  );

  if (result.retrieval.advice) {
    lines.push('', '💡 **Actionable Recommendations**', result.retrieval.advice);
  }

  return lines.join('\n');
}

export function toResponseText(result: ProcessingResult): string {
  switch (result.kind) {
    case 'calculation':
      return renderCalculation(result);
    case 'retrieval':
      return renderRetrieval(result);
    case 'hybrid':
      return renderHybrid(result);
  }
}
