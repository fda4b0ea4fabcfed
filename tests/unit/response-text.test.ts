import { describe, it, expect } from 'vitest';
import { toResponseText } from '../../src/services/processing/index.js';
import type {
  CalculationResult,
  HybridResult,
  RetrievalResult,
} from '../../src/services/processing/index.js';

const calculation: CalculationResult = {
  kind: 'calculation',
  query: 'How much did I spend on food this month?',
  processingTimeMs: 3,
  confidence: 0.9,
  calculations: { Total: 120.5 },
  aggregations: { 'Data Points': 2, 'Date Range': '2026-03-05 to 2026-03-10' },
  dataPoints: [
    { id: 'f1', value: 45.5, description: 'Expense one', timestamp: new Date('2026-03-05T19:00:00Z') },
    { id: 'f2', value: 75, description: 'Expense two', timestamp: new Date('2026-03-10T10:00:00Z') },
  ],
  categoryBreakdown: { takeout: 45.5, groceries: 75 },
  trend: { interval: 'weekly', points: [{ period: '2026-03-02', value: 45.5, count: 1 }] },
};

const retrieval: RetrievalResult = {
  kind: 'retrieval',
  query: 'Why am I tired?',
  processingTimeMs: 5,
  confidence: 0.5,
  response: 'You slept late twice this week.',
  sources: [{ id: 'j1', title: 'Late night', type: 'journals', relevanceScore: 0.5, snippet: 'Late night' }],
  generationType: 'narrative',
};

describe('toResponseText', () => {
  it('renders every calculation section in order', () => {
    expect(toResponseText(calculation).split('\n')).toEqual([
      '📊 **Calculation Results**',
      '',
      '• **Total**: 120.50',
      '',
      '📈 **Summary Statistics**',
      '• Data Points: 2',
      '• Date Range: 2026-03-05 to 2026-03-10',
      '',
      '🗂️ **By Category**',
      '• groceries: 75',
      '• takeout: 45.50',
      '',
      '📉 **Trend** (weekly)',
      '• 2026-03-02: 45.50 (1 records)',
      '',
      '🔍 **Key Data Points** (2 records analyzed)',
      '• Expense one',
      '• Expense two',
    ]);
  });

  it('leads with the explanation when there is one', () => {
    const text = toResponseText({
      ...calculation,
      aggregations: {},
      dataPoints: [],
      categoryBreakdown: undefined,
      trend: undefined,
      aiExplanation: 'Mostly groceries.',
    });

    expect(text).toBe(
      [
        '🤖 **AI Analysis**',
        '',
        'Mostly groceries.',
        '',
        '---',
        '',
        '📊 **Detailed Results**',
        '',
        '• **Total**: 120.50',
      ].join('\n')
    );
  });

  it('lists at most five key data points', () => {
    const dataPoints = [1, 2, 3, 4, 5, 6].map((n) => ({
      id: `p${n}`,
      value: n,
      description: `Point ${n}`,
      timestamp: new Date('2026-03-01T00:00:00Z'),
    }));
    const text = toResponseText({ ...calculation, dataPoints });

    expect(text).toContain('(6 records analyzed)');
    expect(text).toContain('• Point 5');
    expect(text).not.toContain('Point 6');
  });

  it('renders a retrieval answer with sources', () => {
    expect(toResponseText(retrieval)).toBe(
      ['You slept late twice this week.', '', '📚 **Sources**', '1. Late night (journals)'].join('\n')
    );
  });

  it('adds recommendations for advisory answers', () => {
    const text = toResponseText({ ...retrieval, sources: [], advice: '- Try sleeping earlier' });
    expect(text).toBe(
      ['You slept late twice this week.', '', '💡 **Recommendations**', '- Try sleeping earlier'].join('\n')
    );
  });

  it('renders a hybrid result', () => {
    const hybrid: HybridResult = {
      kind: 'hybrid',
      query: 'q',
      processingTimeMs: 8,
      confidence: 0.7,
      calculation,
      retrieval: { ...retrieval, advice: '- Cook at home' },
      synthesis: 'Spending rose.',
    };

    expect(toResponseText(hybrid)).toBe(
      [
        '🔬 **Comprehensive Analysis**',
        '',
        'Spending rose.',
        '',
        '📊 **Quantitative Analysis**',
        '• **Total**: 120.50',
        '',
        '🧠 **Contextual Insights**',
        'You slept late twice this week.',
        '',
        '💡 **Actionable Recommendations**',
        '- Cook at home',
      ].join('\n')
    );
  });
});
