import { describe, it, expect } from 'vitest';
import { RuleClassifier, loadClassificationResources } from '../../src/services/classification/index.js';
import type { RuleKeywordTables } from '../../src/services/classification/index.js';

const resources = loadClassificationResources();
const classifier = new RuleClassifier(resources.ruleKeywords, resources.translations, {
  highConfidenceThreshold: 0.8,
});

describe('RuleClassifier', () => {
  it('scores an English spending question across both variants', () => {
    const result = classifier.classify('How much did I spend on food this month?');

    expect(result.language).toBe('en');
    expect(result.variants).toEqual([
      'how much did i spend on food this month?',
      '多少 did i spend on food 这个月?',
    ]);
    expect(result.rawScores).toEqual({ aggregate: 9.5, retrieval: 1, reminder: 0 });
    expect(result.scores).toEqual({ aggregate: 1, retrieval: 0.2 });
    expect(result.matchedKeywords).toEqual(['这个月', '多少', 'how much', 'spend', 'this month', 'food']);
    expect(result.isHighConfidence).toBe(true);
    expect(result.isMixedQuery).toBe(false);
  });

  it('scores a Chinese spending question', () => {
    const result = classifier.classify('这个月我花了多少钱？');

    expect(result.language).toBe('zh');
    expect(result.variants[1]).toBe('this month我花了how much money？');
    expect(result.rawScores.aggregate).toBe(11.5);
    expect(result.scores).toEqual({ aggregate: 1 });
  });

  it('flags mixed queries by pattern', () => {
    expect(classifier.classify('How much did I spend and why?').isMixedQuery).toBe(true);
    expect(classifier.classify('消费太多了，怎么改进').isMixedQuery).toBe(true);
  });

  it('flags mixed queries when both raw scores are strong', () => {
    const result = classifier.classify('Total expense history explained');

    expect(result.rawScores).toEqual({ aggregate: 8, retrieval: 5, reminder: 0 });
    expect(result.isMixedQuery).toBe(true);
  });

  it('keeps domain nouns at or below the mixed raw score', () => {
    const { keywords } = resources.ruleKeywords.retrieval;
    const domainNouns = [...keywords.zh, ...keywords.en].filter((entry) => !entry.domains.includes('general'));

    expect(domainNouns.length).toBeGreaterThan(0);
    for (const entry of domainNouns) {
      expect(entry.weight, entry.keyword).toBeLessThanOrEqual(1);
    }
    expect(classifier.classify('How much did I spend on my mood and health and food?').isMixedQuery).toBe(true);
  });

  it('is not confident about a weak match', () => {
    const result = classifier.classify('Remind me to drink water every day');

    expect(result.scores.reminder).toBeCloseTo(2 / 3);
    expect(result.scores.aggregate).toBeCloseTo(0.3);
    expect(result.scores.retrieval).toBeUndefined();
    expect(result.isHighConfidence).toBe(false);
  });

  it('counts a keyword once per intent', () => {
    const tables: RuleKeywordTables = {
      aggregate: {
        normalizer: 4,
        keywords: {
          en: [{ keyword: 'Total', weight: 1, domains: ['general'] }],
          zh: [{ keyword: 'total', weight: 1, domains: ['general'] }],
        },
      },
      retrieval: { normalizer: 1, keywords: { en: [], zh: [] } },
      reminder: { normalizer: 1, keywords: { en: [], zh: [] } },
    };
    const custom = new RuleClassifier(tables, { zhToEn: [], enToZh: [] });

    expect(custom.classify('total total').rawScores.aggregate).toBe(1);
    expect(custom.classify('total total').scores).toEqual({ aggregate: 0.25 });
  });
});
