import { describe, it, expect } from 'vitest';
import {
  DEFAULT_FUSION_WEIGHTS,
  RequestRouter,
  buildCalculationSpecs,
  buildRetrievalSpecs,
  dataAvailabilityPenalty,
  fuseScores,
  fusionWeightsFromConfig,
  isExplanatoryQuery,
  makeDecision,
  processingPathFor,
} from '../../src/services/routing/index.js';
import { IntentClassifier } from '../../src/services/classification/index.js';
import type {
  IntentScores,
  IntentType,
  LlmClassification,
  StageResults,
} from '../../src/services/classification/index.js';
import { DefaultQueryPlanner, FOOD_CATEGORIES } from '../../src/services/query/index.js';
import { DOMAIN_NAMES, type DomainName, type QueryContext } from '../../src/core/types.js';
import { createFakeChat } from '../fixtures/fakes.js';
import { fixedClock } from '../fixtures/records.js';

const planner = new DefaultQueryPlanner({ now: fixedClock });

function context(targetDomains: DomainName[]): QueryContext {
  return { originalQuery: 'q', intent: 'search', keywords: [], filters: {}, targetDomains };
}

function stages(
  rule: IntentScores,
  semantic: Record<IntentType, number>,
  llm: LlmClassification | null = null,
  options: { mixed?: boolean; semanticMeets?: boolean } = {}
): StageResults {
  return {
    rule: {
      stage: 'rule',
      scores: rule,
      rawScores: { aggregate: 0, retrieval: 0, reminder: 0 },
      language: 'en',
      variants: [],
      matchedKeywords: [],
      isHighConfidence: false,
      isMixedQuery: options.mixed ?? false,
    },
    semantic: {
      stage: 'semantic',
      scores: semantic,
      threshold: 0.53,
      meetsThreshold: options.semanticMeets ?? false,
      margin: 0,
      topIntent: 'aggregate',
    },
    llm,
  };
}

const NO_SEMANTIC = { aggregate: 0, retrieval: 0, reminder: 0 };

describe('score fusion', () => {
  it('reads weights from config', () => {
    expect(fusionWeightsFromConfig()).toEqual(DEFAULT_FUSION_WEIGHTS);
  });

  it('penalizes data-bound intents when finance is targeted', () => {
    expect(dataAvailabilityPenalty(context(['finance_records']))).toBe(0.1);
    expect(dataAvailabilityPenalty(context(['journals']))).toBe(0);
  });

  it('weights rule and semantic scores and applies the penalty', () => {
    const fused = fuseScores(
      stages({ aggregate: 1, retrieval: 0.2 }, { aggregate: 0.6, retrieval: 0.1, reminder: 0 }),
      context(['finance_records'])
    );

    expect(fused.aggregate).toBeCloseTo(0.56);
    expect(fused.retrieval).toBeCloseTo(0.09);
    expect(fused.reminder).toBeUndefined();
  });

  it('adds the LLM verdict scaled by its confidence', () => {
    const llm: LlmClassification = {
      stage: 'llm',
      intent: 'reminder',
      confidence: 0.9,
      scores: { reminder: 0.9 },
      slots: {},
      source: 'llm',
    };
    const decision = makeDecision(stages({}, NO_SEMANTIC, llm), context(['journals']));

    expect(decision.fusedScores).toEqual({ reminder: expect.closeTo(0.27) });
    expect(decision.primaryIntent).toBe('reminder');
    expect(processingPathFor(decision)).toBe('retrieval');
  });

  it('routes to calculation when aggregate wins alone', () => {
    const decision = makeDecision(
      stages({ aggregate: 1, retrieval: 0.2 }, { aggregate: 0.6, retrieval: 0.1, reminder: 0 }),
      context(['finance_records'])
    );

    expect(decision.primaryIntent).toBe('aggregate');
    expect(decision.confidence).toBeCloseTo(0.56);
    expect(decision.hybrid).toBe(false);
    expect(processingPathFor(decision)).toBe('calculation');
  });

  it('goes hybrid when both data intents clear the threshold', () => {
    const decision = makeDecision(
      stages({ aggregate: 1, retrieval: 1 }, { aggregate: 0.5, retrieval: 0.5, reminder: 0 }),
      context(['journals'])
    );

    expect(decision.hybrid).toBe(true);
    expect(decision.isMixedQuery).toBe(false);
    expect(decision.primaryIntent).toBe('aggregate');
    expect(processingPathFor(decision)).toBe('hybrid');
  });

  it('goes hybrid for mixed queries regardless of scores', () => {
    const decision = makeDecision(stages({ aggregate: 0.2 }, NO_SEMANTIC, null, { mixed: true }), context([]));
    expect(processingPathFor(decision)).toBe('hybrid');
  });

  it('falls back to retrieval when nothing scores', () => {
    const decision = makeDecision(stages({}, NO_SEMANTIC), context([]));

    expect(decision.primaryIntent).toBe('retrieval');
    expect(decision.confidence).toBe(0.3);
    expect(decision.fusedScores).toEqual({});
  });
});

describe('spec builders', () => {
  it('collects calculation operations and grouping', () => {
    const specs = buildCalculationSpecs('What is my average spend by category?', context([]));
    expect(specs.operations).toEqual(['sum', 'average']);
    expect(specs.aggregations).toEqual(['sum', 'average']);
    expect(specs.groupBy).toEqual(['category']);
  });

  it('maps trends to a time-series aggregation', () => {
    const specs = buildCalculationSpecs('Show my spending trend by month', context([]));
    expect(specs.operations).toEqual(['sum', 'trend']);
    expect(specs.aggregations).toEqual(['sum', 'timeSeriesAverage']);
    expect(specs.groupBy).toEqual(['month']);
  });

  it('keeps a grouping-only request and defaults to sum otherwise', () => {
    expect(buildCalculationSpecs('Group my records', context([])).operations).toEqual(['grouping']);

    const fallback = buildCalculationSpecs('hello', context([]));
    expect(fallback.operations).toEqual(['sum']);
    expect(fallback.groupBy).toBeUndefined();
  });

  it('copies filters and time range from the context', () => {
    const query = 'How much did I spend on food this month?';
    const specs = buildCalculationSpecs(query, planner.plan(query));
    expect(specs.filters).toEqual({ category: FOOD_CATEGORIES });
    expect(specs.timeRange?.period).toBe('thisMonth');
  });

  it('picks the generation type and context size', () => {
    const advice = 'How should I improve my sleep?';
    expect(buildRetrievalSpecs(advice, planner.plan(advice))).toMatchObject({
      generationType: 'advisory',
      contextNeeds: 'extensive',
    });

    const why = 'Why am I always tired?';
    expect(buildRetrievalSpecs(why, planner.plan(why))).toEqual({
      searchTerms: ['always', 'tired'],
      contextNeeds: 'moderate',
      generationType: 'narrative',
      domainFocus: [...DOMAIN_NAMES],
    });

    const where = 'Where did I travel?';
    expect(buildRetrievalSpecs(where, planner.plan(where)).generationType).toBe('factual');
  });

  it('recognizes explanatory phrasing', () => {
    expect(isExplanatoryQuery('Tell me why my mood dropped')).toBe(true);
    expect(isExplanatoryQuery('List my meals')).toBe(false);
  });
});

describe('RequestRouter', () => {
  it('routes a spending question to calculation', async () => {
    const router = new RequestRouter(planner, new IntentClassifier(null, { useLlm: false }));

    const routing = await router.route('How much did I spend on food this month?');

    expect(routing.processingPath).toBe('calculation');
    expect(routing.decision.llm).toBeNull();
    expect(routing.decision.fusedScores.aggregate).toBeCloseTo(0.4 + (0.3 * 8) / 11 - 0.02);
    expect(routing.decision.fusedScores.retrieval).toBeCloseTo(0.08);
    expect(routing.confidence).toBeCloseTo(0.5982, 4);
    if (routing.processingPath === 'calculation') {
      expect(routing.calculationSpecs.operations).toEqual(['sum']);
    }
  });

  it('routes an explanatory question to retrieval', async () => {
    const router = new RequestRouter(planner, new IntentClassifier(null, { useLlm: false }));

    const routing = await router.route('Why am I always tired?');

    expect(routing.processingPath).toBe('retrieval');
    expect(routing.confidence).toBeCloseTo(0.38);
    if (routing.processingPath === 'retrieval') {
      expect(routing.retrievalSpecs.generationType).toBe('narrative');
    }
  });

  it('routes a number-and-advice question to hybrid', async () => {
    const router = new RequestRouter(planner, new IntentClassifier(null, { useLlm: false }));

    const routing = await router.route('How much did I spend and why, and what should I improve?');

    expect(routing.processingPath).toBe('hybrid');
    if (routing.processingPath === 'hybrid') {
      expect(routing.calculationSpecs.operations).toEqual(['sum']);
      expect(routing.retrievalSpecs.generationType).toBe('advisory');
      expect(routing.retrievalSpecs.domainFocus).toEqual(['finance_records']);
    }
  });

  it('asks the model when the heuristics are undecided', async () => {
    const chat = createFakeChat('{"intent":"reminder","confidence":0.9}');
    const router = new RequestRouter(planner, new IntentClassifier(chat, { useLlm: true }));

    const routing = await router.route('Remind me to drink water every day');

    expect(chat.calls).toHaveLength(1);
    expect(routing.decision.primaryIntent).toBe('reminder');
    expect(routing.confidence).toBeCloseTo(0.67);
    expect(routing.processingPath).toBe('retrieval');
  });
});
