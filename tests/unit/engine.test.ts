import { describe, it, expect, vi } from 'vitest';
import { createDefaultQueryEngine, createQueryEngine, type QueryEngine } from '../../src/core/engine.js';
import { createDatabaseConnection } from '../../src/db/connection.js';
import { createEmbeddingsRepository } from '../../src/db/repositories/embeddings.js';
import type { ChatCompleter, Embedder, QueryPlanner } from '../../src/core/types.js';
import { InMemoryDataAccess, parseRecordsJson } from '../../src/services/domain/index.js';
import { EmbeddingService } from '../../src/services/embedding/index.js';
import { DefaultQueryPlanner } from '../../src/services/query/index.js';
import { toResponseText } from '../../src/services/processing/index.js';
import { FakeEmbedder, MemoryEmbeddingStore } from '../fixtures/fakes.js';
import { fixedClock, sampleRecords } from '../fixtures/records.js';

function createEngine(
  embedder: Embedder | null = new FakeEmbedder(),
  chat: ChatCompleter | null = null,
  planner: QueryPlanner = new DefaultQueryPlanner({ now: fixedClock })
): QueryEngine {
  return createQueryEngine({
    dataAccess: new InMemoryDataAccess(sampleRecords),
    store: new MemoryEmbeddingStore(),
    embedder,
    chat,
    planner,
    overrides: { classifier: { useLlm: false }, clock: () => 0 },
  });
}

describe('createQueryEngine', () => {
  it('answers a spending question by calculation', async () => {
    const engine = createEngine();
    await engine.rebuildEmbeddings();

    const result = await engine.routeAndProcess('How much did I spend on food this month?');

    expect(result.kind).toBe('calculation');
    if (result.kind !== 'calculation') return;
    expect(result.calculations).toEqual({ Total: 120.5 });
    expect(result.dataPoints.map((p) => p.id)).toEqual(['f1', 'f2']);
    expect(toResponseText(result).split('\n').slice(0, 3)).toEqual(['🤖 **AI Analysis**', '', '**Calculation Results:**']);
  });

  it('answers an explanatory question from the journals', async () => {
    const engine = createEngine();
    await engine.rebuildEmbeddings();

    const result = await engine.routeAndProcess('Why am I always tired?');

    expect(result.kind).toBe('retrieval');
    if (result.kind !== 'retrieval') return;
    expect(result.generationType).toBe('narrative');
    expect(result.sources.map((s) => s.id)).toEqual(['j1']);
    expect(result.confidence).toBeCloseTo(1 / Math.sqrt(3), 6);
    expect(result.response.startsWith('Based on your data, here\'s what I found regarding "Why am I always tired?"')).toBe(true);
  });

  it('combines numbers and context for a mixed question', async () => {
    const engine = createEngine();
    await engine.rebuildEmbeddings();

    const result = await engine.routeAndProcess('How much did I spend and why, and what should I improve?');

    expect(result.kind).toBe('hybrid');
    if (result.kind !== 'hybrid') return;
    expect(result.calculation.calculations).toEqual({ Total: 210.5 });
    expect(result.retrieval.generationType).toBe('advisory');
    expect(result.retrieval.sources.map((s) => s.id).sort()).toEqual(['f1', 'f2', 'f3', 'f5']);
    expect(result.retrieval.confidence).toBeCloseTo(1 / 3, 6);
    expect(result.confidence).toBeCloseTo((0.9 + 1 / 3) / 2, 6);
  });

  it('falls back to keyword search when the embedding provider is down', async () => {
    const backend = vi.fn(async (): Promise<number[][]> => {
      throw new Error('connection refused');
    });
    const embedder = new EmbeddingService(backend, {
      provider: 'openai',
      model: 'test-embedding',
      batchSize: 5,
      batchDelayMs: 0,
      cacheSize: 10,
    });
    const engine = createEngine(embedder);

    expect(await engine.rebuildEmbeddings()).toEqual({ skipped: false, total: 12, ingested: 12, failed: 0 });

    const result = await engine.routeAndProcess('Why am I always tired?');

    expect(result.kind).toBe('retrieval');
    if (result.kind !== 'retrieval') return;
    expect(result.sources.map((s) => [s.id, s.relevanceScore])).toEqual([['j1', 0.5]]);
  });

  it('returns an apologetic result when routing fails', async () => {
    const planner: QueryPlanner = {
      plan: () => {
        throw new Error('planner offline');
      },
    };
    const engine = createEngine(null, null, planner);

    const result = await engine.routeAndProcess('anything');

    expect(result).toEqual({
      kind: 'retrieval',
      query: 'anything',
      processingTimeMs: 0,
      confidence: 0,
      response: 'Sorry, I encountered an error while processing your request: planner offline',
      sources: [],
      generationType: 'factual',
    });
  });

  it('shares the embedding status with the pipeline', async () => {
    const engine = createEngine();
    expect(engine.embeddingStatus.current).toBe('not_started');

    await engine.rebuildEmbeddings();
    expect(engine.embeddingStatus.current).toBe('complete');
    expect(engine.rag.status).toBe(engine.embeddingStatus);
  });
});

describe('createDefaultQueryEngine', () => {
  it('indexes records into SQLite and searches them by keyword', async () => {
    const { engine, close } = createDefaultQueryEngine(sampleRecords, { dbPath: ':memory:' });
    try {
      expect(await engine.rebuildEmbeddings()).toEqual({ skipped: false, total: 12, ingested: 12, failed: 0 });

      const results = await engine.rag.search('tired again');
      expect(results.map((r) => [r.objectId, r.similarity])).toEqual([['j1', 1]]);
    } finally {
      close();
    }
  });
});

describe('reloading a records file without ids', () => {
  it('replaces the stored chunks instead of duplicating them', async () => {
    const json = JSON.stringify([
      { domain: 'journals', timestamp: '2026-03-11T22:00:00Z', data: { content: 'Felt tired after staying up late again' } },
      { domain: 'journals', timestamp: '2026-03-14T21:00:00Z', data: { content: 'Great run in the park' } },
    ]);
    const connection = createDatabaseConnection({ dbPath: ':memory:' });
    const store = createEmbeddingsRepository({ db: connection.db });
    const load = (): QueryEngine =>
      createQueryEngine({
        dataAccess: new InMemoryDataAccess(parseRecordsJson(json)),
        store,
        embedder: null,
        chat: null,
        overrides: { classifier: { useLlm: false }, clock: () => 0 },
      });

    try {
      await load().rebuildEmbeddings();
      const stored = await store.count();
      const engine = load();
      await engine.rebuildEmbeddings();

      expect(await store.count()).toBe(stored);
      const results = await engine.rag.search('tired');
      expect(results).toHaveLength(1);
    } finally {
      connection.close();
    }
  });
});
