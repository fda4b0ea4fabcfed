import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createDatabaseConnection, type DatabaseConnection } from '../../src/db/connection.js';
import { createEmbeddingsRepository } from '../../src/db/repositories/embeddings.js';
import type { EmbeddingStore } from '../../src/core/interfaces/embedding-store.js';

describe('embeddings repository', () => {
  let connection: DatabaseConnection;
  let repo: EmbeddingStore;

  beforeEach(async () => {
    connection = createDatabaseConnection({ dbPath: ':memory:' });
    repo = createEmbeddingsRepository({ db: connection.db });

    await repo.upsert({
      id: 'journals:j1:0',
      objectType: 'journals',
      objectId: 'j1',
      chunkText: 'Felt tired after staying up late again',
      vector: [1, 0, 0],
      recordedAt: new Date('2026-03-11T22:00:00Z'),
    });
    await repo.upsert({
      id: 'journals:j2:0',
      objectType: 'journals',
      objectId: 'j2',
      chunkText: 'Great run in the park',
      vector: [0.6, 0.8, 0],
      recordedAt: new Date('2026-03-14T21:00:00Z'),
    });
    await repo.upsert({
      id: 'finance_records:f2:0',
      objectType: 'finance_records',
      objectId: 'f2',
      chunkText: 'Weekly groceries',
      vector: [0, 0, 1],
      recordedAt: new Date('2026-03-10T10:00:00Z'),
    });
  });

  afterEach(() => {
    connection.close();
  });

  it('counts stored rows', async () => {
    expect(await repo.count()).toBe(3);
  });

  it('ranks by cosine similarity and applies the threshold', async () => {
    const results = await repo.findSimilar([1, 0, 0], { limit: 5, threshold: 0.1 });

    expect(results.map((r) => r.embedding.objectId)).toEqual(['j1', 'j2']);
    expect(results[0]?.similarity).toBeCloseTo(1);
    expect(results[1]?.similarity).toBeCloseTo(0.6);
  });

  it('round-trips vectors and record timestamps', async () => {
    const [top] = await repo.findSimilar([0, 0, 1], { limit: 1 });
    expect(top?.embedding.vector).toEqual([0, 0, 1]);
    expect(top?.embedding.recordedAt?.toISOString()).toBe('2026-03-10T10:00:00.000Z');
  });

  it('scores rows of another dimension as 0', async () => {
    await repo.upsert({
      id: 'journals:j3:0',
      objectType: 'journals',
      objectId: 'j3',
      chunkText: 'Legacy row',
      vector: [],
    });

    const results = await repo.findSimilar([1, 0, 0], { limit: 5, threshold: 0.1 });
    expect(results.map((r) => r.embedding.objectId)).toEqual(['j1', 'j2']);
    expect(results[0]?.similarity).toBe(1);

    const unfiltered = await repo.findSimilar([1, 0, 0], { limit: 5, objectTypes: ['journals'] });
    expect(unfiltered.find((r) => r.embedding.objectId === 'j3')?.similarity).toBe(0);
  });

  it('filters by object type and date', async () => {
    const byType = await repo.findSimilar([1, 1, 1], { limit: 5, objectTypes: ['finance_records'] });
    expect(byType.map((r) => r.embedding.objectId)).toEqual(['f2']);

    const byDate = await repo.findSimilar([1, 1, 1], {
      limit: 5,
      startDate: new Date('2026-03-12T00:00:00Z'),
    });
    expect(byDate.map((r) => r.embedding.objectId)).toEqual(['j2']);
  });

  it('matches text case-insensitively', async () => {
    const rows = await repo.searchByText(['TIRED', 'groceries'], { limit: 10 });
    expect(rows.map((r) => r.objectId).sort()).toEqual(['f2', 'j1']);
  });

  it('returns nothing for an empty term list', async () => {
    expect(await repo.searchByText([], { limit: 10 })).toEqual([]);
  });

  it('replaces a row on upsert with the same id', async () => {
    await repo.upsert({
      id: 'journals:j1:0',
      objectType: 'journals',
      objectId: 'j1',
      chunkText: 'Slept well for once',
      vector: [0, 1, 0],
    });

    expect(await repo.count()).toBe(3);
    const rows = await repo.searchByText(['slept'], { limit: 10 });
    expect(rows).toHaveLength(1);
    expect(rows[0]?.recordedAt).toBeUndefined();
  });

  it('deletes every chunk of a record', async () => {
    expect(await repo.deleteByObject('journals', 'j1')).toBe(1);
    expect(await repo.deleteByObject('journals', 'j1')).toBe(0);
    expect(await repo.count()).toBe(2);
  });
});
