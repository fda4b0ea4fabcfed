/**
 * Embeddings repository
 *
 * SQLite-backed EmbeddingStore. Candidate rows are filtered in SQL, then ranked
 * by cosine similarity in process.
 */

import { and, desc, eq, gte, inArray, like, lte, or, sql, type SQL } from 'drizzle-orm';
import { embeddings, type EmbeddingRow } from '../schema.js';
import { now, type DatabaseDeps } from './base.js';
import type {
  EmbeddingFilter,
  EmbeddingStore,
  FindSimilarOptions,
  ScoredEmbedding,
  StoredEmbedding,
  UpsertEmbeddingInput,
} from '../../core/interfaces/embedding-store.js';
import { config } from '../../config/index.js';
import { createComponentLogger } from '../../utils/logger.js';
import { cosineSimilarity, decodeVector, encodeVector } from '../../utils/vector.js';

const logger = createComponentLogger('embeddings-repo');

export interface EmbeddingsRepositoryDeps extends DatabaseDeps {
  /** Maximum rows ranked per similarity search */
  scanLimit?: number;
}

function toStoredEmbedding(row: EmbeddingRow): StoredEmbedding {
  return {
    id: row.id,
    objectType: row.objectType,
    objectId: row.objectId,
    chunkText: row.chunkText,
    vector: decodeVector(row.vector),
    recordedAt: row.recordedAt ? new Date(row.recordedAt) : undefined,
    createdAt: new Date(row.createdAt),
  };
}

function buildConditions(filter: EmbeddingFilter): SQL[] {
  const conditions: SQL[] = [];
  if (filter.objectTypes && filter.objectTypes.length > 0) {
    conditions.push(inArray(embeddings.objectType, [...filter.objectTypes]));
  }
  if (filter.startDate) {
    conditions.push(gte(embeddings.recordedAt, filter.startDate.toISOString()));
  }
  if (filter.endDate) {
    conditions.push(lte(embeddings.recordedAt, filter.endDate.toISOString()));
  }
  return conditions;
}

/**
 * Create an embeddings repository with injected database dependency
 */
export function createEmbeddingsRepository(deps: EmbeddingsRepositoryDeps): EmbeddingStore {
  const { db } = deps;
  const scanLimit = deps.scanLimit ?? config.rag.scanLimit;

  return {
    async upsert(input: UpsertEmbeddingInput): Promise<void> {
      const values = {
        objectType: input.objectType,
        objectId: input.objectId,
        chunkText: input.chunkText,
        vector: encodeVector(input.vector),
        recordedAt: input.recordedAt?.toISOString() ?? null,
      };

      db.insert(embeddings)
        .values({ id: input.id, ...values, createdAt: now() })
        .onConflictDoUpdate({ target: embeddings.id, set: values })
        .run();
    },

    async deleteByObject(objectType: string, objectId: string): Promise<number> {
      const result = db
        .delete(embeddings)
        .where(and(eq(embeddings.objectType, objectType), eq(embeddings.objectId, objectId)))
        .run();
      return result.changes;
    },

    async findSimilar(vector: readonly number[], options: FindSimilarOptions): Promise<ScoredEmbedding[]> {
      const rows = db
        .select()
        .from(embeddings)
        .where(and(...buildConditions(options)))
        .orderBy(desc(embeddings.createdAt))
        .limit(scanLimit)
        .all();

      const threshold = options.threshold ?? 0;
      const scored = rows.map((row) => {
        const embedding = toStoredEmbedding(row);
        return { embedding, similarity: cosineSimilarity(vector, embedding.vector) };
      });

      const mismatched = scored.filter(({ embedding }) => embedding.vector.length !== vector.length).length;
      if (mismatched > 0) {
        logger.warn(
          { mismatched, scanned: rows.length, queryDimension: vector.length },
          'Stored vectors with a different dimension scored 0'
        );
      }

      return scored
        .filter((item) => item.similarity >= threshold)
        .sort((a, b) => b.similarity - a.similarity)
        .slice(0, options.limit);
    },

    async searchByText(
      terms: readonly string[],
      options: EmbeddingFilter & { limit: number }
    ): Promise<StoredEmbedding[]> {
      if (terms.length === 0) return [];

      // LIKE is case-insensitive for ASCII in SQLite
      const textMatch = or(...terms.map((term) => like(embeddings.chunkText, `%${term}%`)));
      const rows = db
        .select()
        .from(embeddings)
        .where(and(textMatch, ...buildConditions(options)))
        .orderBy(desc(embeddings.createdAt))
        .limit(options.limit)
        .all();

      return rows.map(toStoredEmbedding);
    },

    async count(): Promise<number> {
      const row = db
        .select({ count: sql<number>`count(*)` })
        .from(embeddings)
        .get();
      return row?.count ?? 0;
    },
  };
}
