/**
 * Embedding store contract
 *
 * Used by the RAG pipeline; implemented by the SQLite repository and by test fakes.
 */

export interface StoredEmbedding {
  id: string;
  objectType: string;
  objectId: string;
  chunkText: string;
  vector: number[];
  /** Timestamp of the owning record, used for date filtering */
  recordedAt?: Date;
  createdAt: Date;
}

export interface UpsertEmbeddingInput {
  id: string;
  objectType: string;
  objectId: string;
  chunkText: string;
  vector: number[];
  recordedAt?: Date;
}

export interface EmbeddingFilter {
  objectTypes?: readonly string[];
  startDate?: Date;
  endDate?: Date;
}

export interface FindSimilarOptions extends EmbeddingFilter {
  limit: number;
  threshold?: number;
}

export interface ScoredEmbedding {
  embedding: StoredEmbedding;
  similarity: number;
}

export interface EmbeddingStore {
  upsert(input: UpsertEmbeddingInput): Promise<void>;
  deleteByObject(objectType: string, objectId: string): Promise<number>;
  /** Best matches by cosine similarity, highest first */
  findSimilar(vector: readonly number[], options: FindSimilarOptions): Promise<ScoredEmbedding[]>;
  /** Rows whose chunk text contains any of the terms (case-insensitive) */
  searchByText(terms: readonly string[], options: EmbeddingFilter & { limit: number }): Promise<StoredEmbedding[]>;
  count(): Promise<number>;
}
