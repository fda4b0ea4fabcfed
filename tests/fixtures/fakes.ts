import { vi } from 'vitest';
import type { ChatCompleter, ChatMessage, ChatOptions, Embedder } from '../../src/core/types.js';
import type {
  EmbeddingFilter,
  EmbeddingStore,
  FindSimilarOptions,
  ScoredEmbedding,
  StoredEmbedding,
  UpsertEmbeddingInput,
} from '../../src/core/interfaces/embedding-store.js';
import { cosineSimilarity } from '../../src/utils/vector.js';

/** Words the bag-of-words embedder knows; one vector slot each */
export const VOCABULARY = [
  'tired',
  'sleep',
  'energy',
  'food',
  'groceries',
  'takeout',
  'salary',
  'taxi',
  'dinner',
  'journal',
  'spending',
  'offsite',
] as const;

/**
 * 1 for each vocabulary word present in the text, 0 otherwise
 */
export function bagOfWords(text: string): number[] {
  const lower = text.toLowerCase();
  return VOCABULARY.map((word) => (lower.includes(word) ? 1 : 0));
}

export class FakeEmbedder implements Embedder {
  readonly dimension = VOCABULARY.length;
  readonly calls: string[][] = [];

  async embed(texts: string[]): Promise<number[][]> {
    this.calls.push(texts);
    return texts.map(bagOfWords);
  }
}

export class FailingEmbedder implements Embedder {
  readonly dimension = VOCABULARY.length;

  async embed(): Promise<number[][]> {
    throw new Error('embedding server unreachable');
  }
}

export interface FakeChat extends ChatCompleter {
  calls: Array<{ messages: ChatMessage[]; options?: ChatOptions }>;
}

/**
 * Chat completer answering every call with `reply`
 */
export function createFakeChat(reply: string | ((messages: ChatMessage[]) => string)): FakeChat {
  const calls: FakeChat['calls'] = [];
  return {
    calls,
    chat: vi.fn(async (messages: ChatMessage[], options?: ChatOptions) => {
      calls.push({ messages, options });
      return typeof reply === 'string' ? reply : reply(messages);
    }),
  };
}

export function createFailingChat(message = 'model not loaded'): ChatCompleter {
  return {
    chat: vi.fn(async () => {
      throw new Error(message);
    }),
  };
}

function matchesFilter(row: StoredEmbedding, filter: EmbeddingFilter): boolean {
  if (filter.objectTypes && filter.objectTypes.length > 0 && !filter.objectTypes.includes(row.objectType)) {
    return false;
  }
  const recorded = row.recordedAt?.getTime();
  if (filter.startDate && (recorded === undefined || recorded < filter.startDate.getTime())) return false;
  if (filter.endDate && (recorded === undefined || recorded > filter.endDate.getTime())) return false;
  return true;
}

/**
 * Map-backed EmbeddingStore
 */
export class MemoryEmbeddingStore implements EmbeddingStore {
  readonly rows = new Map<string, StoredEmbedding>();

  async upsert(input: UpsertEmbeddingInput): Promise<void> {
    const existing = this.rows.get(input.id);
    this.rows.set(input.id, { ...input, createdAt: existing?.createdAt ?? new Date() });
  }

  async deleteByObject(objectType: string, objectId: string): Promise<number> {
    let removed = 0;
    for (const [id, row] of this.rows) {
      if (row.objectType === objectType && row.objectId === objectId) {
        this.rows.delete(id);
        removed++;
      }
    }
    return removed;
  }

  async findSimilar(vector: readonly number[], options: FindSimilarOptions): Promise<ScoredEmbedding[]> {
    const threshold = options.threshold ?? 0;
    return [...this.rows.values()]
      .filter((row) => matchesFilter(row, options))
      .map((embedding) => ({ embedding, similarity: cosineSimilarity(vector, embedding.vector) }))
      .filter((scored) => scored.similarity >= threshold)
      .sort((a, b) => b.similarity - a.similarity)
      .slice(0, options.limit);
  }

  async searchByText(
    terms: readonly string[],
    options: EmbeddingFilter & { limit: number }
  ): Promise<StoredEmbedding[]> {
    return [...this.rows.values()]
      .filter((row) => matchesFilter(row, options))
      .filter((row) => terms.some((term) => row.chunkText.toLowerCase().includes(term.toLowerCase())))
      .slice(0, options.limit);
  }

  async count(): Promise<number> {
    return this.rows.size;
  }
}
