/**
 * RAG pipeline
 *
 * ingest: record -> searchable text -> chunks -> vectors -> embedding store
 * search: query vector -> store candidates -> cosine re-rank
 * answer: search -> context -> prompt -> chat model, with a deterministic fallback
 */

import { createComponentLogger } from '../../utils/logger.js';
import { cosineSimilarity } from '../../utils/vector.js';
import { extractKeywords } from '../../utils/text.js';
import { config } from '../../config/index.js';
import { getErrorMessage } from '../../core/errors.js';
import {
  DOMAIN_NAMES,
  type ChatCompleter,
  type DomainDataAccess,
  type DomainRecord,
  type Embedder,
} from '../../core/types.js';
import type { EmbeddingStore, StoredEmbedding } from '../../core/interfaces/embedding-store.js';
import { ChunkingService } from '../chunking/chunking.service.js';
import { EmbeddingStatus } from '../embedding/status.js';
import { buildSearchableText } from './searchable-text.js';
import { buildContext, buildFallbackAnswer, buildPrompt, noDataMessage } from './prompt.js';
import type {
  AnswerOptions,
  GeneratedAnswer,
  RagOptions,
  RebuildProgressCallback,
  RebuildResult,
  SearchOptions,
  SearchResult,
} from './types.js';

const logger = createComponentLogger('rag');

const ANSWER_TEMPERATURE = 0.7;
const PROGRESS_LOG_INTERVAL = 10;

export function ragConfigFromEnv(): RagOptions {
  return {
    chunkMaxTokens: config.rag.chunkMaxTokens,
    chunkOverlapTokens: config.rag.chunkOverlapTokens,
    minScore: config.rag.minScore,
    answerLimit: config.rag.answerLimit,
    contextBudgetChars: config.rag.contextBudgetChars,
    scanLimit: config.rag.scanLimit,
  };
}

export interface RagPipelineDeps {
  store: EmbeddingStore;
  dataAccess: DomainDataAccess;
  /** Null when embeddings are disabled; search then uses the lexical fallback */
  embedder: Embedder | null;
  chat: ChatCompleter | null;
  status?: EmbeddingStatus;
  options?: Partial<RagOptions>;
}

function chunkId(recordId: string, index: number): string {
  return `${recordId}_chunk_${index}`;
}

function toSearchResult(embedding: StoredEmbedding, similarity: number): SearchResult {
  return {
    embeddingId: embedding.id,
    chunkText: embedding.chunkText,
    objectType: embedding.objectType,
    objectId: embedding.objectId,
    similarity,
  };
}

function isUsableVector(vector: readonly number[] | undefined): vector is number[] {
  return vector !== undefined && vector.some((value) => value !== 0);
}

export class RagPipeline {
  private readonly store: EmbeddingStore;
  private readonly dataAccess: DomainDataAccess;
  private readonly embedder: Embedder | null;
  private readonly chat: ChatCompleter | null;
  private readonly chunker: ChunkingService;
  private readonly options: RagOptions;
  readonly status: EmbeddingStatus;

  constructor(deps: RagPipelineDeps) {
    this.store = deps.store;
    this.dataAccess = deps.dataAccess;
    this.embedder = deps.embedder;
    this.chat = deps.chat;
    this.status = deps.status ?? new EmbeddingStatus();
    this.options = { ...ragConfigFromEnv(), ...deps.options };
    this.chunker = new ChunkingService({
      maxTokens: this.options.chunkMaxTokens,
      overlapTokens: this.options.chunkOverlapTokens,
    });
  }

  /**
   * Embed and store one record, replacing its previous chunks.
   * Returns the number of chunks stored; failures are logged and yield 0.
   */
  async ingest(record: DomainRecord): Promise<number> {
    try {
      return await this.ingestOrThrow(record);
    } catch (error) {
      logger.warn({ recordId: record.id, domain: record.domain, error: getErrorMessage(error) }, 'Failed to ingest record');
      return 0;
    }
  }

  private async ingestOrThrow(record: DomainRecord): Promise<number> {
    const text = buildSearchableText(record);
    const chunks = this.chunker.chunk(text);
    if (chunks.length === 0) return 0;

    const vectors = this.embedder ? await this.embedder.embed(chunks) : chunks.map(() => []);

    await this.store.deleteByObject(record.domain, record.id);
    for (const [i, chunkText] of chunks.entries()) {
      await this.store.upsert({
        id: chunkId(record.id, i),
        objectType: record.domain,
        objectId: record.id,
        chunkText,
        vector: vectors[i] ?? [],
        recordedAt: record.timestamp,
      });
    }

    logger.debug({ recordId: record.id, chunks: chunks.length }, 'Ingested record');
    return chunks.length;
  }

  async search(query: string, options: SearchOptions = {}): Promise<SearchResult[]> {
    const limit = options.limit ?? this.options.answerLimit;
    const minScore = options.minScore ?? this.options.minScore;

    const queryVector = await this.embedQuery(query);
    if (!queryVector) {
      return this.lexicalSearch(query, options, limit, minScore);
    }

    const candidates = await this.store.findSimilar(queryVector, {
      objectTypes: options.objectTypes,
      startDate: options.startDate,
      endDate: options.endDate,
      limit: limit * 2,
      threshold: minScore,
    });

    return candidates
      .map(({ embedding }) => toSearchResult(embedding, cosineSimilarity(queryVector, embedding.vector)))
      .filter((result) => result.similarity >= minScore)
      .sort((a, b) => b.similarity - a.similarity)
      .slice(0, limit);
  }

  /**
   * Query vector, or null when the embedder is missing, fails, or returns a zero vector.
   */
  private async embedQuery(query: string): Promise<number[] | null> {
    if (!this.embedder || !query.trim()) return null;
    try {
      const [vector] = await this.embedder.embed([query]);
      if (isUsableVector(vector)) return vector;
      logger.warn('Query embedding is empty, using text search');
    } catch (error) {
      logger.warn({ error: getErrorMessage(error) }, 'Query embedding failed, using text search');
    }
    return null;
  }

  /**
   * Keyword search over stored chunk text; score is the fraction of query keywords present.
   */
  private async lexicalSearch(
    query: string,
    options: SearchOptions,
    limit: number,
    minScore: number
  ): Promise<SearchResult[]> {
    const terms = extractKeywords(query);
    if (terms.length === 0) return [];

    const rows = await this.store.searchByText(terms, {
      objectTypes: options.objectTypes,
      startDate: options.startDate,
      endDate: options.endDate,
      limit: this.options.scanLimit,
    });

    return rows
      .map((row) => {
        const text = row.chunkText.toLowerCase();
        const hits = terms.filter((term) => text.includes(term)).length;
        return toSearchResult(row, hits / terms.length);
      })
      .filter((result) => result.similarity > 0 && result.similarity >= minScore)
      .sort((a, b) => b.similarity - a.similarity)
      .slice(0, limit);
  }

  async generateAnswer(query: string, options: AnswerOptions = {}): Promise<GeneratedAnswer> {
    const results = await this.search(query, { ...options.filters, limit: this.options.answerLimit });
    if (results.length === 0) {
      return { text: noDataMessage(query), source: 'no_data', results };
    }

    const fallback = (): GeneratedAnswer => ({
      text: buildFallbackAnswer(query, results),
      source: 'fallback',
      results,
    });

    if (!this.chat) return fallback();

    const context = buildContext(results, this.options.contextBudgetChars);
    const prompt = buildPrompt(query, context, options.calculationSummary, options.promptTemplates);

    try {
      const reply = await this.chat.chat([{ role: 'user', content: prompt }], {
        temperature: ANSWER_TEMPERATURE,
      });
      if (!reply.trim()) {
        logger.warn('Chat model returned an empty reply, using fallback answer');
        return fallback();
      }
      return { text: reply, source: 'llm', results };
    } catch (error) {
      logger.warn({ error: getErrorMessage(error) }, 'Chat model failed, using fallback answer');
      return fallback();
    }
  }

  async answer(query: string, options: AnswerOptions = {}): Promise<string> {
    const { text } = await this.generateAnswer(query, options);
    return text;
  }

  /**
   * Re-ingest every record of every domain. Skipped when a rebuild is already running.
   */
  async rebuildEmbeddings(onProgress?: RebuildProgressCallback): Promise<RebuildResult> {
    if (!this.status.start()) {
      logger.info('Embedding rebuild already in progress, skipping');
      return { skipped: true, total: 0, ingested: 0, failed: 0 };
    }

    try {
      const records: DomainRecord[] = [];
      for (const domain of DOMAIN_NAMES) {
        records.push(...(await this.dataAccess.getRecords(domain)));
      }

      const total = records.length;
      let ingested = 0;
      let failed = 0;

      for (const [i, record] of records.entries()) {
        try {
          await this.ingestOrThrow(record);
          ingested++;
        } catch (error) {
          failed++;
          logger.warn({ recordId: record.id, error: getErrorMessage(error) }, 'Failed to embed record');
        }

        onProgress?.(i + 1, total);
        if ((i + 1) % PROGRESS_LOG_INTERVAL === 0) {
          logger.info({ current: i + 1, total }, 'Embedding rebuild progress');
        }
      }

      this.status.complete();
      logger.info({ total, ingested, failed }, 'Embedding rebuild complete');
      return { skipped: false, total, ingested, failed };
    } catch (error) {
      this.status.reset();
      throw error;
    }
  }
}

export function createRagPipeline(deps: RagPipelineDeps): RagPipeline {
  return new RagPipeline(deps);
}
