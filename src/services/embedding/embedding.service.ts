/**
 * Embedding service
 *
 * Batches texts to the provider, caches vectors per text, and substitutes
 * zero vectors for batches the provider rejects.
 */

import { createComponentLogger } from '../../utils/logger.js';
import { LRUCache } from '../../utils/lru-cache.js';
import { config } from '../../config/index.js';
import {
  createEmbeddingDisabledError,
  createEmbeddingEmptyTextError,
  createEmbeddingError,
  getErrorMessage,
} from '../../core/errors.js';
import type { Embedder } from '../../core/types.js';
import type { EmbeddingBackend } from '../llm/adapters.js';

const logger = createComponentLogger('embedding');

export type EmbeddingProvider = 'lmstudio' | 'ollama' | 'openai' | 'disabled';

export interface EmbeddingServiceConfig {
  provider: EmbeddingProvider;
  model: string;
  batchSize: number;
  batchDelayMs: number;
  cacheSize: number;
}

export function embeddingConfigFromEnv(): EmbeddingServiceConfig {
  return {
    provider: config.embedding.provider,
    model: config.embedding.model,
    batchSize: config.embedding.batchSize,
    batchDelayMs: config.embedding.batchDelayMs,
    cacheSize: config.embedding.cacheSize,
  };
}

/**
 * Vector width for a provider/model pair: nomic-family models produce 768, OpenAI-style 1536.
 */
export function getEmbeddingDimension(provider: EmbeddingProvider, model: string): number {
  if (provider === 'disabled') return 0;
  if (provider === 'ollama' || model.toLowerCase().includes('nomic')) return 768;
  return 1536;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class EmbeddingService implements Embedder {
  private readonly serviceConfig: EmbeddingServiceConfig;
  private readonly backend: EmbeddingBackend | null;
  private readonly cache: LRUCache<number[]>;

  constructor(backend: EmbeddingBackend | null, serviceConfig: Partial<EmbeddingServiceConfig> = {}) {
    this.serviceConfig = { ...embeddingConfigFromEnv(), ...serviceConfig };
    this.backend = backend;
    this.cache = new LRUCache<number[]>({ maxSize: this.serviceConfig.cacheSize });
  }

  get dimension(): number {
    return getEmbeddingDimension(this.serviceConfig.provider, this.serviceConfig.model);
  }

  getProvider(): EmbeddingProvider {
    return this.serviceConfig.provider;
  }

  isAvailable(): boolean {
    return this.serviceConfig.provider !== 'disabled' && this.backend !== null;
  }

  /**
   * Embed one text. Empty text is rejected.
   */
  async embedOne(text: string): Promise<number[]> {
    const normalized = text.trim();
    if (!normalized) {
      throw createEmbeddingEmptyTextError();
    }
    const [vector] = await this.embed([normalized]);
    return vector ?? new Array<number>(this.dimension).fill(0);
  }

  /**
   * Embed texts in sequential batches. A failed batch yields zero vectors
   * so the output always lines up with the input.
   */
  async embed(texts: string[]): Promise<number[][]> {
    const backend = this.backend;
    if (this.serviceConfig.provider === 'disabled' || !backend) {
      throw createEmbeddingDisabledError();
    }

    const { batchSize, batchDelayMs } = this.serviceConfig;
    const results: number[][] = [];

    for (let offset = 0; offset < texts.length; offset += batchSize) {
      if (offset > 0 && batchDelayMs > 0) {
        await sleep(batchDelayMs);
      }
      const batch = texts.slice(offset, offset + batchSize);
      results.push(...(await this.embedBatch(backend, batch)));
    }

    return results;
  }

  private async embedBatch(backend: EmbeddingBackend, batch: string[]): Promise<number[][]> {
    const vectors = batch.map((text) => this.cache.get(text));
    const missing = batch.filter((_, i) => vectors[i] === undefined);
    if (missing.length === 0) {
      return vectors.map((v) => v ?? this.zeroVector());
    }

    let fetched: number[][];
    try {
      fetched = await backend(missing);
      if (fetched.length !== missing.length) {
        throw createEmbeddingError(`expected ${missing.length} vectors, got ${fetched.length}`);
      }
    } catch (error) {
      logger.warn({ error: getErrorMessage(error), batchSize: batch.length }, 'Embedding batch failed, using zero vectors');
      return batch.map((_, i) => vectors[i] ?? this.zeroVector());
    }

    let next = 0;
    return batch.map((text, i) => {
      const cached = vectors[i];
      if (cached) return cached;
      const vector = fetched[next++] ?? this.zeroVector();
      this.cache.set(text, vector);
      return vector;
    });
  }

  private zeroVector(): number[] {
    return new Array<number>(this.dimension).fill(0);
  }

  clearCache(): void {
    this.cache.clear();
  }

  getCacheSize(): number {
    return this.cache.size;
  }
}
