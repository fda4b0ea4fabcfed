import { describe, it, expect, vi } from 'vitest';
import { EmbeddingService, getEmbeddingDimension } from '../../src/services/embedding/index.js';

const serviceConfig = {
  provider: 'openai' as const,
  model: 'test-embedding',
  batchSize: 2,
  batchDelayMs: 0,
  cacheSize: 10,
};

function lengthBackend() {
  return vi.fn(async (texts: string[]) => texts.map((text) => [text.length, 1]));
}

describe('EmbeddingService', () => {
  it('embeds in batches and keeps input order', async () => {
    const backend = lengthBackend();
    const service = new EmbeddingService(backend, serviceConfig);

    const vectors = await service.embed(['a', 'bb', 'ccc']);

    expect(vectors).toEqual([
      [1, 1],
      [2, 1],
      [3, 1],
    ]);
    expect(backend).toHaveBeenCalledTimes(2);
    expect(backend).toHaveBeenNthCalledWith(1, ['a', 'bb']);
    expect(backend).toHaveBeenNthCalledWith(2, ['ccc']);
  });

  it('serves repeated texts from the cache', async () => {
    const backend = lengthBackend();
    const service = new EmbeddingService(backend, serviceConfig);

    await service.embed(['a', 'bb']);
    const again = await service.embed(['bb', 'dddd']);

    expect(again).toEqual([
      [2, 1],
      [4, 1],
    ]);
    expect(backend).toHaveBeenLastCalledWith(['dddd']);
    expect(service.getCacheSize()).toBe(3);

    service.clearCache();
    expect(service.getCacheSize()).toBe(0);
  });

  it('substitutes zero vectors when the provider fails', async () => {
    const backend = vi.fn(async (): Promise<number[][]> => {
      throw new Error('ECONNREFUSED');
    });
    const service = new EmbeddingService(backend, serviceConfig);

    const vectors = await service.embed(['a', 'bb', 'ccc']);

    expect(vectors).toHaveLength(3);
    expect(vectors[0]).toHaveLength(1536);
    expect(vectors.every((v) => v.every((x) => x === 0))).toBe(true);
  });

  it('treats a short response as a failed batch', async () => {
    const backend = vi.fn(async () => [[9, 9]]);
    const service = new EmbeddingService(backend, { ...serviceConfig, model: 'nomic-embed-text' });

    const vectors = await service.embed(['a', 'bb']);

    expect(vectors.map((v) => v.length)).toEqual([768, 768]);
    expect(service.getCacheSize()).toBe(0);
  });

  it('trims text for a single embedding and rejects empty text', async () => {
    const backend = lengthBackend();
    const service = new EmbeddingService(backend, serviceConfig);

    expect(await service.embedOne('  hi ')).toEqual([2, 1]);
    await expect(service.embedOne('   ')).rejects.toThrow('Cannot embed empty text');
  });

  it('refuses to embed when disabled', async () => {
    const service = new EmbeddingService(null, { ...serviceConfig, provider: 'disabled' });

    expect(service.isAvailable()).toBe(false);
    expect(service.dimension).toBe(0);
    await expect(service.embed(['a'])).rejects.toThrow('Embeddings are disabled');
  });

  it('follows the configured provider by default', () => {
    const service = new EmbeddingService(lengthBackend());
    expect(service.getProvider()).toBe('disabled');
    expect(service.isAvailable()).toBe(false);
  });
});

describe('getEmbeddingDimension', () => {
  it('knows nomic, ollama and OpenAI-style widths', () => {
    expect(getEmbeddingDimension('lmstudio', 'text-embedding-nomic-embed-text-v1.5')).toBe(768);
    expect(getEmbeddingDimension('ollama', 'mxbai-embed-large')).toBe(768);
    expect(getEmbeddingDimension('openai', 'text-embedding-3-small')).toBe(1536);
    expect(getEmbeddingDimension('disabled', 'anything')).toBe(0);
  });
});
