/**
 * Embedding Configuration Section
 */

import { z } from 'zod';
import type { ConfigSectionMeta } from '../types.js';

export const embeddingSection = {
  name: 'embedding',
  description: 'Embedding provider configuration.',
  options: {
    provider: {
      envKey: 'LIFEQ_EMBEDDING_PROVIDER',
      defaultValue: 'lmstudio',
      description: 'Embedding provider: lmstudio, ollama, openai, or disabled.',
      schema: z.enum(['lmstudio', 'ollama', 'openai', 'disabled']),
      allowedValues: ['lmstudio', 'ollama', 'openai', 'disabled'],
    },
    baseUrl: {
      envKey: 'LIFEQ_EMBEDDING_BASE_URL',
      defaultValue: 'http://localhost:1234/v1',
      description: 'OpenAI-compatible embeddings endpoint.',
      schema: z.string().url(),
    },
    model: {
      envKey: 'LIFEQ_EMBEDDING_MODEL',
      defaultValue: 'text-embedding-nomic-embed-text-v1.5',
      description: 'Embedding model name.',
      schema: z.string().min(1),
    },
    apiKey: {
      envKey: 'LIFEQ_EMBEDDING_API_KEY',
      defaultValue: 'not-needed',
      description: 'API key for the embeddings endpoint (local servers ignore it).',
      schema: z.string(),
      sensitive: true,
    },
    batchSize: {
      envKey: 'LIFEQ_EMBEDDING_BATCH_SIZE',
      defaultValue: 5,
      description: 'Texts sent per embedding request.',
      schema: z.number().int().min(1),
    },
    batchDelayMs: {
      envKey: 'LIFEQ_EMBEDDING_BATCH_DELAY_MS',
      defaultValue: 100,
      description: 'Pause between embedding batches in milliseconds.',
      schema: z.number().int().min(0),
    },
    cacheSize: {
      envKey: 'LIFEQ_EMBEDDING_CACHE_SIZE',
      defaultValue: 1000,
      description: 'Maximum cached text embeddings.',
      schema: z.number().int().min(0),
    },
  },
} satisfies ConfigSectionMeta;
