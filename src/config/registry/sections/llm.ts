/**
 * LLM Configuration Section
 *
 * Chat model used for answers, synthesis and intent classification.
 */

import { z } from 'zod';
import type { ConfigSectionMeta } from '../types.js';

export const llmSection = {
  name: 'llm',
  description: 'Chat completion provider configuration.',
  options: {
    enabled: {
      envKey: 'LIFEQ_LLM_ENABLED',
      defaultValue: true,
      description: 'Use a chat model. When false, rule-based fallbacks answer every query.',
      schema: z.boolean(),
    },
    baseUrl: {
      envKey: 'LIFEQ_LLM_BASE_URL',
      defaultValue: 'http://localhost:1234/v1',
      description: 'OpenAI-compatible chat endpoint (LM Studio, Ollama, OpenAI).',
      schema: z.string().url(),
    },
    model: {
      envKey: 'LIFEQ_LLM_MODEL',
      defaultValue: 'local-model',
      description: 'Chat model name.',
      schema: z.string().min(1),
    },
    apiKey: {
      envKey: 'LIFEQ_LLM_API_KEY',
      defaultValue: 'not-needed',
      description: 'API key for the chat endpoint (local servers ignore it).',
      schema: z.string(),
      sensitive: true,
    },
    temperature: {
      envKey: 'LIFEQ_LLM_TEMPERATURE',
      defaultValue: 0.7,
      description: 'Default sampling temperature.',
      schema: z.number().min(0).max(2),
    },
    maxTokens: {
      envKey: 'LIFEQ_LLM_MAX_TOKENS',
      defaultValue: 2048,
      description: 'Maximum tokens to generate.',
      schema: z.number().int().min(1),
    },
    timeoutMs: {
      envKey: 'LIFEQ_LLM_TIMEOUT_MS',
      defaultValue: 60000,
      description: 'Request timeout in milliseconds.',
      schema: z.number().int().min(1000),
    },
  },
} satisfies ConfigSectionMeta;
