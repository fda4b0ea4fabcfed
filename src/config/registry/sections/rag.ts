/**
 * RAG Configuration Section
 *
 * Chunking, search and prompt context limits.
 */

import { z } from 'zod';
import type { ConfigSectionMeta } from '../types.js';

export const ragSection = {
  name: 'rag',
  description: 'Retrieval-augmented generation configuration.',
  options: {
    chunkMaxTokens: {
      envKey: 'LIFEQ_RAG_CHUNK_MAX_TOKENS',
      defaultValue: 512,
      description: 'Approximate tokens per chunk (4 characters per token).',
      schema: z.number().int().min(1),
    },
    chunkOverlapTokens: {
      envKey: 'LIFEQ_RAG_CHUNK_OVERLAP_TOKENS',
      defaultValue: 50,
      description: 'Approximate tokens shared by consecutive chunks.',
      schema: z.number().int().min(0),
    },
    minScore: {
      envKey: 'LIFEQ_RAG_MIN_SCORE',
      defaultValue: 0.1,
      description: 'Minimum cosine similarity for a search hit.',
      schema: z.number().min(-1).max(1),
    },
    answerLimit: {
      envKey: 'LIFEQ_RAG_ANSWER_LIMIT',
      defaultValue: 10,
      description: 'Results retrieved when building an answer prompt.',
      schema: z.number().int().min(1),
    },
    contextBudgetChars: {
      envKey: 'LIFEQ_RAG_CONTEXT_BUDGET_CHARS',
      defaultValue: 4000,
      description: 'Maximum characters of retrieved context in a prompt.',
      schema: z.number().int().min(100),
    },
    scanLimit: {
      envKey: 'LIFEQ_RAG_SCAN_LIMIT',
      defaultValue: 1000,
      description: 'Maximum stored embeddings ranked per search.',
      schema: z.number().int().min(1),
    },
  },
} satisfies ConfigSectionMeta;
