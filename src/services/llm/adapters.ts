/**
 * Adapters from LlmClient to the engine's capability interfaces
 */

import {
  LifeQueryError,
  createEmbeddingProviderError,
  createLlmError,
  getErrorMessage,
} from '../../core/errors.js';
import type { ChatCompleter, ChatMessage, ChatOptions } from '../../core/types.js';
import type { LlmClient } from './client.js';

export function createChatCompleter(client: LlmClient): ChatCompleter {
  return {
    async chat(messages: ChatMessage[], options: ChatOptions = {}): Promise<string> {
      try {
        const result = await client.chat(messages, options);
        return result.content;
      } catch (error) {
        if (error instanceof LifeQueryError) throw error;
        throw createLlmError(getErrorMessage(error));
      }
    },
  };
}

/**
 * Batch embedding call against the client's embedding model
 */
export type EmbeddingBackend = (texts: string[]) => Promise<number[][]>;

export function createEmbeddingBackend(client: LlmClient, model?: string, provider = 'openai'): EmbeddingBackend {
  return async (texts) => {
    try {
      const result = await client.embed(texts, model);
      return result.embeddings;
    } catch (error) {
      if (error instanceof LifeQueryError) throw error;
      throw createEmbeddingProviderError(provider, getErrorMessage(error));
    }
  };
}
