/**
 * LLM Client
 *
 * OpenAI-compatible client for chat and embeddings, pointed at a local
 * LM Studio or Ollama server or at OpenAI itself.
 */

import OpenAI, { APIConnectionError, APIConnectionTimeoutError } from 'openai';
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import { config } from '../../config/index.js';
import { withRetry, isRetryableNetworkError } from '../../utils/retry.js';
import { NetworkError, TimeoutError, getErrorMessage } from '../../core/errors.js';
import type { ChatMessage } from '../../core/types.js';
import type { LlmChatResult, LlmClientConfig, LlmEmbedResult } from './types.js';

/**
 * Defaults from the `llm` config section
 */
export function llmConfigFromEnv(): LlmClientConfig {
  return {
    baseUrl: config.llm.baseUrl,
    model: config.llm.model,
    apiKey: config.llm.apiKey,
    timeoutMs: config.llm.timeoutMs,
    temperature: config.llm.temperature,
    maxTokens: config.llm.maxTokens,
  };
}

function toMessageParam(message: ChatMessage): ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
  }
}

/**
 * Client for an OpenAI-compatible API server
 *
 * @example
 * ```typescript
 * const client = new LlmClient({ model: 'mistral-7b-instruct' });
 * const response = await client.chat([{ role: 'user', content: 'Hello!' }]);
 * ```
 */
export class LlmClient {
  private readonly openai: OpenAI;
  private readonly config: LlmClientConfig;

  constructor(overrides: Partial<LlmClientConfig> = {}) {
    this.config = { ...llmConfigFromEnv(), ...overrides };
    this.openai = new OpenAI({
      baseURL: this.config.baseUrl,
      apiKey: this.config.apiKey,
      timeout: this.config.timeoutMs,
      maxRetries: 0, // withRetry handles retries
    });
  }

  /**
   * Run a provider call with retries; connection failures surface as NetworkError or TimeoutError.
   */
  private async request<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await withRetry(fn, { retryableErrors: isRetryableNetworkError });
    } catch (error) {
      if (error instanceof APIConnectionTimeoutError) {
        throw new TimeoutError(operation, this.config.timeoutMs, { baseUrl: this.config.baseUrl });
      }
      if (error instanceof APIConnectionError) {
        throw new NetworkError(getErrorMessage(error), this.config.baseUrl);
      }
      throw error;
    }
  }

  /**
   * Send a chat completion request
   */
  async chat(
    messages: ChatMessage[],
    options: { model?: string; temperature?: number; maxTokens?: number } = {}
  ): Promise<LlmChatResult> {
    const response = await this.request('chat', () =>
      this.openai.chat.completions.create({
        model: options.model ?? this.config.model,
        messages: messages.map(toMessageParam),
        temperature: options.temperature ?? this.config.temperature,
        max_tokens: options.maxTokens ?? this.config.maxTokens,
        stream: false,
      })
    );

    const choice = response.choices[0];

    return {
      content: choice?.message?.content ?? '',
      model: response.model,
      usage: response.usage
        ? {
            promptTokens: response.usage.prompt_tokens,
            completionTokens: response.usage.completion_tokens,
            totalTokens: response.usage.total_tokens,
          }
        : undefined,
      finishReason: choice?.finish_reason ?? undefined,
    };
  }

  /**
   * Generate embeddings (if supported by the loaded model)
   */
  async embed(input: string | string[], model?: string): Promise<LlmEmbedResult> {
    const response = await this.request('embed', () =>
      this.openai.embeddings.create({
        model: model ?? this.config.model,
        input,
      })
    );

    return {
      embeddings: response.data.map((d) => d.embedding),
      model: response.model,
    };
  }
}

export function createLlmClient(overrides: Partial<LlmClientConfig> = {}): LlmClient {
  return new LlmClient(overrides);
}
