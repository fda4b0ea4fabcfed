/**
 * LLM client types
 */

export interface LlmClientConfig {
  /** OpenAI-compatible base URL (LM Studio, Ollama, OpenAI) */
  baseUrl: string;
  model: string;
  apiKey: string;
  /** Request timeout in milliseconds */
  timeoutMs: number;
  temperature: number;
  maxTokens: number;
}

export interface LlmChatResult {
  content: string;
  model: string;
  usage?: {
    promptTokens: number;
    completionTokens: number;
    totalTokens: number;
  };
  finishReason?: string;
}

export interface LlmEmbedResult {
  embeddings: number[][];
  model: string;
}
