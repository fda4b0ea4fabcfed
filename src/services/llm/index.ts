/**
 * OpenAI-compatible LLM integration
 */

export { LlmClient, createLlmClient, llmConfigFromEnv } from './client.js';
export { createChatCompleter, createEmbeddingBackend } from './adapters.js';
export type { EmbeddingBackend } from './adapters.js';
export type { LlmClientConfig, LlmChatResult, LlmEmbedResult } from './types.js';
