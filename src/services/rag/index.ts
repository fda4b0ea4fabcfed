export { RagPipeline, createRagPipeline, ragConfigFromEnv } from './rag-pipeline.js';
export type { RagPipelineDeps } from './rag-pipeline.js';
export { buildSearchableText } from './searchable-text.js';
export {
  RAG_PROMPT_TEMPLATE_KEY,
  buildContext,
  buildPrompt,
  buildFallbackAnswer,
  noDataMessage,
} from './prompt.js';
export type * from './types.js';
