/**
 * Chunking
 *
 * @example
 * ```typescript
 * import { createChunkingService } from './services/chunking/index.js';
 *
 * const chunker = createChunkingService({ maxTokens: 256, overlapTokens: 25 });
 * const parts = chunker.chunk(recordText);
 * ```
 */

export { ChunkingService, createChunkingService, chunkText } from './chunking.service.js';
export type { ChunkingConfig, TextChunk } from './types.js';
export { DEFAULT_CHUNKING_CONFIG, CHARS_PER_TOKEN } from './types.js';
