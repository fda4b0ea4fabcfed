/**
 * Chunking Service
 *
 * Splits text into overlapping windows bounded by an approximate token budget,
 * preferring to end each window at a sentence or line break.
 */

import { CHARS_PER_TOKEN, DEFAULT_CHUNKING_CONFIG, type ChunkingConfig, type TextChunk } from './types.js';

export class ChunkingService {
  private config: ChunkingConfig;

  constructor(config: Partial<ChunkingConfig> = {}) {
    this.config = { ...DEFAULT_CHUNKING_CONFIG, ...config };
  }

  /**
   * Update configuration
   */
  updateConfig(config: Partial<ChunkingConfig>): void {
    this.config = { ...this.config, ...config };
  }

  /**
   * Get current configuration
   */
  getConfig(): ChunkingConfig {
    return { ...this.config };
  }

  /**
   * Chunk text into plain strings
   */
  chunk(text: string, config?: Partial<ChunkingConfig>): string[] {
    return this.chunkWithSpans(text, config).map((c) => c.text);
  }

  /**
   * Chunk text, keeping each chunk's source offsets.
   * Text that fits the window comes back unchanged as a single chunk.
   */
  chunkWithSpans(text: string, config?: Partial<ChunkingConfig>): TextChunk[] {
    if (text.length === 0) return [];

    const { maxTokens, overlapTokens, minBreakRatio } = { ...this.config, ...config };
    const maxChars = Math.max(1, maxTokens * CHARS_PER_TOKEN);
    const overlapChars = Math.max(0, overlapTokens * CHARS_PER_TOKEN);

    if (text.length <= maxChars) {
      return [{ text, start: 0, end: text.length }];
    }

    const chunks: TextChunk[] = [];
    let start = 0;

    while (start < text.length) {
      let end = Math.min(start + maxChars, text.length);

      if (end < text.length) {
        const lastBreak = Math.max(text.lastIndexOf('.', end - 1), text.lastIndexOf('\n', end - 1));
        if (lastBreak >= start + maxChars * minBreakRatio) {
          end = lastBreak + 1;
        }
      }

      chunks.push({ text: text.slice(start, end), start, end });

      if (end >= text.length) break;

      // Always move forward, even when the overlap covers the whole window
      start = Math.max(start + 1, end - overlapChars);
    }

    return chunks;
  }
}

export function createChunkingService(config: Partial<ChunkingConfig> = {}): ChunkingService {
  return new ChunkingService(config);
}

/**
 * Chunk with an explicit token budget
 */
export function chunkText(
  text: string,
  maxTokens = DEFAULT_CHUNKING_CONFIG.maxTokens,
  overlapTokens = DEFAULT_CHUNKING_CONFIG.overlapTokens
): string[] {
  return new ChunkingService({ maxTokens, overlapTokens }).chunk(text);
}
