/**
 * Chunking Types
 */

/**
 * Approximate characters per token
 */
export const CHARS_PER_TOKEN = 4;

/**
 * A single chunk with its position in the source text
 */
export interface TextChunk {
  /** The chunk content, an exact slice of the source */
  text: string;
  /** Start offset in the source (inclusive) */
  start: number;
  /** End offset in the source (exclusive) */
  end: number;
}

export interface ChunkingConfig {
  /** Approximate tokens per chunk */
  maxTokens: number;
  /** Approximate tokens shared by consecutive chunks */
  overlapTokens: number;
  /**
   * A chunk may end early at a sentence or line break, but only past this
   * fraction of the window
   */
  minBreakRatio: number;
}

export const DEFAULT_CHUNKING_CONFIG: ChunkingConfig = {
  maxTokens: 512,
  overlapTokens: 50,
  minBreakRatio: 0.5,
};
