/**
 * Vector helpers for similarity search and BLOB storage
 */

import { createComponentLogger } from './logger.js';

const logger = createComponentLogger('vector');

/**
 * Cosine similarity in [-1, 1]. Zero vectors and length mismatches score 0.
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    logger.debug({ lengthA: a.length, lengthB: b.length }, 'Vector dimension mismatch');
    return 0;
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }

  if (normA === 0 || normB === 0) return 0;
  // Rounding can push parallel vectors just past 1
  return Math.max(-1, Math.min(1, dot / (Math.sqrt(normA) * Math.sqrt(normB))));
}

const FLOAT64_BYTES = 8;

/**
 * Encode as little-endian float64
 */
export function encodeVector(vector: readonly number[]): Buffer {
  const buffer = Buffer.alloc(vector.length * FLOAT64_BYTES);
  const view = new DataView(buffer.buffer, buffer.byteOffset, buffer.byteLength);
  vector.forEach((value, i) => view.setFloat64(i * FLOAT64_BYTES, value, true));
  return buffer;
}

export function decodeVector(buffer: Uint8Array): number[] {
  const view = new DataView(buffer.buffer, buffer.byteOffset, buffer.byteLength);
  const length = Math.floor(buffer.byteLength / FLOAT64_BYTES);
  const vector: number[] = new Array<number>(length);
  for (let i = 0; i < length; i++) {
    vector[i] = view.getFloat64(i * FLOAT64_BYTES, true);
  }
  return vector;
}
