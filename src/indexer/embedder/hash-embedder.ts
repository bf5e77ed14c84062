/**
 * Hashed Bag-of-Words Embedder
 *
 * Offline fallback used when no embedding endpoint is reachable. Each
 * lowercased whitespace token is hashed with SHA-256 into one of
 * `dimensions` slots; the slot counts are L2-normalized.
 *
 * Quality is far below a trained model, but two texts sharing words always
 * score above two texts sharing none, which is enough to keep retrieval
 * useful without a network.
 */

import { createHash } from 'node:crypto';

import { l2Normalize } from './vector.js';
import type { TextEmbedder } from './types.js';

export const DEFAULT_HASH_DIMENSIONS = 512;

export class HashEmbedder implements TextEmbedder {
  readonly name: string;
  readonly dimensions: number;

  constructor(dimensions: number = DEFAULT_HASH_DIMENSIONS) {
    if (!Number.isInteger(dimensions) || dimensions < 1) {
      throw new RangeError(`Hash embedder dimensions must be a positive integer, got ${dimensions}`);
    }
    this.dimensions = dimensions;
    this.name = `hash-${dimensions}`;
  }

  async embed(texts: readonly string[]): Promise<number[][]> {
    return texts.map((text) => this.embedOne(text));
  }

  /**
   * Synchronous single-text embedding.
   * Text without any token yields the all-zero vector.
   */
  embedOne(text: string): number[] {
    const vector = new Array<number>(this.dimensions).fill(0);
    const modulus = BigInt(this.dimensions);

    for (const token of text.toLowerCase().split(/\s+/)) {
      if (!token) {
        continue;
      }
      const digest = createHash('sha256').update(token).digest('hex');
      const slot = Number(BigInt(`0x${digest}`) % modulus);
      vector[slot] = (vector[slot] ?? 0) + 1;
    }

    return l2Normalize(vector);
  }
}
