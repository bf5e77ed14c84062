/**
 * OpenAI-compatible Embedder
 *
 * Calls the /embeddings endpoint of OpenAI or any server that speaks the
 * same API (Ollama's /v1, LM Studio, vLLM). Requests are batched and the
 * returned vectors are L2-normalized so cosine similarity is a dot product.
 */

import { l2Normalize } from './vector.js';
import type { EmbeddingsClient, TextEmbedder } from './types.js';

/** Default batch size - 32 is a good balance of speed vs memory */
export const DEFAULT_BATCH_SIZE = 32;

export interface OpenAIEmbedderOptions {
  /** Embedding model, e.g. "text-embedding-3-small" or "nomic-embed-text" */
  model: string;

  /** @default 32 */
  batchSize?: number;
}

export class OpenAIEmbedder implements TextEmbedder {
  readonly name: string;
  private readonly model: string;
  private readonly batchSize: number;
  private observedDimensions = 0;

  constructor(
    private readonly client: EmbeddingsClient,
    options: OpenAIEmbedderOptions
  ) {
    this.model = options.model;
    this.batchSize = Math.max(1, options.batchSize ?? DEFAULT_BATCH_SIZE);
    this.name = `openai:${options.model}`;
  }

  get dimensions(): number {
    return this.observedDimensions;
  }

  async embed(texts: readonly string[]): Promise<number[][]> {
    const vectors: number[][] = [];

    for (let i = 0; i < texts.length; i += this.batchSize) {
      const batch = texts.slice(i, i + this.batchSize);
      const response = await this.client.embeddings.create({
        model: this.model,
        input: batch,
      });

      if (response.data.length !== batch.length) {
        throw new Error(
          `Embedding endpoint returned ${response.data.length} vectors for ${batch.length} inputs`
        );
      }

      // Results carry their input position; don't rely on response order
      const ordered = [...response.data].sort((a, b) => a.index - b.index);
      for (const item of ordered) {
        vectors.push(this.checkDimensions(l2Normalize(item.embedding)));
      }
    }

    return vectors;
  }

  private checkDimensions(vector: number[]): number[] {
    if (vector.length === 0) {
      throw new Error('Embedding endpoint returned an empty vector');
    }
    if (this.observedDimensions === 0) {
      this.observedDimensions = vector.length;
    } else if (vector.length !== this.observedDimensions) {
      throw new Error(
        `Embedding dimension changed from ${this.observedDimensions} to ${vector.length}`
      );
    }
    return vector;
  }
}
