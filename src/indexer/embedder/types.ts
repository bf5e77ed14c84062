/**
 * Embedder Types
 *
 * A TextEmbedder turns texts into fixed-length vectors. The retrieval index
 * records which embedder produced it so queries are embedded the same way.
 */

import type { Logger } from '../../utils/index.js';

/**
 * Embedding capability shared by the model-backed and hashed embedders.
 */
export interface TextEmbedder {
  /** Human-readable identifier, e.g. "openai:text-embedding-3-small" or "hash-512" */
  readonly name: string;

  /** Vector length produced by embed(); 0 until the first call for remote models */
  readonly dimensions: number;

  /**
   * Embed a batch of texts. The result is positionally aligned with the
   * input and every vector has the same length.
   */
  embed(texts: readonly string[]): Promise<number[][]>;
}

/**
 * Minimal slice of the OpenAI client used for embeddings.
 * The real `OpenAI` instance satisfies it; tests pass a stub.
 */
export interface EmbeddingsClient {
  embeddings: {
    create(params: { model: string; input: string[] }): PromiseLike<{
      data: Array<{ embedding: number[]; index: number }>;
    }>;
  };
}

/**
 * Options for createEmbedder.
 */
export interface CreateEmbedderOptions {
  /** Where fallback warnings go (default: consoleLogger) */
  logger?: Logger;

  /** Overrides EMBEDDING_API_KEY */
  apiKey?: string;

  /** Overrides EMBEDDING_BASE_URL and embedding.base_url */
  baseUrl?: string;

  /** Pre-built client; skips key checks and client construction */
  client?: EmbeddingsClient;
}
