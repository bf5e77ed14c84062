/**
 * Embedder Module
 *
 * Model-backed embeddings through an OpenAI-compatible endpoint, with a
 * hashed bag-of-words fallback that needs no network.
 */

export { createEmbedder, isLocalEndpoint } from './provider.js';
export { HashEmbedder, DEFAULT_HASH_DIMENSIONS } from './hash-embedder.js';
export { OpenAIEmbedder, DEFAULT_BATCH_SIZE, type OpenAIEmbedderOptions } from './openai-embedder.js';
export { l2Normalize } from './vector.js';

export type { TextEmbedder, EmbeddingsClient, CreateEmbedderOptions } from './types.js';
