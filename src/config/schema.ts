/**
 * Configuration Schema
 *
 * Defines the shape of ~/.docchat/config.toml using Zod.
 * This provides both TypeScript types AND runtime validation.
 */

import { z } from 'zod';

/**
 * Chunking configuration
 * Controls how uploaded documents are split before embedding
 */
export const ChunkingConfigSchema = z
  .object({
    chunk_size: z
      .number()
      .int()
      .min(50)
      .max(20000)
      .describe('Target chunk size in characters (default 800)'),
    overlap: z
      .number()
      .int()
      .min(0)
      .describe('Characters carried over between consecutive chunks (default 120)'),
    min_chunk_length: z
      .number()
      .int()
      .min(1)
      .describe('Chunks shorter than this are dropped as noise (default 20)'),
  })
  .refine((value) => value.overlap < value.chunk_size, {
    message: 'overlap must be smaller than chunk_size',
    path: ['overlap'],
  });

/**
 * Embedding configuration
 *
 * "openai" talks to any OpenAI-compatible /embeddings endpoint (OpenAI,
 * Ollama's /v1, LM Studio). "hash" is the local hashed bag-of-words embedder,
 * which is also the automatic fallback when the endpoint is unreachable.
 */
export const EmbeddingConfigSchema = z.object({
  provider: z
    .enum(['openai', 'hash'])
    .describe('Embedding backend (openai-compatible endpoint or local hashing)'),
  model: z.string().min(1).describe('Embedding model name for the openai provider'),
  base_url: z
    .string()
    .url()
    .optional()
    .describe('Embedding endpoint base URL (EMBEDDING_BASE_URL overrides)'),
  dimensions: z
    .number()
    .int()
    .min(8)
    .max(8192)
    .describe('Vector size of the hash embedder (default 512)'),
  batch_size: z
    .number()
    .int()
    .min(1)
    .max(2048)
    .describe('Number of texts per embedding request (default 32)'),
  timeout_ms: z
    .number()
    .int()
    .min(1000)
    .max(600000)
    .describe('Timeout in milliseconds for embedding requests'),
});

/**
 * Retrieval configuration
 */
export const RetrievalConfigSchema = z.object({
  top_k: z.number().int().min(1).max(50).describe('Number of chunks added to the prompt'),
});

/**
 * Web search configuration (DuckDuckGo)
 */
export const WebSearchConfigSchema = z.object({
  results: z.number().int().min(1).max(20).describe('Number of search results to include'),
  region: z.string().min(2).describe('Search region, e.g. us-en'),
  safe_search: z.enum(['strict', 'moderate', 'off']),
});

/**
 * Model catalog configuration
 *
 * max_price_per_million is the free-tier heuristic: a model is listed only
 * when both its prompt and completion prices, scaled to a million tokens,
 * are below this value.
 */
export const ModelsConfigSchema = z.object({
  catalog_url: z.string().url(),
  max_price_per_million: z
    .number()
    .min(0)
    .describe('Upper bound (exclusive) on prices per million tokens'),
});

/**
 * Token budget configuration
 */
export const BudgetConfigSchema = z.object({
  encoding: z
    .enum(['cl100k_base', 'o200k_base', 'p50k_base', 'r50k_base'])
    .describe('Tokenizer encoding used for counting and truncation'),
  min_truncation_tokens: z
    .number()
    .int()
    .min(0)
    .describe('Minimum remaining budget before an overflowing message is truncated instead of dropped'),
});

/**
 * Root configuration schema
 * This is the complete shape of config.toml
 */
export const ConfigSchema = z.object({
  default_model: z
    .string()
    .describe('Model name or id to chat with (empty = first free model)'),
  temperature: z.number().min(0).max(2).describe('Sampling temperature'),
  chunking: ChunkingConfigSchema,
  embedding: EmbeddingConfigSchema,
  retrieval: RetrievalConfigSchema,
  web_search: WebSearchConfigSchema,
  models: ModelsConfigSchema,
  budget: BudgetConfigSchema,
});

/**
 * TypeScript type inferred from the schema
 */
export type Config = z.infer<typeof ConfigSchema>;

/**
 * Partial config for merging user overrides with defaults.
 *
 * Built by hand rather than with deepPartial() because the chunking section
 * carries a refinement; cross-field checks run on the merged result.
 */
export const PartialConfigSchema = z.object({
  default_model: z.string().optional(),
  temperature: z.number().min(0).max(2).optional(),
  chunking: z
    .object({
      chunk_size: z.number().int().min(50).max(20000),
      overlap: z.number().int().min(0),
      min_chunk_length: z.number().int().min(1),
    })
    .partial()
    .optional(),
  embedding: EmbeddingConfigSchema.partial().optional(),
  retrieval: RetrievalConfigSchema.partial().optional(),
  web_search: WebSearchConfigSchema.partial().optional(),
  models: ModelsConfigSchema.partial().optional(),
  budget: BudgetConfigSchema.partial().optional(),
});
export type PartialConfig = z.infer<typeof PartialConfigSchema>;

export type ChunkingConfig = Config['chunking'];
export type EmbeddingConfig = Config['embedding'];
export type WebSearchConfig = Config['web_search'];
export type BudgetConfig = Config['budget'];
