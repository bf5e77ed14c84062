/**
 * Embedder Factory
 *
 * Picks the embedder once per session:
 * - provider "hash": the local hashed embedder
 * - provider "openai": an OpenAI-compatible endpoint, probed with a single
 *   request; when the key is missing or the probe fails the hashed
 *   embedder is used instead and a warning is logged
 *
 * Callers never branch per request; whatever this returns is used for the
 * whole session (the retrieval session may still downgrade to hashing if
 * the endpoint fails later).
 */

import OpenAI from 'openai';

import { getEnv, type EmbeddingConfig } from '../../config/index.js';
import { consoleLogger } from '../../utils/index.js';
import { HashEmbedder } from './hash-embedder.js';
import { OpenAIEmbedder } from './openai-embedder.js';
import type { CreateEmbedderOptions, EmbeddingsClient, TextEmbedder } from './types.js';

/** Local servers accept any key, but the client refuses an empty one */
const LOCAL_API_KEY = 'local';

const LOCAL_HOSTS = new Set(['localhost', '127.0.0.1', '0.0.0.0', '[::1]', '::1']);

/**
 * True when the URL points at this machine (Ollama, LM Studio).
 */
export function isLocalEndpoint(url: string): boolean {
  try {
    return LOCAL_HOSTS.has(new URL(url).hostname);
  } catch {
    return false;
  }
}

function resolveClient(
  config: EmbeddingConfig,
  options: CreateEmbedderOptions
): EmbeddingsClient | string {
  if (options.client) {
    return options.client;
  }

  const baseUrl = options.baseUrl ?? getEnv('EMBEDDING_BASE_URL') ?? config.base_url;
  const apiKey = options.apiKey ?? getEnv('EMBEDDING_API_KEY');
  const local = baseUrl !== undefined && isLocalEndpoint(baseUrl);

  if (!apiKey && !local) {
    return 'EMBEDDING_API_KEY is not set';
  }

  return new OpenAI({
    apiKey: apiKey ?? LOCAL_API_KEY,
    baseURL: baseUrl,
    timeout: config.timeout_ms,
    maxRetries: 1,
  });
}

/**
 * Create the session's embedder from the [embedding] config section.
 *
 * @example
 * ```typescript
 * const config = loadConfig();
 * const embedder = await createEmbedder(config.embedding, { logger: ctx });
 * const [vector] = await embedder.embed(['Hello, world!']);
 * ```
 */
export async function createEmbedder(
  config: EmbeddingConfig,
  options: CreateEmbedderOptions = {}
): Promise<TextEmbedder> {
  const logger = options.logger ?? consoleLogger;
  const fallback = (): TextEmbedder => new HashEmbedder(config.dimensions);

  if (config.provider === 'hash') {
    return fallback();
  }

  const client = resolveClient(config, options);
  if (typeof client === 'string') {
    logger.warn(`${client}; using local hashed embeddings`);
    return fallback();
  }

  const embedder = new OpenAIEmbedder(client, {
    model: config.model,
    batchSize: config.batch_size,
  });

  try {
    await embedder.embed(['embedding probe']);
    logger.debug?.(`Embedding with ${embedder.name} (${embedder.dimensions} dimensions)`);
    return embedder;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.warn(
      `Embedding endpoint unavailable (${message}); using local hashed embeddings`
    );
    return fallback();
  }
}
