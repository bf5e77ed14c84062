/**
 * Chat Runtime Setup
 *
 * Shared by the chat and ask commands: loads config and environment,
 * picks the model, chooses the embedder, and wires a ChatSession.
 */

import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import ora from 'ora';

import { ChatSession } from '../../agent/chat-session.js';
import { getTokenizer } from '../../agent/budget.js';
import { loadConfig, type Config } from '../../config/index.js';
import { CLIError, FileNotFoundError } from '../../errors/index.js';
import { createEmbedder } from '../../indexer/embedder/index.js';
import type { UploadedFile } from '../../indexer/extractor/index.js';
import {
  createCompletionService,
  fetchModelCatalog,
  resolveModel,
  type ModelDescriptor,
} from '../../providers/index.js';
import { RetrievalSession } from '../../search/store.js';
import { DuckDuckGoSearchProvider } from '../../search/web-search.js';
import type { CommandContext } from '../types.js';

export const MAX_TOP_K = 50;

export interface RuntimeOverrides {
  /** Model name or id (overrides default_model) */
  model?: string;
  temperature?: number;
  topK?: number;
}

export interface ChatRuntime {
  config: Config;
  session: ChatSession;
  /** Free-tier models from the catalog */
  models: ModelDescriptor[];
  model: ModelDescriptor;
  temperature: number;
}

/**
 * Parse and validate a --top-k value.
 */
export function parseTopK(value: string): number {
  const topK = Number(value);
  if (!Number.isInteger(topK) || topK < 1) {
    throw new CLIError(`Invalid --top-k value: "${value}"`, `Must be a positive integer (1-${MAX_TOP_K})`);
  }
  if (topK > MAX_TOP_K) {
    throw new CLIError(`--top-k value too large: ${topK}`, `Maximum allowed is ${MAX_TOP_K}`);
  }
  return topK;
}

/**
 * Parse and validate a --temperature value.
 */
export function parseTemperature(value: string): number {
  const temperature = Number(value);
  if (value.trim() === '' || Number.isNaN(temperature) || temperature < 0 || temperature > 2) {
    throw new CLIError(`Invalid --temperature value: "${value}"`, 'Must be a number between 0 and 2');
  }
  return temperature;
}

/**
 * Read files from disk as uploads.
 *
 * @throws FileNotFoundError for the first path that cannot be read
 */
export async function readFiles(paths: readonly string[]): Promise<UploadedFile[]> {
  return Promise.all(
    paths.map(async (filePath) => {
      try {
        const data = await readFile(filePath);
        return { name: basename(filePath), data: new Uint8Array(data) };
      } catch {
        throw new FileNotFoundError(filePath);
      }
    })
  );
}

/**
 * Build the retrieval session with the configured embedder.
 * Needs no API key: without one the hashed embedder is used.
 */
export async function createRetrieval(config: Config, ctx: CommandContext): Promise<RetrievalSession> {
  const embedder = await createEmbedder(config.embedding, { logger: ctx });
  ctx.debug(`Embedder: ${embedder.name}`);

  return new RetrievalSession({
    embedder,
    chunking: {
      chunkSize: config.chunking.chunk_size,
      overlap: config.chunking.overlap,
      minChunkLength: config.chunking.min_chunk_length,
    },
    fallbackDimensions: config.embedding.dimensions,
    logger: ctx,
  });
}

/**
 * Load everything a chat needs.
 *
 * @throws APIKeyError when OPENROUTER_API_KEY is missing
 * @throws ModelCatalogError when the catalog can't be fetched
 * @throws ConfigError when the requested model isn't in the free tier
 */
export async function createChatRuntime(
  ctx: CommandContext,
  overrides: RuntimeOverrides = {}
): Promise<ChatRuntime> {
  const config = loadConfig();
  const completion = createCompletionService();

  const spinner = ctx.options.json ? null : ora('Fetching models...').start();
  let models: ModelDescriptor[];
  try {
    models = await fetchModelCatalog({
      url: config.models.catalog_url,
      maxPricePerMillion: config.models.max_price_per_million,
    });
  } finally {
    spinner?.stop();
  }

  const model = resolveModel(models, overrides.model ?? config.default_model);
  ctx.debug(`Model: ${model.id} (context ${model.contextLength} tokens)`);

  const session = new ChatSession({
    completion,
    retrieval: await createRetrieval(config, ctx),
    searchProvider: new DuckDuckGoSearchProvider(config.web_search),
    logger: ctx,
    topK: overrides.topK ?? config.retrieval.top_k,
    searchResults: config.web_search.results,
    tokenizer: getTokenizer(config.budget.encoding),
    minTruncationTokens: config.budget.min_truncation_tokens,
  });

  return {
    config,
    session,
    models,
    model,
    temperature: overrides.temperature ?? config.temperature,
  };
}
