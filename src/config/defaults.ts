/**
 * Default Configuration Values
 *
 * Used when no config.toml exists (first run) or when the user's file is
 * missing fields. The loader merges user config ON TOP of these defaults.
 */

import type { Config } from './schema.js';

export const DEFAULT_CONFIG: Config = {
  // Empty = pick the first free model the catalog returns
  default_model: '',
  temperature: 1.0,

  chunking: {
    chunk_size: 800,
    overlap: 120,
    min_chunk_length: 20,
  },

  // text-embedding-3-small via any OpenAI-compatible endpoint; falls back to
  // the local hash embedder when the endpoint is unreachable
  embedding: {
    provider: 'openai',
    model: 'text-embedding-3-small',
    dimensions: 512,
    batch_size: 32,
    timeout_ms: 60000,
  },

  retrieval: {
    top_k: 5,
  },

  web_search: {
    results: 5,
    region: 'us-en',
    safe_search: 'moderate',
  },

  models: {
    catalog_url: 'https://openrouter.ai/api/v1/models',
    max_price_per_million: 0.01,
  },

  budget: {
    encoding: 'cl100k_base',
    min_truncation_tokens: 100,
  },
};

/**
 * Config file template (TOML format)
 * Written to ~/.docchat/config.toml on first run
 */
export const CONFIG_TEMPLATE = `# docchat configuration
# Location: ~/.docchat/config.toml

# Chat model (name or id from: docchat models). Empty = first free model.
default_model = "${DEFAULT_CONFIG.default_model}"
temperature = ${DEFAULT_CONFIG.temperature.toFixed(1)}

# Document chunking (characters)
[chunking]
chunk_size = ${DEFAULT_CONFIG.chunking.chunk_size}
overlap = ${DEFAULT_CONFIG.chunking.overlap}
min_chunk_length = ${DEFAULT_CONFIG.chunking.min_chunk_length}

# Embeddings
# provider = "openai" uses an OpenAI-compatible /embeddings endpoint
#   (set EMBEDDING_API_KEY / EMBEDDING_BASE_URL, or base_url below)
# provider = "hash" uses local hashed bag-of-words vectors (no network)
[embedding]
provider = "${DEFAULT_CONFIG.embedding.provider}"
model = "${DEFAULT_CONFIG.embedding.model}"
# base_url = "http://localhost:11434/v1"
dimensions = ${DEFAULT_CONFIG.embedding.dimensions}
batch_size = ${DEFAULT_CONFIG.embedding.batch_size}
timeout_ms = ${DEFAULT_CONFIG.embedding.timeout_ms}

[retrieval]
top_k = ${DEFAULT_CONFIG.retrieval.top_k}

# DuckDuckGo web search
[web_search]
results = ${DEFAULT_CONFIG.web_search.results}
region = "${DEFAULT_CONFIG.web_search.region}"
safe_search = "${DEFAULT_CONFIG.web_search.safe_search}"

# Model catalog: only models priced below max_price_per_million (USD per
# million tokens, prompt and completion) are listed
[models]
catalog_url = "${DEFAULT_CONFIG.models.catalog_url}"
max_price_per_million = ${DEFAULT_CONFIG.models.max_price_per_million}

# Context window budgeting
[budget]
encoding = "${DEFAULT_CONFIG.budget.encoding}"
min_truncation_tokens = ${DEFAULT_CONFIG.budget.min_truncation_tokens}
`;
