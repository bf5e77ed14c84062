/**
 * Environment Variable Handler
 *
 * Loads and provides access to API keys and endpoint URLs.
 * Supports .env files for local development via dotenv.
 *
 * Keys are never logged and never included in error messages; only their
 * presence is reported.
 */

import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';

// No-op if .env doesn't exist
dotenvConfig();

export const DEFAULT_OPENROUTER_BASE_URL = 'https://openrouter.ai/api/v1';

/**
 * Environment variable schema.
 * Keys are optional at load time; the provider that needs one validates
 * it when it is created.
 */
export const EnvSchema = z.object({
  OPENROUTER_API_KEY: z.string().optional(),
  OPENROUTER_BASE_URL: z.string().url().default(DEFAULT_OPENROUTER_BASE_URL),
  // OpenAI-compatible embedding endpoint (OpenAI, Ollama /v1, ...)
  EMBEDDING_API_KEY: z.string().optional(),
  EMBEDDING_BASE_URL: z.string().url().optional(),
});

export type EnvVars = z.infer<typeof EnvSchema>;

/** Cached environment variables (loaded once at first access). */
let _envCache: EnvVars | null = null;

/**
 * Empty strings in .env files mean "unset".
 */
function readVar(name: string): string | undefined {
  const value = process.env[name]?.trim();
  return value ? value : undefined;
}

/**
 * Load environment variables (called once, then cached).
 * Does NOT validate key presence - that happens when a provider is created.
 */
export function loadEnv(): EnvVars {
  if (_envCache !== null) {
    return _envCache;
  }

  const raw = {
    OPENROUTER_API_KEY: readVar('OPENROUTER_API_KEY'),
    OPENROUTER_BASE_URL: readVar('OPENROUTER_BASE_URL'),
    EMBEDDING_API_KEY: readVar('EMBEDDING_API_KEY'),
    EMBEDDING_BASE_URL: readVar('EMBEDDING_BASE_URL'),
  };

  const result = EnvSchema.safeParse(raw);

  // A malformed URL falls back to defaults instead of blocking startup
  _envCache = result.success
    ? result.data
    : {
        OPENROUTER_API_KEY: raw.OPENROUTER_API_KEY,
        OPENROUTER_BASE_URL: DEFAULT_OPENROUTER_BASE_URL,
        EMBEDDING_API_KEY: raw.EMBEDDING_API_KEY,
        EMBEDDING_BASE_URL: undefined,
      };

  return _envCache;
}

/**
 * Get a specific environment variable by key.
 */
export function getEnv<K extends keyof EnvVars>(key: K): EnvVars[K] {
  return loadEnv()[key];
}

/**
 * Check if an API key is configured, without exposing it.
 */
export function hasApiKey(provider: 'openrouter' | 'embedding'): boolean {
  const env = loadEnv();
  switch (provider) {
    case 'openrouter':
      return Boolean(env.OPENROUTER_API_KEY);
    case 'embedding':
      return Boolean(env.EMBEDDING_API_KEY);
  }
}

/**
 * Clear the environment cache.
 * FOR TESTING ONLY - allows tests to stub different env values.
 *
 * @internal
 */
export function _clearEnvCache(): void {
  _envCache = null;
}

/**
 * Shown when OPENROUTER_API_KEY is missing.
 */
export const SETUP_INSTRUCTIONS = `
To chat with OpenRouter models:

1. Create an API key at https://openrouter.ai/keys
2. Set the environment variable (or put it in a .env file):

   export OPENROUTER_API_KEY="your-key"

3. Optional: document embeddings through an OpenAI-compatible endpoint

   export EMBEDDING_API_KEY="your-key"
   export EMBEDDING_BASE_URL="https://api.openai.com/v1"

   Without them, docchat embeds documents locally with hashed vectors.
`.trim();
