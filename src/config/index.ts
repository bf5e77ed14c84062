/**
 * Config Module
 *
 * Exports for programmatic config access.
 * CLI users interact via `docchat config` commands.
 */

// Schema and types
export {
  ConfigSchema,
  PartialConfigSchema,
  ChunkingConfigSchema,
  EmbeddingConfigSchema,
  RetrievalConfigSchema,
  WebSearchConfigSchema,
  ModelsConfigSchema,
  BudgetConfigSchema,
} from './schema.js';
export type {
  Config,
  PartialConfig,
  ChunkingConfig,
  EmbeddingConfig,
  WebSearchConfig,
  BudgetConfig,
} from './schema.js';

// Defaults
export { DEFAULT_CONFIG, CONFIG_TEMPLATE } from './defaults.js';

// Loader functions
export { loadConfig, getConfigValue, setConfigValue, listConfig } from './loader.js';

// Paths
export { DOCCHAT_DIR, CONFIG_PATH, getDocchatDir, getConfigPath } from './paths.js';

// Environment variables
export {
  loadEnv,
  getEnv,
  hasApiKey,
  SETUP_INSTRUCTIONS,
  DEFAULT_OPENROUTER_BASE_URL,
  EnvSchema,
  _clearEnvCache,
} from './env.js';
export type { EnvVars } from './env.js';
