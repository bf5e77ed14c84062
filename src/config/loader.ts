/**
 * Configuration Loader
 *
 * Handles the complete config lifecycle:
 * 1. Load config.toml if it exists (or write the template on first run)
 * 2. Validate with Zod schema
 * 3. Merge with defaults (user values override defaults)
 * 4. Provide type-safe access
 *
 * Every function takes an optional config path so tests can point at a
 * temporary file instead of ~/.docchat/config.toml.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import * as TOML from '@iarna/toml';
import type { ZodIssue } from 'zod';
import { ConfigSchema, PartialConfigSchema, type Config } from './schema.js';
import { DEFAULT_CONFIG, CONFIG_TEMPLATE } from './defaults.js';
import { getConfigPath } from './paths.js';
import { ConfigError } from '../errors/index.js';

type PlainObject = Record<string, unknown>;

/** Keys that are valid but have no default value */
const OPTIONAL_KEYS = new Set(['embedding.base_url']);

function isPlainObject(value: unknown): value is PlainObject {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Deep merge two plain objects, with source values overriding target.
 * Nested objects are merged key by key; everything else is replaced.
 */
function deepMerge(target: PlainObject, source: PlainObject): PlainObject {
  const result: PlainObject = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = target[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}

function formatIssues(issues: ZodIssue[]): string {
  return issues
    .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
    .join('\n');
}

/**
 * Merge a raw (already partially validated) object over the defaults and
 * validate the result against the full schema.
 */
function mergeWithDefaults(raw: PlainObject, configPath: string): Config {
  const merged = deepMerge({ ...DEFAULT_CONFIG }, raw);
  const result = ConfigSchema.safeParse(merged);

  if (!result.success) {
    throw new ConfigError(
      `Invalid configuration:\n${formatIssues(result.error.issues)}`,
      `Fix ${configPath} or run: docchat config reset --force  to restore defaults`
    );
  }

  return result.data;
}

/**
 * Read and parse the TOML file into a plain object.
 */
function readConfigFile(configPath: string): PlainObject {
  const content = fs.readFileSync(configPath, 'utf-8');

  try {
    return TOML.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown parse error';
    throw new ConfigError(
      `Invalid TOML in config file: ${message}`,
      `Fix the syntax in ${configPath} or run: docchat config reset --force`
    );
  }
}

/**
 * Load and parse the config file
 * Returns the merged config (defaults + user overrides)
 *
 * @param createIfMissing - If true, writes the default template on first run
 * @throws ConfigError if the config file exists but is invalid
 */
export function loadConfig(createIfMissing = true, configPath = getConfigPath()): Config {
  if (!fs.existsSync(configPath)) {
    if (createIfMissing) {
      fs.mkdirSync(path.dirname(configPath), { recursive: true });
      fs.writeFileSync(configPath, CONFIG_TEMPLATE, 'utf-8');
    }
    return structuredClone(DEFAULT_CONFIG);
  }

  const parsed = readConfigFile(configPath);

  // Validate field types first so errors point at the user's own keys
  const validationResult = PartialConfigSchema.safeParse(parsed);
  if (!validationResult.success) {
    throw new ConfigError(
      `Invalid configuration:\n${formatIssues(validationResult.error.issues)}`,
      'Run: docchat config reset --force  to restore defaults'
    );
  }

  return mergeWithDefaults(validationResult.data, configPath);
}

/**
 * Get a specific config value by dot-notation path
 * Example: getConfigValue('embedding.model') => 'text-embedding-3-small'
 */
export function getConfigValue(key: string, configPath = getConfigPath()): unknown {
  let current: unknown = loadConfig(true, configPath);

  for (const part of key.split('.')) {
    if (!isPlainObject(current)) {
      return undefined;
    }
    current = current[part];
  }

  return current;
}

/**
 * Set a specific config value by dot-notation path
 * Validates the complete config before writing the change back.
 */
export function setConfigValue(key: string, value: string, configPath = getConfigPath()): void {
  const parts = key.split('.').filter((part) => part.length > 0);
  const lastPart = parts.pop();
  if (lastPart === undefined) {
    throw new ConfigError(
      'Invalid config key: empty key',
      'Run: docchat config list  to see available keys'
    );
  }

  if (!OPTIONAL_KEYS.has(key) && getConfigValue(key, configPath) === undefined) {
    throw new ConfigError(`Unknown config key: ${key}`);
  }

  const config: PlainObject = fs.existsSync(configPath) ? readConfigFile(configPath) : {};

  let current = config;
  for (const part of parts) {
    const next = current[part];
    if (isPlainObject(next)) {
      current = next;
    } else {
      const created: PlainObject = {};
      current[part] = created;
      current = created;
    }
  }
  current[lastPart] = parseValue(value);

  // Throws ConfigError with field-level issues when the value is invalid
  mergeWithDefaults(config, configPath);

  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, TOML.stringify(config as TOML.JsonMap), 'utf-8');
}

/**
 * Parse a string value into the appropriate type
 * Handles booleans, numbers, and strings
 */
function parseValue(value: string): unknown {
  if (value.toLowerCase() === 'true') return true;
  if (value.toLowerCase() === 'false') return false;

  const num = Number(value);
  if (!isNaN(num) && value.trim() !== '') return num;

  return value;
}

/**
 * List all config values in a flat format
 * Returns entries like ['chunking.chunk_size', 800]
 */
export function listConfig(configPath = getConfigPath()): Array<[string, unknown]> {
  const entries: Array<[string, unknown]> = [];

  function flatten(obj: PlainObject, prefix = ''): void {
    for (const [key, value] of Object.entries(obj)) {
      const fullKey = prefix ? `${prefix}.${key}` : key;

      if (isPlainObject(value)) {
        flatten(value, fullKey);
      } else {
        entries.push([fullKey, value]);
      }
    }
  }

  flatten(loadConfig(true, configPath));
  return entries;
}
