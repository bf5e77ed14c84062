/**
 * Model Catalog
 *
 * Fetches OpenRouter's public model list and keeps the free tier: models
 * whose prompt and completion prices both fall below a configured bound.
 * OpenRouter appends " (free)" to those models' names; it is stripped for
 * display.
 */

import { z } from 'zod';

import { ConfigError, ModelCatalogError } from '../errors/index.js';

// ============================================================================
// SCHEMA
// ============================================================================

/** Prices arrive as decimal strings ("0", "0.0000015") */
const PriceSchema = z.union([z.string(), z.number()]).transform((value) => Number(value));

const CatalogEntrySchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  context_length: z.number().nullish(),
  pricing: z.object({
    prompt: PriceSchema,
    completion: PriceSchema,
  }),
  top_provider: z
    .object({
      context_length: z.number().nullish(),
    })
    .nullish(),
});

const CatalogResponseSchema = z.object({
  data: z.array(CatalogEntrySchema),
});

export type CatalogEntry = z.infer<typeof CatalogEntrySchema>;

// ============================================================================
// TYPES
// ============================================================================

export interface ModelDescriptor {
  id: string;
  /** Display name without the " (free)" suffix */
  name: string;
  /** Context window in tokens */
  contextLength: number;
  /** USD per token */
  pricing: { prompt: number; completion: number };
}

export interface FetchModelCatalogOptions {
  url: string;

  /** Upper bound (exclusive) on both prices, in USD per million tokens */
  maxPricePerMillion: number;

  /** Injected for tests; defaults to the global fetch */
  fetch?: typeof globalThis.fetch;

  signal?: AbortSignal;
}

/** Used when the catalog reports no context length at all */
export const DEFAULT_CONTEXT_LENGTH = 4096;

const FREE_SUFFIX = ' (free)';

// ============================================================================
// FUNCTIONS
// ============================================================================

/**
 * Keep entries whose prompt and completion prices are both below the bound
 * and convert them to descriptors. Catalog order is preserved.
 */
export function filterFreeModels(
  entries: readonly CatalogEntry[],
  maxPricePerMillion: number
): ModelDescriptor[] {
  return entries
    .filter(
      (entry) =>
        entry.pricing.prompt * 1e6 < maxPricePerMillion &&
        entry.pricing.completion * 1e6 < maxPricePerMillion
    )
    .map((entry) => ({
      id: entry.id,
      name: entry.name.replace(FREE_SUFFIX, ''),
      contextLength:
        entry.top_provider?.context_length ?? entry.context_length ?? DEFAULT_CONTEXT_LENGTH,
      pricing: { prompt: entry.pricing.prompt, completion: entry.pricing.completion },
    }));
}

/**
 * Fetch the catalog and return the free-tier models.
 *
 * @throws ModelCatalogError on network failure, a non-2xx response, or a
 *   body without a valid "data" list
 */
export async function fetchModelCatalog(options: FetchModelCatalogOptions): Promise<ModelDescriptor[]> {
  const fetchFn = options.fetch ?? globalThis.fetch;

  let response: Response;
  try {
    response = await fetchFn(options.url, {
      headers: { Accept: 'application/json' },
      signal: options.signal,
    });
  } catch (error) {
    const cause = error instanceof Error ? error : undefined;
    throw new ModelCatalogError(
      `Failed to fetch models from ${options.url}: ${cause?.message ?? String(error)}`,
      cause
    );
  }

  if (!response.ok) {
    throw new ModelCatalogError(`Failed to fetch models from ${options.url}: HTTP ${response.status}`);
  }

  let body: unknown;
  try {
    body = await response.json();
  } catch (error) {
    throw new ModelCatalogError(
      'Model catalog response is not valid JSON',
      error instanceof Error ? error : undefined
    );
  }

  const parsed = CatalogResponseSchema.safeParse(body);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ModelCatalogError(
      `Unexpected model catalog format${issue ? ` at ${issue.path.join('.') || 'root'}: ${issue.message}` : ''}`
    );
  }

  return filterFreeModels(parsed.data.data, options.maxPricePerMillion);
}

/**
 * Find a model by id, then by display name (exact, then case-insensitive).
 */
export function findModel(
  models: readonly ModelDescriptor[],
  nameOrId: string
): ModelDescriptor | undefined {
  const lowered = nameOrId.toLowerCase();
  return (
    models.find((model) => model.id === nameOrId) ??
    models.find((model) => model.name === nameOrId) ??
    models.find((model) => model.name.toLowerCase() === lowered)
  );
}

/**
 * Pick the session's model: the preferred one when given, else the first
 * model in the catalog.
 *
 * @throws ConfigError when the catalog is empty or the preferred model is not in it
 */
export function resolveModel(
  models: readonly ModelDescriptor[],
  preferred: string | undefined
): ModelDescriptor {
  if (preferred) {
    const match = findModel(models, preferred);
    if (!match) {
      throw new ConfigError(
        `Unknown model: ${preferred}`,
        'Run: docchat models  to list available models'
      );
    }
    return match;
  }

  const [first] = models;
  if (!first) {
    throw new ConfigError(
      'No free models available',
      'Raise models.max_price_per_million or check models.catalog_url'
    );
  }
  return first;
}
