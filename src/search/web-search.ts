/**
 * Web Search
 *
 * DuckDuckGo text search (via duck-duck-scrape) plus the helpers that turn
 * a conversation into a search query and the results into a prompt block.
 *
 * A failing search never fails the chat turn: the error is reported as a
 * single pseudo-result so the model (and the user) can see what happened.
 */

import DDG, { type SafeSearchType } from 'duck-duck-scrape';

import type { WebSearchConfig } from '../config/index.js';
import type { ChatMessage } from '../agent/types.js';
import type { ChatCompletionService } from '../providers/completion.js';
import { consoleLogger, type Logger } from '../utils/index.js';
import type { WebSearchResult } from './types.js';

// ============================================================================
// Provider
// ============================================================================

export interface WebSearchProvider {
  /** Up to maxResults results; never rejects */
  search(query: string, maxResults: number): Promise<WebSearchResult[]>;
}

/** Default number of web results */
export const DEFAULT_SEARCH_RESULTS = 5;

/** Title of the pseudo-result that carries a search failure */
export const SEARCH_ERROR_TITLE = 'Search error';

/**
 * Signature of the duck-duck-scrape search function, narrowed to what is used.
 */
export type DuckDuckGoSearchFn = (
  query: string,
  options: { safeSearch: SafeSearchType; region: string }
) => Promise<{ noResults: boolean; results: Array<{ title: string; url: string; description: string }> }>;

const SAFE_SEARCH: Record<WebSearchConfig['safe_search'], SafeSearchType> = {
  strict: DDG.SafeSearchType.STRICT,
  moderate: DDG.SafeSearchType.MODERATE,
  off: DDG.SafeSearchType.OFF,
};

/** Descriptions come back with <b> highlighting */
function stripTags(html: string): string {
  return html.replace(/<[^>]*>/g, '');
}

export class DuckDuckGoSearchProvider implements WebSearchProvider {
  private readonly region: string;
  private readonly safeSearch: SafeSearchType;
  private readonly searchFn: DuckDuckGoSearchFn;

  constructor(
    options: Partial<Pick<WebSearchConfig, 'region' | 'safe_search'>> = {},
    searchFn: DuckDuckGoSearchFn = DDG.search
  ) {
    this.region = options.region ?? 'us-en';
    this.safeSearch = SAFE_SEARCH[options.safe_search ?? 'moderate'];
    this.searchFn = searchFn;
  }

  async search(query: string, maxResults: number = DEFAULT_SEARCH_RESULTS): Promise<WebSearchResult[]> {
    if (!query.trim()) {
      return [];
    }

    try {
      const response = await this.searchFn(query, {
        safeSearch: this.safeSearch,
        region: this.region,
      });
      if (response.noResults) {
        return [];
      }
      return response.results.slice(0, Math.max(0, maxResults)).map((result) => ({
        title: result.title,
        url: result.url,
        snippet: stripTags(result.description),
      }));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return [{ title: SEARCH_ERROR_TITLE, url: '', snippet: message }];
    }
  }
}

// ============================================================================
// Rendering
// ============================================================================

/**
 * Numbered result list for the prompt:
 *
 * ```
 * [1] Title
 * URL: https://example.com
 * Snippet: ...
 * ```
 */
export function renderSearchBlock(results: readonly WebSearchResult[]): string {
  return results
    .map(
      (result, i) =>
        `[${i + 1}] ${result.title || 'No title'}\nURL: ${result.url || ''}\nSnippet: ${result.snippet || ''}`
    )
    .join('\n\n');
}

// ============================================================================
// Query generation
// ============================================================================

const QUERY_GENERATOR_PROMPT =
  'You are an internet query generator. This is a chat history between a chatbot and the user. ' +
  'You as the query generator must generate a search query based on the conversation history so far.';

const QUERY_GENERATOR_INSTRUCTION =
  'Create an internet search query based on the conversation history so far.';

/**
 * Ask the model for a search query that fits the conversation.
 * Double quotes are removed so the query isn't run as an exact phrase.
 */
export async function generateSearchQuery(
  history: readonly ChatMessage[],
  model: string,
  completion: ChatCompletionService
): Promise<string> {
  const messages: ChatMessage[] = [
    { role: 'user', content: QUERY_GENERATOR_PROMPT },
    { role: 'user', content: `${JSON.stringify(history)}\n${QUERY_GENERATOR_INSTRUCTION}` },
  ];

  const query = await completion.complete(messages, { model });
  return query.replace(/"/g, '').trim();
}

export interface SearchContextOptions {
  /** Used verbatim instead of a generated query when non-empty */
  override?: string;
  /** Conversation so far, including the latest user turn */
  history: readonly ChatMessage[];
  model: string;
  completion: ChatCompletionService;
  provider: WebSearchProvider;
  /** @default 5 */
  resultCount?: number;
  logger?: Logger;
}

export interface SearchContext {
  /** "Web Search Results:\n..." or "" */
  block: string;
  /** Query that was searched ("" when none) */
  query: string;
  results: WebSearchResult[];
}

/**
 * Run the turn's web search and render it for the prompt.
 *
 * A failed query generation is logged and treated as "no query"; search
 * failures arrive as a pseudo-result from the provider.
 */
export async function buildSearchContext(options: SearchContextOptions): Promise<SearchContext> {
  const logger = options.logger ?? consoleLogger;

  let query = options.override?.trim() ?? '';
  if (!query) {
    try {
      query = await generateSearchQuery(options.history, options.model, options.completion);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.warn(`Could not generate a search query: ${message}`);
      query = '';
    }
  }

  if (!query) {
    return { block: '', query: '', results: [] };
  }

  logger.debug?.(`Searching the web for: ${query}`);
  const results = await options.provider.search(query, options.resultCount ?? DEFAULT_SEARCH_RESULTS);
  const block = results.length > 0 ? `Web Search Results:\n${renderSearchBlock(results)}` : '';

  return { block, query, results };
}
