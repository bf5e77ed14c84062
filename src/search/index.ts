/**
 * Search Module
 *
 * Retrieval over uploaded documents plus web search:
 * - RetrievalSession: documents and their fingerprint-gated index
 * - searchDocuments / buildDocsContext: cosine top-K with [Dn-m] citations
 * - DuckDuckGoSearchProvider / buildSearchContext: web results for the prompt
 *
 * @example
 * ```typescript
 * import { RetrievalSession, buildDocsContext } from './search/index.js';
 * import { HashEmbedder } from './indexer/index.js';
 *
 * const session = new RetrievalSession({ embedder: new HashEmbedder() });
 * session.addDocuments(['The sky is blue. Water is wet.']);
 *
 * const context = await buildDocsContext(session, 'What color is the sky?');
 * // Retrieved Document Context:
 * // [D1-1] (sim=0.447)
 * // The sky is blue. Water is wet.
 * ```
 *
 * @packageDocumentation
 */

// Retrieval index
export {
  RetrievalSession,
  fingerprintDocuments,
  type RetrievalSessionOptions,
} from './store.js';

// Similarity search
export {
  cosineSimilarity,
  searchDocuments,
  searchDocumentsForContext,
  buildDocsContext,
  DEFAULT_TOP_K,
  DOCS_CONTEXT_HEADER,
} from './retriever.js';

// Formatting
export {
  formatCitation,
  formatHit,
  formatHits,
  formatReference,
  formatSimilarity,
  truncateSnippet,
} from './formatter.js';

// Web search
export {
  DuckDuckGoSearchProvider,
  renderSearchBlock,
  generateSearchQuery,
  buildSearchContext,
  DEFAULT_SEARCH_RESULTS,
  SEARCH_ERROR_TITLE,
  type WebSearchProvider,
  type DuckDuckGoSearchFn,
  type SearchContextOptions,
  type SearchContext,
} from './web-search.js';

// Types
export type {
  RetrievalIndex,
  ChunkReference,
  SearchHit,
  DocumentSearchResult,
  WebSearchResult,
  FormatOptions,
} from './types.js';
