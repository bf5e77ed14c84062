/**
 * Search Module Types
 *
 * Shapes shared by the retrieval index, similarity search and web search.
 */

import type { IndexedChunk } from '../indexer/chunker/index.js';
import type { TextEmbedder } from '../indexer/embedder/index.js';

/**
 * In-memory index over the session's documents.
 *
 * `chunks[i]` and `embeddings[i]` describe the same chunk. The embedder that
 * produced the vectors is kept so queries are embedded the same way.
 */
export interface RetrievalIndex {
  readonly chunks: readonly IndexedChunk[];
  readonly embeddings: readonly number[][];
  /** SHA-256 of the documents the index was built from ("" when empty) */
  readonly fingerprint: string;
  readonly embedder: TextEmbedder;
}

/**
 * Citation target: document and chunk ordinals, both 1-based.
 */
export interface ChunkReference {
  documentIndex: number;
  chunkIndex: number;
}

/**
 * A ranked chunk.
 */
export interface SearchHit extends IndexedChunk {
  /** Cosine similarity to the query, in [-1, 1] */
  similarity: number;
}

/**
 * Output of searchDocuments. All three arrays share the same order.
 */
export interface DocumentSearchResult {
  /** Citation blocks: "[D{doc}-{chunk}] (sim=0.000)\n{text}" */
  lines: string[];
  references: ChunkReference[];
  hits: SearchHit[];
}

/**
 * A single web search result.
 */
export interface WebSearchResult {
  title: string;
  url: string;
  snippet: string;
}

/**
 * Options for display formatting of hits (CLI output).
 */
export interface FormatOptions {
  /** Maximum snippet length in characters (default 200) */
  snippetLength?: number;
}
