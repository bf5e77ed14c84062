/**
 * Similarity Search
 *
 * Ranks the session's chunks against a query by cosine similarity and
 * renders the top results as citation blocks for the prompt.
 */

import { formatCitation } from './formatter.js';
import type { RetrievalSession } from './store.js';
import type { DocumentSearchResult, SearchHit } from './types.js';

/** Default number of chunks returned */
export const DEFAULT_TOP_K = 5;

/** Heading that starts the document context block */
export const DOCS_CONTEXT_HEADER = 'Retrieved Document Context:';

/**
 * Cosine similarity of two vectors.
 *
 * Returns 0 for empty vectors, vectors of different length, or a zero
 * vector on either side.
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length === 0 || b.length === 0 || a.length !== b.length) {
    return 0;
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }

  if (normA === 0 || normB === 0) {
    return 0;
  }
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/**
 * Find the topK chunks most similar to the query.
 *
 * Ties keep index order (Array.prototype.sort is stable). At least one
 * result is returned whenever the index has chunks, even for topK <= 0.
 */
export async function searchDocuments(
  session: RetrievalSession,
  query: string,
  documents: readonly string[] = session.documents,
  topK: number = DEFAULT_TOP_K
): Promise<DocumentSearchResult> {
  const { index, vector } = await session.embedQuery(query, documents);

  if (index.chunks.length === 0) {
    return { lines: [], references: [], hits: [] };
  }

  const scored: SearchHit[] = index.chunks.map((chunk, i) => ({
    ...chunk,
    similarity: cosineSimilarity(vector, index.embeddings[i] ?? []),
  }));
  scored.sort((a, b) => b.similarity - a.similarity);

  const hits = scored.slice(0, Math.max(1, topK));

  return {
    lines: hits.map(formatCitation),
    references: hits.map(({ documentIndex, chunkIndex }) => ({ documentIndex, chunkIndex })),
    hits,
  };
}

/**
 * Document context block for the prompt, or "" when there are no documents
 * or the query is empty.
 */
export async function buildDocsContext(
  session: RetrievalSession,
  query: string,
  documents: readonly string[] = session.documents,
  topK: number = DEFAULT_TOP_K
): Promise<string> {
  const result = await searchDocumentsForContext(session, query, documents, topK);
  return result.context;
}

/**
 * Like buildDocsContext, but also returns the search result so callers can
 * report which chunks were cited.
 */
export async function searchDocumentsForContext(
  session: RetrievalSession,
  query: string,
  documents: readonly string[] = session.documents,
  topK: number = DEFAULT_TOP_K
): Promise<{ context: string; result: DocumentSearchResult }> {
  if (documents.length === 0 || !query) {
    return { context: '', result: { lines: [], references: [], hits: [] } };
  }

  const result = await searchDocuments(session, query, documents, topK);
  const context = `${DOCS_CONTEXT_HEADER}\n${result.lines.join('\n\n')}`;
  return { context, result };
}
