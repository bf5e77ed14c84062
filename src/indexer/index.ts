/**
 * Indexer Module
 *
 * Everything between an uploaded file and its vectors:
 * - extractor: file bytes → text (pdf, docx, txt, md)
 * - chunker: text → overlapping, size-bounded chunks
 * - embedder: chunks → vectors (OpenAI-compatible endpoint or local hashing)
 *
 * @example
 * ```ts
 * import { chunkDocuments, HashEmbedder } from './indexer/index.js';
 *
 * const chunks = chunkDocuments(['The sky is blue. Water is wet.']);
 * const vectors = await new HashEmbedder().embed(chunks.map((c) => c.text));
 * ```
 */

export * from './chunker/index.js';
export * from './embedder/index.js';
export * from './extractor/index.js';
