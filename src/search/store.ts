/**
 * Retrieval Session
 *
 * Holds one conversation's uploaded documents and the in-memory index built
 * from them:
 * - the index is rebuilt only when the documents' fingerprint changes
 * - rebuilds are exclusive; concurrent callers share or wait for the
 *   in-flight build and never see a half-built index
 * - if the model-backed embedder fails, the session switches to hashed
 *   embeddings for the rest of its life and rebuilds
 */

import { createHash } from 'node:crypto';

import { chunkDocuments, type ChunkOptions } from '../indexer/chunker/index.js';
import {
  HashEmbedder,
  DEFAULT_HASH_DIMENSIONS,
  type TextEmbedder,
} from '../indexer/embedder/index.js';
import { consoleLogger, type Logger } from '../utils/index.js';
import type { RetrievalIndex } from './types.js';

/** Separator used when hashing the document list */
const FINGERPRINT_SEPARATOR = '\n\n---\n\n';

/**
 * Content fingerprint of a document list: SHA-256 (hex) of the documents
 * joined by a separator, or "" for an empty list.
 */
export function fingerprintDocuments(documents: readonly string[]): string {
  if (documents.length === 0) {
    return '';
  }
  return createHash('sha256').update(documents.join(FINGERPRINT_SEPARATOR)).digest('hex');
}

export interface RetrievalSessionOptions {
  /** Embedder chosen for this session (see createEmbedder) */
  embedder: TextEmbedder;

  /** Chunk size, overlap and minimum length */
  chunking?: ChunkOptions;

  /** Vector size of the hashed embedder used after a model failure (default 512) */
  fallbackDimensions?: number;

  logger?: Logger;
}

interface PendingBuild {
  fingerprint: string;
  promise: Promise<RetrievalIndex>;
}

/**
 * Documents plus their retrieval index for one chat session.
 *
 * @example
 * ```typescript
 * const session = new RetrievalSession({ embedder: new HashEmbedder() });
 * session.addDocuments(['The sky is blue. Water is wet.']);
 * const index = await session.ensure();
 * console.log(index.chunks.length); // 1
 * ```
 */
export class RetrievalSession {
  private docs: string[] = [];
  private index: RetrievalIndex | null = null;

  /** In-flight build, shared by callers asking for the same fingerprint */
  private pending: PendingBuild | null = null;

  private builds = 0;
  private embedder: TextEmbedder;
  private readonly chunking: ChunkOptions;
  private readonly fallbackDimensions: number;
  private readonly logger: Logger;

  constructor(options: RetrievalSessionOptions) {
    this.embedder = options.embedder;
    this.chunking = options.chunking ?? {};
    this.fallbackDimensions = options.fallbackDimensions ?? DEFAULT_HASH_DIMENSIONS;
    this.logger = options.logger ?? consoleLogger;
  }

  /** Uploaded documents in upload order */
  get documents(): readonly string[] {
    return this.docs;
  }

  /** Number of index builds so far */
  get buildCount(): number {
    return this.builds;
  }

  /** Embedder used for the next build */
  get currentEmbedder(): TextEmbedder {
    return this.embedder;
  }

  /**
   * Append documents. The list is replaced, not mutated, so a fingerprint
   * taken earlier still describes the list it was taken from.
   */
  addDocuments(texts: readonly string[]): void {
    this.docs = [...this.docs, ...texts];
  }

  clearDocuments(): void {
    this.docs = [];
  }

  /**
   * Build a fresh index: chunk every document, then embed all chunks in one
   * batched call. No documents (or no chunks) means no embedder call.
   */
  async build(documents: readonly string[]): Promise<RetrievalIndex> {
    const snapshot = [...documents];
    const fingerprint = fingerprintDocuments(snapshot);
    const chunks = chunkDocuments(snapshot, this.chunking);
    this.builds++;

    if (chunks.length === 0) {
      return { chunks, embeddings: [], fingerprint, embedder: this.embedder };
    }

    const texts = chunks.map((chunk) => chunk.text);
    const embedder = this.embedder;
    let embeddings: number[][];
    try {
      embeddings = await embedder.embed(texts);
    } catch (error) {
      if (!this.downgrade(embedder, error)) {
        throw error;
      }
      return this.build(snapshot);
    }

    this.logger.debug?.(
      `Indexed ${chunks.length} chunks from ${snapshot.length} documents with ${embedder.name}`
    );
    return { chunks, embeddings, fingerprint, embedder };
  }

  /**
   * Return the index for `documents`, building it if the fingerprint (or the
   * session's embedder) changed since the last build.
   */
  async ensure(documents: readonly string[] = this.docs): Promise<RetrievalIndex> {
    const fingerprint = fingerprintDocuments(documents);

    if (this.index && this.index.fingerprint === fingerprint && this.index.embedder === this.embedder) {
      return this.index;
    }

    if (this.pending) {
      if (this.pending.fingerprint === fingerprint) {
        return this.pending.promise;
      }
      // A build for other documents is running: let it finish, then re-check
      await Promise.allSettled([this.pending.promise]);
      return this.ensure(documents);
    }

    const promise = this.build(documents);
    this.pending = { fingerprint, promise };

    try {
      const index = await promise;
      this.index = index;
      return index;
    } finally {
      if (this.pending?.promise === promise) {
        this.pending = null;
      }
    }
  }

  /**
   * Embed a query with the embedder that built the current index.
   *
   * If that embedder is the model-backed one and it fails, the session
   * switches to hashing, rebuilds, and embeds the query again.
   */
  async embedQuery(
    query: string,
    documents: readonly string[] = this.docs
  ): Promise<{ index: RetrievalIndex; vector: number[] }> {
    const index = await this.ensure(documents);
    if (index.chunks.length === 0) {
      return { index, vector: [] };
    }

    try {
      const [vector = []] = await index.embedder.embed([query]);
      return { index, vector };
    } catch (error) {
      if (!this.downgrade(index.embedder, error)) {
        throw error;
      }
      return this.embedQuery(query, documents);
    }
  }

  /**
   * Switch to the hashed embedder after `failed` threw.
   * Returns false when there is nothing left to fall back to.
   */
  private downgrade(failed: TextEmbedder, error: unknown): boolean {
    if (failed !== this.embedder) {
      // Another caller already switched
      return true;
    }
    if (failed instanceof HashEmbedder) {
      return false;
    }

    const message = error instanceof Error ? error.message : String(error);
    this.logger.warn(
      `Embedding with ${failed.name} failed (${message}); switching to local hashed embeddings`
    );
    this.embedder = new HashEmbedder(this.fallbackDimensions);
    return true;
  }
}
