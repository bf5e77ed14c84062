/**
 * Chunker Types
 *
 * Documents are plain text. A chunk remembers which document it came from
 * and its position within that document so search results can cite it.
 */

/**
 * Options accepted by splitIntoChunks. Lengths are in characters.
 */
export interface ChunkOptions {
  /** Target chunk size (default 800) */
  chunkSize?: number;

  /** Characters carried from the end of one chunk into the next (default 120) */
  overlap?: number;

  /** Chunks shorter than this are dropped (default 20) */
  minChunkLength?: number;
}

/** ChunkOptions with every field resolved */
export type ResolvedChunkOptions = Required<ChunkOptions>;

/**
 * A chunk of an uploaded document, positioned for citation.
 *
 * Both ordinals are 1-based: the first chunk of the first document is D1-1.
 */
export interface IndexedChunk {
  /** Chunk text (already trimmed) */
  text: string;

  /** 1-based position of the source document in the session's list */
  documentIndex: number;

  /** 1-based position of the chunk within its document */
  chunkIndex: number;
}
