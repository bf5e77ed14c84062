/**
 * Chunker Module
 *
 * Splits uploaded documents into overlapping chunks for retrieval.
 */

export { splitIntoChunks, chunkDocuments } from './chunker.js';

export {
  ChunkOptionsSchema,
  resolveChunkOptions,
  DEFAULT_CHUNK_SIZE,
  DEFAULT_CHUNK_OVERLAP,
  MIN_CHUNK_LENGTH,
} from './config.js';

export type { ChunkOptions, ResolvedChunkOptions, IndexedChunk } from './types.js';
