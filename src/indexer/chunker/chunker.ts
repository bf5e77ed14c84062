/**
 * Document Chunker
 *
 * Splits document text into overlapping, size-bounded chunks.
 *
 * Lines are packed into a buffer until the next line would push it past
 * chunkSize. The buffer is then emitted and the next one starts with the
 * last `overlap` characters of the previous buffer, so a sentence cut at a
 * boundary still appears whole in one of the two chunks. A single line
 * longer than the window is cut at fixed offsets.
 *
 * Every emitted chunk is between minChunkLength and chunkSize + overlap
 * characters long.
 */

import { resolveChunkOptions } from './config.js';
import type { ChunkOptions, IndexedChunk } from './types.js';

/**
 * Line boundaries: \n, \r\n and \r, plus vertical tab, form feed, the
 * file/group/record separators, NEL and the Unicode line/paragraph separators.
 */
const LINE_BREAK = /\r\n|[\n\r\v\f\x1c\x1d\x1e\x85\u2028\u2029]/;

/**
 * Split text into chunks.
 *
 * Deterministic: identical input and options always yield identical output.
 *
 * @example
 * ```typescript
 * splitIntoChunks('a'.repeat(2000), { chunkSize: 800, overlap: 120 });
 * // => three chunks of 800, 800 and 640 characters
 * ```
 *
 * @throws ValidationError if the options are invalid
 */
export function splitIntoChunks(text: string, options: ChunkOptions = {}): string[] {
  const { chunkSize, overlap, minChunkLength } = resolveChunkOptions(options);

  const chunks: string[] = [];
  let buffer = '';

  for (const rawLine of text.split(LINE_BREAK)) {
    const line = rawLine.trim();
    if (!line) {
      continue;
    }

    if (buffer.length + line.length + 1 > chunkSize && buffer) {
      chunks.push(buffer.trim());
      const tail = overlap > 0 ? buffer.slice(-overlap) : '';
      buffer = `${tail} ${line}`.trim();
    } else {
      buffer = buffer ? `${buffer}\n${line}` : line;
    }

    // Oversized buffer: cut fixed windows, stepping back by the overlap
    while (buffer.length > chunkSize + overlap) {
      chunks.push(buffer.slice(0, chunkSize).trim());
      buffer = buffer.slice(chunkSize - overlap).trim();
    }
  }

  if (buffer.trim()) {
    chunks.push(buffer.trim());
  }

  return chunks.filter((chunk) => chunk.length >= minChunkLength);
}

/**
 * Chunk a list of documents, tagging each chunk with its 1-based
 * document and chunk ordinals. Document order is preserved.
 */
export function chunkDocuments(
  documents: readonly string[],
  options: ChunkOptions = {}
): IndexedChunk[] {
  const result: IndexedChunk[] = [];

  documents.forEach((document, docIdx) => {
    splitIntoChunks(document, options).forEach((text, chunkIdx) => {
      result.push({
        text,
        documentIndex: docIdx + 1,
        chunkIndex: chunkIdx + 1,
      });
    });
  });

  return result;
}
