/**
 * Chunker Configuration
 *
 * Defaults and validation for chunk options. Sizes are measured in
 * characters, not tokens: documents are split before any tokenizer runs.
 */

import { z } from 'zod';
import { ValidationError } from '../../errors/index.js';
import type { ChunkOptions, ResolvedChunkOptions } from './types.js';

export const DEFAULT_CHUNK_SIZE = 800;
export const DEFAULT_CHUNK_OVERLAP = 120;

/** Anything shorter is treated as noise (page numbers, stray headings) */
export const MIN_CHUNK_LENGTH = 20;

export const ChunkOptionsSchema = z
  .object({
    chunkSize: z.number().int().min(1).default(DEFAULT_CHUNK_SIZE),
    overlap: z.number().int().min(0).default(DEFAULT_CHUNK_OVERLAP),
    minChunkLength: z.number().int().min(0).default(MIN_CHUNK_LENGTH),
  })
  .refine((options) => options.overlap < options.chunkSize, {
    message: 'overlap must be smaller than chunkSize',
    path: ['overlap'],
  });

/**
 * Fill in defaults and validate.
 *
 * @throws ValidationError with one issue per invalid field
 */
export function resolveChunkOptions(options: ChunkOptions = {}): ResolvedChunkOptions {
  const result = ChunkOptionsSchema.safeParse(options);

  if (!result.success) {
    throw new ValidationError(
      'Invalid chunk options',
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  return result.data;
}
