/**
 * Search Result Formatter
 *
 * Citation blocks for the prompt, plus short human-readable lines for the
 * CLI's source listings.
 *
 * @example
 * ```typescript
 * formatCitation(hit);
 * // [D1-2] (sim=0.873)
 * // Water boils at 100 degrees Celsius at sea level...
 *
 * formatHit(hit);
 * // [D1-2] 0.873
 * //   Water boils at 100 degrees Celsius at sea level...
 * ```
 *
 * @packageDocumentation
 */

import type { ChunkReference, FormatOptions, SearchHit } from './types.js';

// ============================================================================
// Constants
// ============================================================================

/** Default maximum snippet length in characters */
const DEFAULT_SNIPPET_LENGTH = 200;

/** Indent for snippet content in text output */
const SNIPPET_INDENT = '  ';

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Format a similarity as a 3-decimal string.
 *
 * @example
 * ```typescript
 * formatSimilarity(0.87349)  // "0.873"
 * formatSimilarity(0)        // "0.000"
 * ```
 */
export function formatSimilarity(similarity: number): string {
  return similarity.toFixed(3);
}

/**
 * Citation label for a chunk, e.g. "D2-5".
 */
export function formatReference(reference: ChunkReference): string {
  return `D${reference.documentIndex}-${reference.chunkIndex}`;
}

/**
 * Truncate content to a maximum length with ellipsis.
 *
 * Newlines and runs of whitespace collapse to single spaces so snippets
 * fit on one CLI line.
 */
export function truncateSnippet(content: string, maxLength: number = DEFAULT_SNIPPET_LENGTH): string {
  const normalized = content.replace(/\s+/g, ' ').trim();

  if (normalized.length <= maxLength) {
    return normalized;
  }

  return normalized.slice(0, maxLength) + '...';
}

// ============================================================================
// Formatting Functions
// ============================================================================

/**
 * Citation block included in the prompt's document context.
 */
export function formatCitation(hit: SearchHit): string {
  return `[${formatReference(hit)}] (sim=${formatSimilarity(hit.similarity)})\n${hit.text}`;
}

/**
 * Two-line display form of a hit: label and score, then an indented snippet.
 */
export function formatHit(hit: SearchHit, options: FormatOptions = {}): string {
  const { snippetLength = DEFAULT_SNIPPET_LENGTH } = options;

  const header = `[${formatReference(hit)}] ${formatSimilarity(hit.similarity)}`;
  return `${header}\n${SNIPPET_INDENT}${truncateSnippet(hit.text, snippetLength)}`;
}

/**
 * Format several hits, separated by blank lines.
 */
export function formatHits(hits: readonly SearchHit[], options: FormatOptions = {}): string {
  return hits.map((hit) => formatHit(hit, options)).join('\n\n');
}
