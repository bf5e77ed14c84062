/**
 * Terminal rendering for chat turns: cited chunks and web results.
 */

import chalk from 'chalk';

import { formatHit } from '../../search/formatter.js';
import type { SearchHit, WebSearchResult } from '../../search/types.js';

/** Snippet length for cited chunks in the terminal */
export const SOURCE_SNIPPET_LENGTH = 120;

/**
 * "Sources:" block listing the cited chunks, or "" when none were cited.
 */
export function renderSources(hits: readonly SearchHit[]): string {
  if (hits.length === 0) {
    return '';
  }

  const blocks = hits.map((hit) => {
    const [header = '', ...rest] = formatHit(hit, { snippetLength: SOURCE_SNIPPET_LENGTH }).split('\n');
    return [chalk.cyan(header), ...rest.map((line) => chalk.dim(line))].join('\n');
  });

  return `${chalk.bold('Sources:')}\n${blocks.join('\n')}`;
}

/**
 * One line per web result: "[1] Title - https://..."
 */
export function renderWebResults(query: string, results: readonly WebSearchResult[]): string {
  if (!query) {
    return '';
  }

  const header = `${chalk.bold('Web search:')} ${query}`;
  if (results.length === 0) {
    return `${header}\n${chalk.dim('  (no results)')}`;
  }

  const lines = results.map(
    (result, i) => `  [${i + 1}] ${result.title}${result.url ? chalk.dim(` - ${result.url}`) : ''}`
  );
  return [header, ...lines].join('\n');
}
