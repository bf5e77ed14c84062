/**
 * docchat - Library Entry Point
 *
 * The CLI (`docchat chat`, `docchat ask`) is the usual way in. This module
 * exports the pieces it is built from, for embedding document chat in
 * other programs.
 *
 * @example
 * ```typescript
 * import {
 *   ChatSession,
 *   RetrievalSession,
 *   HashEmbedder,
 *   createCompletionService,
 * } from 'docchat';
 *
 * const session = new ChatSession({
 *   completion: createCompletionService({ apiKey: process.env.OPENROUTER_API_KEY }),
 *   retrieval: new RetrievalSession({ embedder: new HashEmbedder() }),
 * });
 * session.addDocuments(['The sky is blue. Water is wet.']);
 *
 * for await (const event of session.ask('What color is the sky?', {
 *   model: 'some/free-model',
 *   contextLength: 8192,
 * })) {
 *   if (event.type === 'delta') process.stdout.write(event.text);
 * }
 * ```
 *
 * @packageDocumentation
 */

export * from './agent/index.js';
export * from './indexer/index.js';
export * from './search/index.js';
export * from './providers/index.js';
export * from './errors/index.js';
export type { Logger } from './utils/index.js';
