/**
 * Context Assembler
 *
 * Builds the message list for one chat request:
 *
 * ```
 * [system, ...earlier turns, user(question + web results + document chunks)]
 * ```
 *
 * then trims it to the model's context window.
 */

import { DEFAULT_TOP_K, searchDocumentsForContext } from '../search/retriever.js';
import type { RetrievalSession } from '../search/store.js';
import type { ChunkReference, SearchHit } from '../search/types.js';
import { trimToBudget, type Tokenizer } from './budget.js';
import { augmentUserMessage, buildSystemPrompt } from './prompts.js';
import type { ChatMessage } from './types.js';

/** Heading placed above the document context inside the user turn */
export const UPLOADED_DOCUMENTS_HEADER = 'Uploaded Documents:';

export interface AssembleOptions {
  /** The user's latest question */
  query: string;

  /** Conversation so far; a trailing user turn is the current question and is left out */
  history: readonly ChatMessage[];

  /** Uploaded documents (defaults to the retrieval session's) */
  documents?: readonly string[];

  retrieval: RetrievalSession;

  /** Rendered web results ("" when no search ran) */
  searchBlock?: string;

  webSearchEnabled?: boolean;

  /** Model context window in tokens */
  contextLength: number;

  topK?: number;
  tokenizer?: Tokenizer;
  minTruncationTokens?: number;
}

export interface AssembledPrompt {
  /** Trimmed messages, ready for the completion service */
  messages: ChatMessage[];
  systemPrompt: string;
  /** "Retrieved Document Context:\n..." or "" */
  docsContext: string;
  hits: SearchHit[];
  references: ChunkReference[];
}

/**
 * Earlier turns, without the user turn that carries the current question.
 */
function priorTurns(history: readonly ChatMessage[]): ChatMessage[] {
  const turns = history.filter((message) => message.role !== 'system');
  const last = turns[turns.length - 1];
  return last?.role === 'user' ? turns.slice(0, -1) : turns;
}

export async function assembleMessages(options: AssembleOptions): Promise<AssembledPrompt> {
  const documents = options.documents ?? options.retrieval.documents;
  const searchBlock = options.searchBlock ?? '';

  const { context: docsContext, result } = await searchDocumentsForContext(
    options.retrieval,
    options.query,
    documents,
    options.topK ?? DEFAULT_TOP_K
  );

  const sections: string[] = [];
  if (searchBlock) {
    sections.push(searchBlock);
  }
  if (docsContext) {
    sections.push(`${UPLOADED_DOCUMENTS_HEADER}\n${docsContext}`);
  }
  const contextPrefix = sections.join('\n\n').trim();

  const systemPrompt = buildSystemPrompt({
    webSearchEnabled: options.webSearchEnabled ?? false,
    documentContextEnabled: docsContext.length > 0,
  });

  const messages: ChatMessage[] = [
    { role: 'system', content: systemPrompt },
    ...priorTurns(options.history),
    { role: 'user', content: augmentUserMessage(options.query, contextPrefix) },
  ];

  return {
    messages: trimToBudget(messages, options.contextLength, {
      tokenizer: options.tokenizer,
      minTruncationTokens: options.minTruncationTokens,
    }),
    systemPrompt,
    docsContext,
    hits: result.hits,
    references: result.references,
  };
}
