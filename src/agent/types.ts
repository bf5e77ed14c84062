/**
 * Chat Types
 *
 * Messages exchanged with the completion service and the events a chat
 * turn emits while it runs.
 */

import type { ChunkReference, SearchHit, WebSearchResult } from '../search/types.js';

export type ChatRole = 'system' | 'user' | 'assistant';

/**
 * One chat message. History holds only user and assistant turns; the
 * system message is rebuilt for every request.
 */
export interface ChatMessage {
  role: ChatRole;
  content: string;
}

/**
 * Per-turn options for ChatSession.ask().
 */
export interface AskOptions {
  /** Model id sent to the completion service */
  model: string;

  /** Context window of the model in tokens */
  contextLength: number;

  /** Sampling temperature (default 1.0) */
  temperature?: number;

  /** Run a web search for this turn */
  webSearch?: boolean;

  /** Search for this text instead of generating a query from the history */
  searchQueryOverride?: string;

  /** Cancels the completion request */
  signal?: AbortSignal;
}

/**
 * Emitted once the prompt is assembled, before the model is called.
 */
export interface ContextEvent {
  type: 'context';
  /** Messages sent to the model after trimming */
  messages: ChatMessage[];
  /** Web search query actually used ("" when no search ran) */
  searchQuery: string;
  searchResults: WebSearchResult[];
  /** Chunks cited in the document context */
  hits: SearchHit[];
  references: ChunkReference[];
}

export interface DeltaEvent {
  type: 'delta';
  text: string;
}

export interface CompleteEvent {
  type: 'complete';
  /** Full assistant reply, as recorded in the history */
  content: string;
}

export interface ErrorEvent {
  type: 'error';
  error: Error;
  /** What was recorded in the history for this turn */
  content: string;
}

export type ChatEvent = ContextEvent | DeltaEvent | CompleteEvent | ErrorEvent;
