/**
 * Chat Session
 *
 * One conversation: uploaded documents, history, and the turn loop.
 *
 * Turn flow (ask):
 * ```
 * record user turn
 *   ├── web search (optional) → "Web Search Results:" block
 *   ├── assemble [system, ...history, augmented user] and trim to budget
 *   ├── yield context
 *   ├── stream completion → yield delta per chunk
 *   └── yield complete | error
 * record assistant turn (always, even when the caller stops early)
 * ```
 */

import { readUploadedFile, type UploadedFile } from '../indexer/extractor/index.js';
import type { ChatCompletionService } from '../providers/completion.js';
import { DEFAULT_TOP_K } from '../search/retriever.js';
import type { RetrievalSession } from '../search/store.js';
import {
  DEFAULT_SEARCH_RESULTS,
  buildSearchContext,
  type SearchContext,
  type WebSearchProvider,
} from '../search/web-search.js';
import { consoleLogger, type Logger } from '../utils/index.js';
import { assembleMessages } from './assembler.js';
import type { Tokenizer } from './budget.js';
import type { AskOptions, ChatEvent, ChatMessage } from './types.js';

export interface ChatSessionOptions {
  completion: ChatCompletionService;
  retrieval: RetrievalSession;
  /** Needed only for turns with webSearch enabled */
  searchProvider?: WebSearchProvider;
  logger?: Logger;

  /** Chunks cited per turn (default 5) */
  topK?: number;
  /** Web results per search (default 5) */
  searchResults?: number;
  tokenizer?: Tokenizer;
  minTruncationTokens?: number;
}

/**
 * Outcome of ingestFiles.
 */
export interface IngestResult {
  /** Files whose text was added, in input order */
  added: string[];
  /** Files that produced no text */
  skipped: string[];
}

/**
 * Text of an error turn: what arrived so far plus a note.
 */
function errorContent(partial: string, error: Error): string {
  const note = `Error: ${error.message}`;
  return partial ? `${partial}\n\n${note}` : note;
}

function noSearch(): SearchContext {
  return { block: '', query: '', results: [] };
}

export class ChatSession {
  private turns: ChatMessage[] = [];
  private readonly completion: ChatCompletionService;
  private readonly retrieval: RetrievalSession;
  private readonly searchProvider?: WebSearchProvider;
  private readonly logger: Logger;
  private readonly topK: number;
  private readonly searchResults: number;
  private readonly tokenizer?: Tokenizer;
  private readonly minTruncationTokens?: number;

  constructor(options: ChatSessionOptions) {
    this.completion = options.completion;
    this.retrieval = options.retrieval;
    this.searchProvider = options.searchProvider;
    this.logger = options.logger ?? consoleLogger;
    this.topK = options.topK ?? DEFAULT_TOP_K;
    this.searchResults = options.searchResults ?? DEFAULT_SEARCH_RESULTS;
    this.tokenizer = options.tokenizer;
    this.minTruncationTokens = options.minTruncationTokens;
  }

  /** User and assistant turns so far */
  get history(): readonly ChatMessage[] {
    return this.turns;
  }

  get documents(): readonly string[] {
    return this.retrieval.documents;
  }

  /**
   * Extract every file concurrently and add the non-empty texts as
   * documents, keeping input order.
   */
  async ingestFiles(files: readonly UploadedFile[]): Promise<IngestResult> {
    const texts = await Promise.all(files.map((file) => readUploadedFile(file, this.logger)));

    const result: IngestResult = { added: [], skipped: [] };
    const documents: string[] = [];

    texts.forEach((text, i) => {
      const name = files[i]?.name ?? `file ${i + 1}`;
      if (text.trim()) {
        documents.push(text);
        result.added.push(name);
      } else {
        this.logger.warn(`No text extracted from ${name}`);
        result.skipped.push(name);
      }
    });

    this.retrieval.addDocuments(documents);
    return result;
  }

  /** Add already-extracted texts */
  addDocuments(texts: readonly string[]): void {
    this.retrieval.addDocuments(texts.filter((text) => text.trim().length > 0));
  }

  clearDocuments(): void {
    this.retrieval.clearDocuments();
  }

  clearHistory(): void {
    this.turns = [];
  }

  /**
   * Run one chat turn.
   *
   * Completion failures don't throw: they end the turn with an error event,
   * and the history records the partial reply plus an "Error:" note.
   */
  async *ask(input: string, options: AskOptions): AsyncGenerator<ChatEvent, void, unknown> {
    this.turns.push({ role: 'user', content: input });

    let content = '';
    let recorded = false;
    const record = (text: string): void => {
      if (!recorded) {
        this.turns.push({ role: 'assistant', content: text });
        recorded = true;
      }
    };

    try {
      const search = options.webSearch ? await this.search(options) : noSearch();

      const assembled = await assembleMessages({
        query: input,
        history: this.turns,
        retrieval: this.retrieval,
        searchBlock: search.block,
        webSearchEnabled: options.webSearch ?? false,
        contextLength: options.contextLength,
        topK: this.topK,
        tokenizer: this.tokenizer,
        minTruncationTokens: this.minTruncationTokens,
      });

      yield {
        type: 'context',
        messages: assembled.messages,
        searchQuery: search.query,
        searchResults: search.results,
        hits: assembled.hits,
        references: assembled.references,
      };

      const stream = this.completion.stream(assembled.messages, {
        model: options.model,
        temperature: options.temperature,
        signal: options.signal,
      });
      for await (const delta of stream) {
        content += delta;
        yield { type: 'delta', text: delta };
      }

      record(content);
      yield { type: 'complete', content };
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      const recordedContent = errorContent(content, err);
      record(recordedContent);
      yield { type: 'error', error: err, content: recordedContent };
    } finally {
      // Caller stopped iterating: keep what arrived
      record(content);
    }
  }

  private async search(options: AskOptions): Promise<SearchContext> {
    if (!this.searchProvider) {
      this.logger.warn('Web search requested but no search provider is configured');
      return noSearch();
    }

    return buildSearchContext({
      override: options.searchQueryOverride,
      history: this.turns,
      model: options.model,
      completion: this.completion,
      provider: this.searchProvider,
      resultCount: this.searchResults,
      logger: this.logger,
    });
  }
}
