/**
 * Test Doubles
 *
 * In-process stand-ins for the pieces that would otherwise need a network
 * or a real tokenizer.
 */

import { vi, type Mock } from 'vitest';

import type { Tokenizer } from '../agent/budget.js';
import type { ChatMessage } from '../agent/types.js';
import type { ChatCompletionService, CompletionRequest } from '../providers/completion.js';
import type { WebSearchProvider } from '../search/web-search.js';
import type { WebSearchResult } from '../search/types.js';
import type { Logger } from '../utils/index.js';

/**
 * Logger whose methods are spies.
 */
export function createMockLogger(): {
  warn: Mock<(message: string) => void>;
  debug: Mock<(message: string) => void>;
} & Logger {
  return {
    warn: vi.fn<(message: string) => void>(),
    debug: vi.fn<(message: string) => void>(),
  };
}

/**
 * Tokenizer where every whitespace-separated word is one token.
 *
 * Token ids index into a vocabulary shared by encode and decode, so
 * decode(encode(text).slice(0, n)) is the first n words joined by spaces.
 */
export function createWordTokenizer(): Tokenizer {
  const vocabulary: string[] = [];
  const ids = new Map<string, number>();

  return {
    encode(text: string): number[] {
      return text
        .split(/\s+/)
        .filter((word) => word.length > 0)
        .map((word) => {
          let id = ids.get(word);
          if (id === undefined) {
            id = vocabulary.length;
            vocabulary.push(word);
            ids.set(word, id);
          }
          return id;
        });
    },
    decode(tokens: number[]): string {
      return tokens.map((id) => vocabulary[id] ?? '').join(' ');
    },
  };
}

/**
 * One scripted reply: text deltas, optionally followed by a failure.
 */
export interface ScriptedReply {
  deltas: string[];
  error?: Error;
}

/**
 * Completion service that plays back scripted replies in order and records
 * every request it receives.
 */
export class ScriptedCompletionService implements ChatCompletionService {
  readonly calls: Array<{ messages: ChatMessage[]; request: CompletionRequest; stream: boolean }> = [];
  private readonly replies: ScriptedReply[];

  constructor(replies: Array<ScriptedReply | string>) {
    this.replies = replies.map((reply) => (typeof reply === 'string' ? { deltas: [reply] } : reply));
  }

  private next(): ScriptedReply {
    const reply = this.replies.shift();
    if (!reply) {
      throw new Error('No scripted reply left');
    }
    return reply;
  }

  async complete(messages: readonly ChatMessage[], request: CompletionRequest): Promise<string> {
    this.calls.push({ messages: [...messages], request, stream: false });
    const reply = this.next();
    if (reply.error) {
      throw reply.error;
    }
    return reply.deltas.join('');
  }

  async *stream(messages: readonly ChatMessage[], request: CompletionRequest): AsyncIterable<string> {
    this.calls.push({ messages: [...messages], request, stream: true });
    const reply = this.next();
    for (const delta of reply.deltas) {
      yield delta;
    }
    if (reply.error) {
      throw reply.error;
    }
  }
}

/**
 * Web search provider returning fixed results and recording queries.
 */
export function createStaticSearchProvider(
  results: WebSearchResult[]
): WebSearchProvider & { search: Mock<WebSearchProvider['search']> } {
  return {
    search: vi.fn<WebSearchProvider['search']>(async () => results),
  };
}
