/**
 * Token Budgeter
 *
 * Counts and truncates text with a tiktoken encoding and trims a
 * conversation so it fits a model's context window.
 *
 * Counts are an approximation of the target model's tokenizer: OpenRouter
 * models use many different tokenizers, and cl100k_base is a reasonable
 * common estimate.
 */

import { getEncoding, type TiktokenEncoding } from 'js-tiktoken';

import type { ChatMessage } from './types.js';

/**
 * Anything that can turn text into tokens and back.
 * Tests inject a whitespace tokenizer for predictable counts.
 */
export interface Tokenizer {
  encode(text: string): number[];
  decode(tokens: number[]): string;
}

export const DEFAULT_ENCODING: TiktokenEncoding = 'cl100k_base';

/** Remaining budget a message must leave room for before it is truncated */
export const DEFAULT_MIN_TRUNCATION_TOKENS = 100;

const tokenizers = new Map<TiktokenEncoding, Tokenizer>();

/**
 * Get a cached tokenizer for a tiktoken encoding.
 *
 * Special-token text such as "<|endoftext|>" in user content is encoded as
 * ordinary text instead of raising.
 */
export function getTokenizer(encoding: TiktokenEncoding = DEFAULT_ENCODING): Tokenizer {
  const cached = tokenizers.get(encoding);
  if (cached) {
    return cached;
  }

  const tiktoken = getEncoding(encoding);
  const tokenizer: Tokenizer = {
    encode: (text) => tiktoken.encode(text, [], []),
    decode: (tokens) => tiktoken.decode(tokens),
  };
  tokenizers.set(encoding, tokenizer);
  return tokenizer;
}

/**
 * Number of tokens in a text.
 */
export function countTokens(text: string, tokenizer: Tokenizer = getTokenizer()): number {
  return tokenizer.encode(text).length;
}

/**
 * Cut text to at most maxTokens tokens.
 * Text that already fits is returned unchanged.
 */
export function truncateToTokens(
  text: string,
  maxTokens: number,
  tokenizer: Tokenizer = getTokenizer()
): string {
  const tokens = tokenizer.encode(text);
  if (tokens.length <= maxTokens) {
    return text;
  }
  return tokenizer.decode(tokens.slice(0, Math.max(0, maxTokens)));
}

export interface TrimOptions {
  tokenizer?: Tokenizer;

  /**
   * The first message that doesn't fit is kept in truncated form only when
   * more than this many tokens remain.
   * @default 100
   */
  minTruncationTokens?: number;
}

/**
 * Trim a conversation to fit maxTokens.
 *
 * 1. The first system message is always kept and counted first, even if it
 *    alone exceeds the budget.
 * 2. Remaining messages are taken newest first while they fit, and keep
 *    their chronological order after the system message.
 * 3. The first message that doesn't fit is truncated to the remaining budget
 *    when that budget exceeds minTruncationTokens, otherwise dropped.
 *    Everything older is dropped.
 *
 * Never throws on overflow.
 */
export function trimToBudget(
  messages: readonly ChatMessage[],
  maxTokens: number,
  options: TrimOptions = {}
): ChatMessage[] {
  const tokenizer = options.tokenizer ?? getTokenizer();
  const minTruncationTokens = options.minTruncationTokens ?? DEFAULT_MIN_TRUNCATION_TOKENS;

  let system: ChatMessage | undefined;
  const others: ChatMessage[] = [];
  for (const message of messages) {
    if (message.role === 'system' && system === undefined) {
      system = message;
    } else {
      others.push(message);
    }
  }

  let total = system ? countTokens(system.content, tokenizer) : 0;
  const kept: ChatMessage[] = [];

  for (let i = others.length - 1; i >= 0; i--) {
    const message = others[i];
    if (message === undefined) {
      continue;
    }

    const tokens = countTokens(message.content, tokenizer);
    if (total + tokens <= maxTokens) {
      kept.unshift(message);
      total += tokens;
      continue;
    }

    const remaining = maxTokens - total;
    if (tokens > 0 && remaining > minTruncationTokens) {
      kept.unshift({
        role: message.role,
        content: truncateToTokens(message.content, remaining, tokenizer),
      });
    }
    break;
  }

  return system ? [system, ...kept] : kept;
}
