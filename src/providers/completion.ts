/**
 * Chat Completion Service
 *
 * Chat completions through OpenRouter's OpenAI-compatible API using the
 * official `openai` client. Replies can be read whole or streamed as text
 * deltas.
 *
 * SECURITY: The API key is read from the environment only when the service
 * is created and never appears in errors or logs.
 */

import OpenAI from 'openai';

import { getEnv } from '../config/index.js';
import { APIKeyError, CompletionError } from '../errors/index.js';
import type { ChatMessage } from '../agent/types.js';

// ============================================================================
// TYPES
// ============================================================================

export interface CompletionRequest {
  /** Model id, e.g. "meta-llama/llama-3.3-70b-instruct:free" */
  model: string;

  /** Sampling temperature */
  temperature?: number;

  /** Aborts the HTTP request */
  signal?: AbortSignal;
}

/**
 * Anything that can answer a conversation.
 * ChatSession depends on this interface; tests pass a scripted fake.
 */
export interface ChatCompletionService {
  /** Full reply in one piece */
  complete(messages: readonly ChatMessage[], request: CompletionRequest): Promise<string>;

  /**
   * Reply as text deltas. The iterable is lazy and forward-only; a failure
   * surfaces as a rejected iteration step.
   */
  stream(messages: readonly ChatMessage[], request: CompletionRequest): AsyncIterable<string>;
}

export interface CompletionServiceOptions {
  /** Overrides OPENROUTER_API_KEY */
  apiKey?: string;

  /** Overrides OPENROUTER_BASE_URL */
  baseURL?: string;

  /**
   * Request timeout in milliseconds.
   * @default 120000
   */
  timeout?: number;

  /**
   * Maximum number of retries for failed requests.
   * @default 2
   */
  maxRetries?: number;
}

// ============================================================================
// CONSTANTS
// ============================================================================

const DEFAULT_TIMEOUT_MS = 120_000;
const DEFAULT_MAX_RETRIES = 2;

/** Sent so OpenRouter can attribute requests to the app */
const APP_TITLE = 'docchat';

// ============================================================================
// IMPLEMENTATION
// ============================================================================

function toMessageParam(message: ChatMessage): OpenAI.Chat.ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
  }
}

function toCompletionError(error: unknown): CompletionError {
  if (error instanceof CompletionError) {
    return error;
  }
  if (error instanceof Error) {
    return new CompletionError(`Completion request failed: ${error.message}`, error);
  }
  return new CompletionError(`Completion request failed: ${String(error)}`);
}

/**
 * ChatCompletionService backed by an OpenAI client pointed at OpenRouter.
 */
export class OpenRouterCompletionService implements ChatCompletionService {
  constructor(private readonly client: OpenAI) {}

  async complete(messages: readonly ChatMessage[], request: CompletionRequest): Promise<string> {
    try {
      const response = await this.client.chat.completions.create(
        {
          model: request.model,
          messages: messages.map(toMessageParam),
          temperature: request.temperature,
          stream: false,
        },
        { signal: request.signal }
      );
      return response.choices[0]?.message.content ?? '';
    } catch (error) {
      throw toCompletionError(error);
    }
  }

  async *stream(messages: readonly ChatMessage[], request: CompletionRequest): AsyncIterable<string> {
    try {
      const stream = await this.client.chat.completions.create(
        {
          model: request.model,
          messages: messages.map(toMessageParam),
          temperature: request.temperature,
          stream: true,
        },
        { signal: request.signal }
      );

      for await (const chunk of stream) {
        const delta = chunk.choices[0]?.delta?.content;
        if (delta) {
          yield delta;
        }
      }
    } catch (error) {
      throw toCompletionError(error);
    }
  }
}

// ============================================================================
// FACTORY FUNCTION
// ============================================================================

/**
 * Create the completion service from the environment.
 *
 * @throws APIKeyError if OPENROUTER_API_KEY is not set
 *
 * @example
 * ```typescript
 * const completion = createCompletionService();
 * for await (const delta of completion.stream(messages, { model })) {
 *   process.stdout.write(delta);
 * }
 * ```
 */
export function createCompletionService(
  options: CompletionServiceOptions = {}
): OpenRouterCompletionService {
  const apiKey = options.apiKey ?? getEnv('OPENROUTER_API_KEY');
  if (!apiKey) {
    throw new APIKeyError('OpenRouter', 'OPENROUTER_API_KEY');
  }

  const client = new OpenAI({
    apiKey,
    baseURL: options.baseURL ?? getEnv('OPENROUTER_BASE_URL'),
    timeout: options.timeout ?? DEFAULT_TIMEOUT_MS,
    maxRetries: options.maxRetries ?? DEFAULT_MAX_RETRIES,
    defaultHeaders: { 'X-Title': APP_TITLE },
  });

  return new OpenRouterCompletionService(client);
}
