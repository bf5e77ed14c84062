/**
 * Agent Module
 *
 * Prompt assembly and the chat turn loop:
 * - budget: token counting and conversation trimming
 * - prompts / assembler: system prompt, context sections, augmented user turn
 * - ChatSession: history, document ingestion, streaming turns
 *
 * @example
 * ```typescript
 * import { ChatSession } from './agent/index.js';
 * import { RetrievalSession } from './search/index.js';
 * import { HashEmbedder } from './indexer/index.js';
 *
 * const session = new ChatSession({
 *   completion,
 *   retrieval: new RetrievalSession({ embedder: new HashEmbedder() }),
 * });
 * session.addDocuments(['The sky is blue. Water is wet.']);
 *
 * for await (const event of session.ask('What color is the sky?', { model, contextLength: 8192 })) {
 *   if (event.type === 'delta') process.stdout.write(event.text);
 * }
 * ```
 */

export {
  getTokenizer,
  countTokens,
  truncateToTokens,
  trimToBudget,
  DEFAULT_ENCODING,
  DEFAULT_MIN_TRUNCATION_TOKENS,
  type Tokenizer,
  type TrimOptions,
} from './budget.js';

export { buildSystemPrompt, augmentUserMessage, type SystemPromptOptions } from './prompts.js';

export {
  assembleMessages,
  UPLOADED_DOCUMENTS_HEADER,
  type AssembleOptions,
  type AssembledPrompt,
} from './assembler.js';

export {
  ChatSession,
  type ChatSessionOptions,
  type IngestResult,
} from './chat-session.js';

export type {
  ChatRole,
  ChatMessage,
  AskOptions,
  ChatEvent,
  ContextEvent,
  DeltaEvent,
  CompleteEvent,
  ErrorEvent,
} from './types.js';
