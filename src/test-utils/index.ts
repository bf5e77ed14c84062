/**
 * Test Utilities Module
 *
 * Shared test doubles for the logger, tokenizer, completion service and
 * web search.
 *
 * @example
 * ```typescript
 * import { createWordTokenizer, ScriptedCompletionService } from '../../test-utils/index.js';
 *
 * const tokenizer = createWordTokenizer();
 * const completion = new ScriptedCompletionService(['Hello!']);
 * ```
 */

export {
  createMockLogger,
  createWordTokenizer,
  createStaticSearchProvider,
  ScriptedCompletionService,
  type ScriptedReply,
} from './mocks.js';
