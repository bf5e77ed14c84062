/**
 * Prompt Text
 *
 * System prompt and the wrapper that puts retrieved context around the
 * user's question.
 */

const BASE_PROMPT =
  "You are a friendly and helpful assistant. If there is insufficient information to answer the user's question, " +
  'state so and suggest uploading files or enabling web search. ' +
  'Never produce links that are not for the homepage of a well-known source, ' +
  'but feel free to write links present in the context of this conversation. ' +
  'Always direct your answer to the user.';

const DOCUMENT_CLAUSE = ' Use uploaded document context when relevant.';

const WEB_SEARCH_CLAUSE =
  ' Use web search when relevant.' +
  ' Always cite sources in clickable markdown links: [source](https://example.com).';

export interface SystemPromptOptions {
  webSearchEnabled: boolean;
  documentContextEnabled: boolean;
}

/**
 * System prompt for one request. Clauses are appended only for the context
 * sources that are active this turn.
 */
export function buildSystemPrompt(options: SystemPromptOptions): string {
  let prompt = BASE_PROMPT;
  if (options.documentContextEnabled) {
    prompt += DOCUMENT_CLAUSE;
  }
  if (options.webSearchEnabled) {
    prompt += WEB_SEARCH_CLAUSE;
  }
  return prompt;
}

/**
 * Wrap the question with its context. The question is returned unchanged
 * when there is no context.
 */
export function augmentUserMessage(question: string, contextPrefix: string): string {
  if (!contextPrefix) {
    return question;
  }

  return [
    `Question:\n${question}`,
    `Context:\nYour answer is only allowed to reference information in this context:\n${contextPrefix}`,
    'The user cannot see the context. Cite and copy the exact link to the relevant documents in the context ' +
      'so the user can verify the answer.',
  ].join('\n\n---\n\n');
}
