/**
 * Ask Command
 *
 * One-shot question with optional document and web context:
 *
 *   docchat ask "What does the report conclude?" --file report.pdf
 *   docchat ask "Latest Node.js LTS?" --search
 *   docchat ask "Summarize" --file notes.md --context-only
 *
 * --context-only prints the prompt that would be sent instead of calling
 * the model, so it works without OPENROUTER_API_KEY.
 */

import { Command } from 'commander';
import chalk from 'chalk';

import { assembleMessages } from '../../agent/assembler.js';
import { loadConfig } from '../../config/index.js';
import { CLIError, CompletionError } from '../../errors/index.js';
import { readUploadedFile } from '../../indexer/extractor/index.js';
import { formatReference } from '../../search/formatter.js';
import type { ChunkReference, WebSearchResult } from '../../search/types.js';
import { DuckDuckGoSearchProvider, renderSearchBlock } from '../../search/web-search.js';
import type { CommandContext } from '../types.js';
import { renderSources, renderWebResults } from '../utils/render.js';
import {
  createChatRuntime,
  createRetrieval,
  parseTemperature,
  parseTopK,
  readFiles,
} from '../utils/runtime.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Command-specific options parsed from CLI arguments.
 */
interface AskCommandOptions {
  /** Files to upload before asking */
  file?: string[];
  /** Run a web search for this question */
  search?: boolean;
  /** Search for this text instead of a generated query (implies --search) */
  searchQuery?: string;
  topK?: string;
  model?: string;
  temperature?: string;
  /** Print the assembled prompt without calling the model */
  contextOnly?: boolean;
}

/**
 * JSON output format for the ask command.
 */
interface AskOutputJSON {
  question: string;
  answer: string;
  model: string;
  searchQuery: string;
  searchResults: WebSearchResult[];
  /** Cited chunks as "D{doc}-{chunk}" labels */
  sources: string[];
}

function toLabels(references: readonly ChunkReference[]): string[] {
  return references.map(formatReference);
}

function toCompletionError(error: Error): CompletionError {
  return error instanceof CompletionError ? error : new CompletionError(error.message, error);
}

// ============================================================================
// Context only
// ============================================================================

async function printContextOnly(
  ctx: CommandContext,
  question: string,
  options: AskCommandOptions,
  topK: number | undefined
): Promise<void> {
  const config = loadConfig();
  const retrieval = await createRetrieval(config, ctx);

  const files = await readFiles(options.file ?? []);
  const texts = await Promise.all(files.map((file) => readUploadedFile(file, ctx)));
  retrieval.addDocuments(texts.filter((text) => text.trim().length > 0));

  // Query generation needs the model, so only an explicit query is searched here
  let searchBlock = '';
  let searchResults: WebSearchResult[] = [];
  const searchQuery = options.searchQuery?.trim() ?? '';
  if (searchQuery) {
    const provider = new DuckDuckGoSearchProvider(config.web_search);
    searchResults = await provider.search(searchQuery, config.web_search.results);
    if (searchResults.length > 0) {
      searchBlock = `Web Search Results:\n${renderSearchBlock(searchResults)}`;
    }
  } else if (options.search) {
    ctx.warn('--context-only searches only with --search-query; skipping web search');
  }

  const assembled = await assembleMessages({
    query: question,
    history: [],
    retrieval,
    searchBlock,
    webSearchEnabled: searchQuery.length > 0,
    contextLength: Number.POSITIVE_INFINITY,
    topK: topK ?? config.retrieval.top_k,
  });

  if (ctx.options.json) {
    console.log(
      JSON.stringify(
        {
          question,
          messages: assembled.messages,
          searchQuery,
          searchResults,
          sources: toLabels(assembled.references),
        },
        null,
        2
      )
    );
    return;
  }

  for (const message of assembled.messages) {
    ctx.log(chalk.bold(`[${message.role}]`));
    ctx.log(message.content);
    ctx.log('');
  }
}

// ============================================================================
// Command Factory
// ============================================================================

/**
 * Create the ask command.
 *
 * @param getContext - Factory to get command context with global options
 */
export function createAskCommand(getContext: () => CommandContext): Command {
  return new Command('ask')
    .argument('<question>', 'Question to answer')
    .description('Ask a single question, optionally with uploaded files and web search')
    .option('-f, --file <path...>', 'Upload files (.pdf, .docx, .txt, .md) as context')
    .option('-s, --search', 'Add DuckDuckGo web search results')
    .option('-q, --search-query <text>', 'Search for this text (implies --search)')
    .option('-k, --top-k <number>', 'Number of document chunks to cite')
    .option('-m, --model <name>', 'Model name or id (see: docchat models)')
    .option('-t, --temperature <number>', 'Sampling temperature (0-2)')
    .option('--context-only', 'Print the assembled prompt without calling the model')
    .action(async (question: string, cmdOptions: AskCommandOptions) => {
      const ctx = getContext();

      const trimmedQuestion = question.trim();
      if (!trimmedQuestion) {
        throw new CLIError(
          'Question cannot be empty',
          'Provide a question, e.g.: docchat ask "What does the report conclude?"'
        );
      }

      const topK = cmdOptions.topK === undefined ? undefined : parseTopK(cmdOptions.topK);
      const temperature =
        cmdOptions.temperature === undefined ? undefined : parseTemperature(cmdOptions.temperature);
      const webSearch = Boolean(cmdOptions.search || cmdOptions.searchQuery);

      ctx.debug(`Question: "${trimmedQuestion}"`);
      ctx.debug(`Options: ${JSON.stringify(cmdOptions)}`);

      if (cmdOptions.contextOnly) {
        await printContextOnly(ctx, trimmedQuestion, cmdOptions, topK);
        return;
      }

      const runtime = await createChatRuntime(ctx, { model: cmdOptions.model, temperature, topK });

      if (cmdOptions.file && cmdOptions.file.length > 0) {
        const ingest = await runtime.session.ingestFiles(await readFiles(cmdOptions.file));
        ctx.debug(`Uploaded: ${ingest.added.join(', ') || 'none'}`);
      }

      const output: AskOutputJSON = {
        question: trimmedQuestion,
        answer: '',
        model: runtime.model.id,
        searchQuery: '',
        searchResults: [],
        sources: [],
      };
      let sources = '';

      const events = runtime.session.ask(trimmedQuestion, {
        model: runtime.model.id,
        contextLength: runtime.model.contextLength,
        temperature: runtime.temperature,
        webSearch,
        searchQueryOverride: cmdOptions.searchQuery,
      });

      for await (const event of events) {
        switch (event.type) {
          case 'context':
            output.searchQuery = event.searchQuery;
            output.searchResults = event.searchResults;
            output.sources = toLabels(event.references);
            sources = renderSources(event.hits);
            if (!ctx.options.json && event.searchQuery) {
              ctx.log(renderWebResults(event.searchQuery, event.searchResults));
              ctx.log('');
            }
            break;

          case 'delta':
            output.answer += event.text;
            if (!ctx.options.json) {
              process.stdout.write(event.text);
            }
            break;

          case 'complete':
            output.answer = event.content;
            break;

          case 'error':
            if (!ctx.options.json) {
              console.log();
            }
            throw toCompletionError(event.error);
        }
      }

      if (ctx.options.json) {
        console.log(JSON.stringify(output, null, 2));
        return;
      }

      console.log();
      if (sources) {
        ctx.log('');
        ctx.log(sources);
      }
    });
}
