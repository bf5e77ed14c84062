/**
 * Chat Command
 *
 * Interactive multi-turn chat with uploaded documents and optional web
 * search. History and documents live for the session only.
 *
 *   docchat chat
 *   docchat chat --file report.pdf notes.md --model "Some Model"
 *
 * REPL Commands:
 *   /help                 - Show available commands
 *   /ingest <path...>     - Upload files
 *   /docs                 - Show how many documents are loaded
 *   /clear-docs           - Remove all documents
 *   /clear                - Clear conversation history
 *   /search on|off        - Toggle web search
 *   /search-query <text>  - Search for fixed text (empty = generate from chat)
 *   /model <name>         - Switch model
 *   exit                  - Exit the chat
 */

import * as readline from 'node:readline';
import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';

import { formatError } from '../../errors/index.js';
import { findModel, type ModelDescriptor } from '../../providers/index.js';
import type { CommandContext } from '../types.js';
import { renderSources, renderWebResults } from '../utils/render.js';
import {
  createChatRuntime,
  parseTemperature,
  readFiles,
  type ChatRuntime,
} from '../utils/runtime.js';

// ============================================================================
// Types
// ============================================================================

interface ChatCommandOptions {
  file?: string[];
  model?: string;
  temperature?: string;
}

/**
 * Mutable state for the chat REPL.
 */
export interface ChatState {
  runtime: ChatRuntime;
  model: ModelDescriptor;
  webSearch: boolean;
  /** Fixed search text; "" means generate a query from the conversation */
  searchQuery: string;
}

const HELP_TEXT = `
${chalk.bold('Commands:')}
  ${chalk.cyan('/ingest <path...>')}     Upload files (.pdf, .docx, .txt, .md)
  ${chalk.cyan('/docs')}                 Show loaded documents
  ${chalk.cyan('/clear-docs')}           Remove all documents
  ${chalk.cyan('/clear')}                Clear conversation history
  ${chalk.cyan('/search on|off')}        Toggle web search
  ${chalk.cyan('/search-query <text>')}  Search for fixed text (no text = generate from chat)
  ${chalk.cyan('/model <name>')}         Switch model
  ${chalk.cyan('/help')}                 Show this help
  ${chalk.cyan('exit')}                  Exit the chat
`.trim();

// ============================================================================
// REPL commands
// ============================================================================

/**
 * Upload files into the session and report what happened.
 */
async function ingestPaths(paths: readonly string[], state: ChatState, ctx: CommandContext): Promise<void> {
  if (paths.length === 0) {
    ctx.log(chalk.yellow('Usage: /ingest <path...>'));
    return;
  }

  const spinner = ora(`Reading ${paths.length} file(s)...`).start();
  try {
    const files = await readFiles(paths);
    const result = await state.runtime.session.ingestFiles(files);
    spinner.stop();
    if (result.added.length > 0) {
      ctx.log(`${chalk.green('✓')} Added ${result.added.join(', ')}`);
    }
    if (result.skipped.length > 0) {
      ctx.log(chalk.yellow(`Skipped ${result.skipped.join(', ')}`));
    }
  } catch (error) {
    spinner.stop();
    ctx.log(formatError(error, { verbose: ctx.options.verbose }));
  }
}

/**
 * Handle a line starting with "/".
 *
 * @returns false when the command is unknown
 */
export async function handleReplCommand(
  input: string,
  state: ChatState,
  ctx: CommandContext
): Promise<boolean> {
  const [command = '', ...args] = input.trim().split(/\s+/);
  const rest = input.trim().slice(command.length).trim();

  switch (command.toLowerCase()) {
    case '/help':
      ctx.log(HELP_TEXT);
      return true;

    case '/ingest':
      await ingestPaths(args, state, ctx);
      return true;

    case '/docs': {
      const count = state.runtime.session.documents.length;
      ctx.log(count === 0 ? chalk.dim('No documents loaded') : `${count} document(s) loaded`);
      return true;
    }

    case '/clear-docs':
      state.runtime.session.clearDocuments();
      ctx.log(`${chalk.green('✓')} Documents cleared`);
      return true;

    case '/clear':
      state.runtime.session.clearHistory();
      ctx.log(`${chalk.green('✓')} Conversation cleared`);
      return true;

    case '/search': {
      const value = args[0]?.toLowerCase();
      if (value === 'on' || value === 'off') {
        state.webSearch = value === 'on';
      } else if (value !== undefined) {
        ctx.log(chalk.yellow('Usage: /search on|off'));
        return true;
      }
      ctx.log(`Web search is ${state.webSearch ? chalk.green('on') : chalk.dim('off')}`);
      return true;
    }

    case '/search-query':
      state.searchQuery = rest;
      ctx.log(
        rest
          ? `Searching for: ${chalk.cyan(rest)}`
          : 'Search queries are generated from the conversation'
      );
      return true;

    case '/model': {
      if (!rest) {
        ctx.log(`Model: ${chalk.cyan(state.model.name)} ${chalk.dim(`(${state.model.id})`)}`);
        return true;
      }
      const model = findModel(state.runtime.models, rest);
      if (!model) {
        ctx.log(chalk.yellow(`Unknown model: ${rest}`));
        return true;
      }
      state.model = model;
      ctx.log(`${chalk.green('✓')} Using ${chalk.cyan(model.name)}`);
      return true;
    }

    default:
      return false;
  }
}

// ============================================================================
// Turns
// ============================================================================

/**
 * Stream one answer to the terminal. Errors are shown, not thrown, so the
 * REPL keeps running.
 */
export async function runTurn(question: string, state: ChatState, ctx: CommandContext): Promise<void> {
  let sources = '';

  const events = state.runtime.session.ask(question, {
    model: state.model.id,
    contextLength: state.model.contextLength,
    temperature: state.runtime.temperature,
    webSearch: state.webSearch,
    searchQueryOverride: state.searchQuery,
  });

  for await (const event of events) {
    switch (event.type) {
      case 'context':
        sources = renderSources(event.hits);
        if (event.searchQuery) {
          ctx.log(renderWebResults(event.searchQuery, event.searchResults));
          ctx.log('');
        }
        process.stdout.write(chalk.bold('Assistant: '));
        break;

      case 'delta':
        process.stdout.write(event.text);
        break;

      case 'complete':
        process.stdout.write('\n');
        if (sources) {
          ctx.log('');
          ctx.log(sources);
        }
        break;

      case 'error':
        process.stdout.write('\n');
        ctx.error(event.error.message);
        break;
    }
  }
}

// ============================================================================
// Command Factory
// ============================================================================

export function createChatCommand(getContext: () => CommandContext): Command {
  return new Command('chat')
    .description('Start an interactive chat with document and web context')
    .option('-f, --file <path...>', 'Upload files before the first question')
    .option('-m, --model <name>', 'Model name or id (see: docchat models)')
    .option('-t, --temperature <number>', 'Sampling temperature (0-2)')
    .action(async (cmdOptions: ChatCommandOptions) => {
      const ctx = getContext();
      const temperature =
        cmdOptions.temperature === undefined ? undefined : parseTemperature(cmdOptions.temperature);

      const runtime = await createChatRuntime(ctx, { model: cmdOptions.model, temperature });
      const state: ChatState = {
        runtime,
        model: runtime.model,
        webSearch: false,
        searchQuery: '',
      };

      if (cmdOptions.file && cmdOptions.file.length > 0) {
        await ingestPaths(cmdOptions.file, state, ctx);
      }

      ctx.log(chalk.bold(`docchat`) + chalk.dim(` - ${state.model.name}`));
      ctx.log(chalk.dim('Type /help for commands, exit to quit.'));
      ctx.log('');

      const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
      rl.setPrompt(chalk.green('You: '));
      rl.prompt();

      for await (const line of rl) {
        const input = line.trim();

        if (input === 'exit' || input === 'quit') {
          break;
        }

        if (input.startsWith('/')) {
          if (!(await handleReplCommand(input, state, ctx))) {
            ctx.log(chalk.yellow(`Unknown command: ${input.split(/\s+/)[0]} (try /help)`));
          }
        } else if (input) {
          await runTurn(input, state, ctx);
        }

        ctx.log('');
        rl.prompt();
      }

      rl.close();
      ctx.log(chalk.dim('Goodbye!'));
    });
}
