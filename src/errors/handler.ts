/**
 * Error formatting and display for the docchat CLI
 *
 * - Colored error output for the terminal
 * - JSON output for scripting (`--json`)
 * - Stack traces in verbose mode
 */

import chalk from 'chalk';
import { CLIError } from './types.js';

/**
 * Options for error handling behavior
 */
export interface ErrorHandlerOptions {
  /** Show full stack traces */
  verbose?: boolean;
  /** Output as JSON instead of formatted text */
  json?: boolean;
}

/**
 * Structured error for JSON output
 */
export interface ErrorOutput {
  error: string;
  code: number;
  hint?: string;
  stack?: string;
}

/**
 * Normalize any thrown value into the JSON output shape.
 */
function toErrorOutput(error: unknown, verbose: boolean): ErrorOutput {
  if (error instanceof CLIError) {
    return {
      error: error.message,
      code: error.code,
      hint: error.hint,
      stack: verbose ? error.stack : undefined,
    };
  }

  if (error instanceof Error) {
    return {
      error: error.message,
      code: 1,
      stack: verbose ? error.stack : undefined,
    };
  }

  return { error: String(error), code: 1 };
}

/**
 * Format an error for display.
 *
 * Kept separate from handleError so formatting can be tested without
 * process.exit.
 */
export function formatError(
  error: unknown,
  options: ErrorHandlerOptions = {}
): string {
  const { verbose = false, json = false } = options;
  const output = toErrorOutput(error, verbose);

  if (json) {
    return JSON.stringify(output, null, 2);
  }

  const lines: string[] = [chalk.red('Error: ') + output.error];

  if (output.hint) {
    lines.push(chalk.dim('Hint: ') + output.hint);
  }

  if (output.stack) {
    lines.push('');
    lines.push(chalk.dim('Stack trace:'));
    lines.push(chalk.dim(output.stack));
  } else if (error instanceof Error && !(error instanceof CLIError)) {
    // Plain errors carry no hint of their own
    lines.push(chalk.dim('Hint: ') + 'Run with --verbose for more details');
  }

  return lines.join('\n');
}

/**
 * Get the exit code for an error.
 *
 * CLIError has a specific code, everything else is 1.
 */
export function getExitCode(error: unknown): number {
  if (error instanceof CLIError) {
    return error.code;
  }
  return 1;
}

/**
 * Format an error to stderr and exit with its code.
 */
export function handleError(
  error: unknown,
  options: ErrorHandlerOptions = {}
): never {
  console.error(formatError(error, options));
  process.exit(getExitCode(error));
}

/**
 * Create a handler suitable for process 'uncaughtException' and
 * 'unhandledRejection' events.
 */
export function createGlobalErrorHandler(
  options: ErrorHandlerOptions = {}
): (error: unknown) => never {
  return (error: unknown) => handleError(error, options);
}
