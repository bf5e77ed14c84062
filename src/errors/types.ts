/**
 * Error type definitions for docchat
 *
 * Every error carries a recovery hint and a process exit code.
 */

/**
 * Base class for all docchat errors.
 *
 * - hint: Tells the user HOW to fix the problem
 * - code: Allows scripts to handle different errors differently
 */
export class CLIError extends Error {
  /** Recovery suggestion shown to the user */
  public readonly hint?: string;

  /** Exit code (1-255, 0 is reserved for success) */
  public readonly code: number;

  constructor(message: string, hint?: string, code: number = 1) {
    super(message);
    // Required for instanceof checks after transpilation
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = 'CLIError';
    this.hint = hint;
    this.code = code;
  }
}

/**
 * Thrown when a file passed for ingestion doesn't exist.
 *
 * Exit code 3: File not found
 */
export class FileNotFoundError extends CLIError {
  constructor(path: string) {
    super(
      `Path does not exist: ${path}`,
      'Check the path and try again',
      3
    );
    this.name = 'FileNotFoundError';
  }
}

/**
 * Thrown for configuration-related errors.
 *
 * Examples:
 * - Invalid TOML syntax
 * - Values outside their allowed range
 * - Unknown config keys
 *
 * Exit code 2: Configuration error
 */
export class ConfigError extends CLIError {
  constructor(message: string, hint?: string) {
    super(
      message,
      hint ?? 'Run: docchat config list  to see valid options',
      2
    );
    this.name = 'ConfigError';
  }
}

/**
 * Thrown when an API key is missing.
 *
 * The hint names the exact env var to set.
 *
 * Exit code 4: API key error
 */
export class APIKeyError extends CLIError {
  constructor(provider: string, envVar?: string) {
    const envVarName = envVar ?? `${provider.toUpperCase()}_API_KEY`;
    super(
      `${provider} API key not configured`,
      `Set the ${envVarName} environment variable (a .env file in the working directory also works)`,
      4
    );
    this.name = 'APIKeyError';
  }
}

/**
 * Thrown when input validation fails.
 *
 * Used with Zod schemas to provide field-level errors.
 *
 * Exit code 1: General error (validation is user input error)
 */
export class ValidationError extends CLIError {
  /** Individual validation issues */
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    const hint =
      issues.length > 0
        ? `Issues:\n  ${issues.join('\n  ')}`
        : 'Check your input and try again';
    super(message, hint, 1);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

/**
 * Thrown when the chat completion service fails (network, rate limit, auth).
 *
 * Exit code 7: Completion error
 */
export class CompletionError extends CLIError {
  /** The original client error for debugging */
  public override readonly cause?: Error;

  constructor(message: string, cause?: Error) {
    super(
      message,
      'Check OPENROUTER_API_KEY, the selected model, and your network connection',
      7
    );
    this.name = 'CompletionError';
    this.cause = cause;
  }
}

/**
 * Thrown when the model catalog cannot be fetched or parsed.
 *
 * Exit code 8: Model catalog error
 */
export class ModelCatalogError extends CLIError {
  public override readonly cause?: Error;

  constructor(message: string, cause?: Error) {
    super(
      message,
      'Check models.catalog_url in the config and your network connection',
      8
    );
    this.name = 'ModelCatalogError';
    this.cause = cause;
  }
}
