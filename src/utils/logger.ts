/**
 * Logger interface for library code
 *
 * Library modules (retrieval, extraction, chat session) accept a Logger
 * by injection. The CLI passes its CommandContext, which satisfies this
 * interface; tests pass silentLogger or a vi.fn() based mock.
 */

export interface Logger {
  /** Log a warning message */
  warn: (message: string) => void;
  /** Log a debug message (optional - not all contexts need debug) */
  debug?: (message: string) => void;
}

/**
 * Default console logger for use when no logger is injected.
 */
export const consoleLogger: Logger = {
  warn: (message: string) => console.warn(message),
  debug: (message: string) => console.log(message),
};

/**
 * Silent logger for tests or when logging should be suppressed.
 */
export const silentLogger: Logger = {
  warn: () => {},
  debug: () => {},
};
