/**
 * Logger Interface for Library Code
 *
 * Core workspace code accepts a Logger via dependency injection. The CLI
 * passes its CommandContext (which satisfies Logger), tests pass mocks,
 * and library callers get the silent logger by default.
 */

/**
 * Generic logger interface for library code
 *
 * Compatible with CommandContext so you can pass ctx directly.
 */
export interface Logger {
  /** Log a warning message */
  warn: (message: string) => void;
  /** Log a debug message (optional - not all contexts need debug) */
  debug?: (message: string) => void;
}

/**
 * Console logger for library callers that want output without a CLI.
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
