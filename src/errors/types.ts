/**
 * Error type definitions for Workspace Agent
 *
 * These custom error classes provide:
 * - Actionable error messages with recovery hints
 * - Exit codes for programmatic error handling
 * - Type safety for error handling logic
 */

/**
 * Base class for all workspace errors.
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
 * Thrown for configuration-related errors.
 *
 * Examples:
 * - Invalid TOML syntax
 * - Backend URL that is not http(s)
 * - Out-of-range limits
 *
 * Exit code 2: Configuration error
 */
export class ConfigError extends CLIError {
  constructor(message: string, hint?: string) {
    super(
      message,
      hint ?? 'Run: wsa config list  to see valid options',
      2
    );
    this.name = 'ConfigError';
  }
}

/**
 * Thrown when input validation fails.
 *
 * Used with Zod schemas to provide detailed field-level errors.
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

/** Remote services the orchestrator talks to */
export type BackendService = 'retrieval' | 'assistant' | 'generation';

const BACKEND_HINTS: Record<BackendService, string> = {
  retrieval: 'Check that the retrieval service is running, or set WORKSPACE_RETRIEVAL_URL',
  assistant: 'Check that the assistant service is running, or set WORKSPACE_ASSISTANT_URL',
  generation: 'Check that Ollama is running (ollama serve), or set OLLAMA_HOST',
};

/**
 * Thrown when a backend call fails: transport error, timeout,
 * non-success status, or a body that is not a JSON object.
 *
 * Never retried. Aborts the running strategy.
 *
 * Exit code 6: Backend error
 */
export class BackendError extends CLIError {
  /** Which backend failed */
  public readonly service: BackendService;
  /** Full URL of the failed request */
  public readonly url: string;
  /** HTTP status, when the backend answered at all */
  public readonly status?: number;
  /** The underlying error for debugging */
  public readonly cause?: Error;

  constructor(
    service: BackendService,
    url: string,
    message: string,
    options: { status?: number; cause?: Error } = {}
  ) {
    super(`${message} (${service}: ${url})`, BACKEND_HINTS[service], 6);
    this.name = 'BackendError';
    this.service = service;
    this.url = url;
    this.status = options.status;
    this.cause = options.cause;
  }
}

/**
 * Thrown when the primary study guide document cannot be written.
 *
 * The secondary (PDF) artifact never raises this - its failures are
 * reported as an absent artifact instead.
 *
 * Exit code 7: Export error
 */
export class ExportError extends CLIError {
  /** Path that could not be written */
  public readonly path: string;
  /** The original filesystem error */
  public readonly cause?: Error;

  constructor(path: string, cause?: Error) {
    super(
      `Failed to write study guide: ${path}`,
      'Check that export.output_dir is writable: wsa config get export.output_dir',
      7
    );
    this.name = 'ExportError';
    this.path = path;
    this.cause = cause;
  }
}
