/**
 * Turns any thrown value into terminal text or a JSON object, and maps
 * it to the process exit code. Both renderings come from one
 * ErrorOutput record.
 */

import chalk from 'chalk';
import { BackendError, CLIError } from './types.js';

export interface ErrorHandlerOptions {
  /** Include stack traces and backend causes */
  verbose?: boolean;
  /** Print the ErrorOutput record as JSON */
  json?: boolean;
}

/**
 * What gets reported for a failure. Absent fields are left out of the
 * JSON rendering.
 */
export interface ErrorOutput {
  error: string;
  code: number;
  hint?: string;
  /** Backend that failed, for BackendError */
  service?: string;
  /** HTTP status from the backend, when there was one */
  status?: number;
  stack?: string;
}

const VERBOSE_HINT = 'Run with --verbose for more details';

function describeError(error: unknown, verbose: boolean): ErrorOutput {
  if (!(error instanceof Error)) {
    return { error: String(error), code: 1 };
  }

  const stack = verbose ? error.stack : undefined;

  if (error instanceof BackendError) {
    return {
      error: error.message,
      code: error.code,
      hint: error.hint,
      service: error.service,
      status: error.status,
      stack,
    };
  }

  if (error instanceof CLIError) {
    return { error: error.message, code: error.code, hint: error.hint, stack };
  }

  return { error: error.message, code: 1, stack };
}

function renderText(error: unknown, output: ErrorOutput, verbose: boolean): string {
  const lines = [chalk.red('Error: ') + output.error];

  if (output.hint) {
    lines.push(chalk.dim('Hint: ') + output.hint);
  } else if (error instanceof Error && !(error instanceof CLIError) && !verbose) {
    lines.push(chalk.dim('Hint: ') + VERBOSE_HINT);
  }

  if (verbose && error instanceof BackendError && error.cause) {
    lines.push(chalk.dim('Cause: ') + error.cause.message);
  }

  if (output.stack) {
    lines.push('', chalk.dim('Stack trace:'), chalk.dim(output.stack));
  }

  return lines.join('\n');
}

/**
 * Format an error for stderr without exiting.
 */
export function formatError(error: unknown, options: ErrorHandlerOptions = {}): string {
  const { verbose = false, json = false } = options;
  const output = describeError(error, verbose);

  return json ? JSON.stringify(output, null, 2) : renderText(error, output, verbose);
}

/** CLIError carries its own code; anything else exits with 1. */
export function getExitCode(error: unknown): number {
  return error instanceof CLIError ? error.code : 1;
}

/**
 * Print the error to stderr and exit with its code.
 */
export function handleError(error: unknown, options: ErrorHandlerOptions = {}): never {
  console.error(formatError(error, options));
  process.exit(getExitCode(error));
}

/** Handler for `uncaughtException` and `unhandledRejection`. */
export function createGlobalErrorHandler(
  options: ErrorHandlerOptions = {}
): (error: unknown) => never {
  return (error: unknown) => handleError(error, options);
}
