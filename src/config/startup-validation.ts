/**
 * Startup Configuration Validation
 *
 * Validates backend addresses at CLI startup, before a query spends
 * time on a request that can never succeed.
 *
 * Only commands that reach a backend are checked; `config` and
 * `health` must keep working with a broken configuration.
 */

import chalk from 'chalk';
import { loadConfig } from './loader.js';
import { loadEnv } from './env.js';
import { resolveSettings } from './settings.js';
import { validateBackends } from '../providers/validation.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Result of startup validation.
 */
export interface StartupValidationResult {
  /** Whether every backend address is usable */
  valid: boolean;
  /** Error messages */
  errors: string[];
  /** Setup instructions for each error */
  hints: string[];
}

// ============================================================================
// Validation Functions
// ============================================================================

/**
 * Validate resolved backend settings at CLI startup.
 *
 * Config loading errors propagate: an unreadable config.toml is
 * reported through the normal error handler.
 *
 * @example
 * const result = validateStartupConfig();
 * if (!result.valid) {
 *   printStartupValidation(result);
 * }
 */
export function validateStartupConfig(): StartupValidationResult {
  const settings = resolveSettings(loadConfig(false), loadEnv());
  const errors: string[] = [];
  const hints: string[] = [];

  for (const { service, result } of validateBackends(settings.backends)) {
    if (!result.valid) {
      errors.push(`${service} backend: ${result.error}`);
      hints.push(result.setupInstructions);
    }
  }

  return { valid: errors.length === 0, errors, hints };
}

/**
 * Print startup validation errors to stderr.
 */
export function printStartupValidation(result: StartupValidationResult): void {
  for (const error of result.errors) {
    console.error(chalk.red(`✗ ${error}`));
  }

  for (const hint of result.hints) {
    console.error(chalk.dim(hint.replace(/^/gm, '  ')));
  }
}

/**
 * Commands that call a backend.
 */
export const COMMANDS_REQUIRING_BACKENDS = ['ask'];

/**
 * Check if a command needs startup validation.
 */
export function requiresStartupValidation(command: string): boolean {
  return COMMANDS_REQUIRING_BACKENDS.includes(command);
}
