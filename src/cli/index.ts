/**
 * Workspace Agent CLI Entry Point
 *
 * Main entry point for the `wsa` command. Sets up Commander.js with
 * global options and registers all subcommands.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { GlobalOptions, CommandContext } from './types.js';
import { createAskCommand } from './commands/ask.js';
import { createConfigCommand } from './commands/config.js';
import { createHealthCommand } from './commands/health.js';
import {
  handleError,
  createGlobalErrorHandler,
  CLIError,
  ConfigError,
} from '../errors/index.js';
import {
  validateStartupConfig,
  printStartupValidation,
  requiresStartupValidation,
} from '../config/startup-validation.js';

// Set by the release build; falls back for local runs
const VERSION = process.env.WSA_VERSION ?? '0.0.0';

const program = new Command();

program
  .name('wsa')
  .description('Workspace agent - answers questions over your study library')
  .version(VERSION, '-v, --version', 'Display version number')

  // Global options - available to ALL subcommands
  .option('--verbose', 'Enable verbose output for debugging', false)
  .option('--json', 'Output results as JSON', false)

  .addHelpText('after', `
${chalk.dim('Examples:')}
  ${chalk.cyan('wsa ask "What is entropy?"')}                        Assisted answer (default mode)
  ${chalk.cyan('wsa ask "What is entropy?" --mode rag_only')}        Retrieval only
  ${chalk.cyan('wsa ask "Heat engines vs fridges" -m manager_auto')} Let the manager pick tools
  ${chalk.cyan('wsa ask "Thermodynamics" -m study_guide')}           Write a study guide
  ${chalk.cyan('wsa --json ask "What is entropy?"')}                 Print the result envelope
  ${chalk.cyan('wsa config set query.default_top_k 12')}             Change a setting
`);

/**
 * Create a command context with logging utilities
 * This is passed to all command handlers
 */
function createContext(options: GlobalOptions): CommandContext {
  return {
    options,
    log: (message: string) => {
      if (!options.json) {
        console.log(message);
      }
    },
    debug: (message: string) => {
      if (options.verbose && !options.json) {
        console.log(chalk.dim(`[debug] ${message}`));
      }
    },
    warn: (message: string) => {
      if (!options.json) {
        console.warn(chalk.yellow(`Warning: ${message}`));
      }
    },
    error: (message: string) => {
      if (options.json) {
        console.error(JSON.stringify({ error: message }));
      } else {
        console.error(chalk.red(`Error: ${message}`));
      }
    },
  };
}

/**
 * Get global options from the program
 * Commander stores options on the Command object after parsing
 */
function getGlobalOptions(): GlobalOptions {
  const opts = program.opts<Partial<GlobalOptions>>();
  return {
    verbose: opts.verbose ?? false,
    json: opts.json ?? false,
  };
}

// ============================================================================
// COMMANDS
// ============================================================================

// Ask command - run one query through the orchestrator
program.addCommand(createAskCommand(() => createContext(getGlobalOptions())));

// Health command - static liveness payload
program.addCommand(createHealthCommand(() => createContext(getGlobalOptions())));

// Config command - manage ~/.workspace-agent/config.toml
program.addCommand(createConfigCommand(() => createContext(getGlobalOptions())));

// ============================================================================
// ERROR HANDLING & EXECUTION
// ============================================================================

program.on('command:*', (operands: string[]) => {
  throw new CLIError(
    `Unknown command: ${operands[0] ?? ''}`,
    'Run: wsa --help  to see available commands'
  );
});

// Check backend URLs before commands that call the backends
program.hook('preAction', (_thisCommand, actionCommand) => {
  if (!requiresStartupValidation(actionCommand.name())) {
    return;
  }

  const result = validateStartupConfig();
  if (result.valid) {
    return;
  }

  if (!getGlobalOptions().json) {
    printStartupValidation(result);
  }
  throw new ConfigError(
    `Configuration validation failed: ${result.errors.join('; ')}`,
    'Fix the backend URLs in config.toml or the environment and try again'
  );
});

async function main(): Promise<void> {
  const getErrorOptions = () => {
    const opts = getGlobalOptions();
    return { verbose: opts.verbose, json: opts.json };
  };

  // Errors that escape every try/catch
  const globalHandler = createGlobalErrorHandler(getErrorOptions());
  process.on('uncaughtException', globalHandler);
  process.on('unhandledRejection', globalHandler);

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    handleError(error, getErrorOptions());
  }
}

main().catch((error: unknown) => handleError(error));
