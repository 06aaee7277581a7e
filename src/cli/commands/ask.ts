/**
 * Ask Command
 *
 * Runs one question through the workspace orchestrator and prints the
 * result envelope.
 *
 *   wsa ask "What is entropy?"
 *   wsa ask "Compare my notes on heat engines" --mode manager_auto
 *   wsa ask "Thermodynamics" --mode study_guide --top-k 12
 *   wsa --json ask "What is entropy?"
 *
 * With --json the envelope is printed verbatim, so scripts and other
 * services get exactly what the library returns.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import type { CommandContext } from '../types.js';
import { loadConfig } from '../../config/loader.js';
import { loadEnv } from '../../config/env.js';
import { resolveSettings } from '../../config/settings.js';
import { createWorkspaceOrchestrator } from '../../workspace/orchestrator.js';
import { QUERY_MODES, type QueryResult } from '../../workspace/types.js';
import { CLIError } from '../../errors/index.js';
import { renderQueryResult } from '../utils/result-renderer.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Command-specific options parsed from CLI arguments.
 */
interface AskCommandOptions {
  /** Strategy to run; config query.default_mode when omitted */
  mode?: string;
  /** Snippets to retrieve; config query.default_top_k when omitted */
  topK?: string;
}

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Parse the --top-k option. Range checks are left to the orchestrator.
 *
 * @throws CLIError if the value is not a number at all
 */
export function parseTopK(topKStr: string): number {
  const topK = Number(topKStr.trim());

  if (topKStr.trim() === '' || Number.isNaN(topK)) {
    throw new CLIError(`Invalid --top-k value: "${topKStr}"`, 'Must be a positive integer');
  }

  return topK;
}

function startSpinner(ctx: CommandContext, mode: string): Ora | null {
  if (ctx.options.json || !process.stdout.isTTY) return null;

  return ora({ text: `Running ${mode}...`, color: 'cyan' }).start();
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
    .argument('<question>', 'Question about your study library')
    .description('Ask a question using retrieval, the assistant, the manager or a study guide')
    .option('-m, --mode <mode>', `Query mode (${QUERY_MODES.join(', ')})`)
    .option('-k, --top-k <number>', 'Number of snippets to retrieve')
    .action(async (question: string, cmdOptions: AskCommandOptions) => {
      const ctx = getContext();

      ctx.debug(`Question: "${question}"`);
      ctx.debug(`Options: ${JSON.stringify(cmdOptions)}`);

      const topK = cmdOptions.topK === undefined ? undefined : parseTopK(cmdOptions.topK);

      const settings = resolveSettings(loadConfig(), loadEnv());
      const mode = cmdOptions.mode ?? settings.query.defaultMode;

      const orchestrator = createWorkspaceOrchestrator({ settings, logger: ctx });

      const spinner = startSpinner(ctx, mode);
      const startTime = performance.now();

      let result: QueryResult;
      try {
        result = await orchestrator.run({ question, mode, top_k: topK });
      } catch (error) {
        spinner?.fail(chalk.dim('Query failed'));
        throw error;
      }

      const totalMs = performance.now() - startTime;
      spinner?.succeed(chalk.dim(`Done (${totalMs.toFixed(0)}ms)`));
      ctx.debug(`Total: ${totalMs.toFixed(0)}ms`);

      if (ctx.options.json) {
        console.log(JSON.stringify(result, null, 2));
        return;
      }

      for (const line of renderQueryResult(result, { verbose: ctx.options.verbose })) {
        ctx.log(line);
      }
    });
}
