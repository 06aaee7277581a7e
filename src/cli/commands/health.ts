/**
 * Health Command
 *
 *   wsa health
 *   wsa --json health
 *
 * Prints the static liveness payload. No backend is contacted.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { CommandContext } from '../types.js';
import { getHealth } from '../../workspace/orchestrator.js';

export function createHealthCommand(getContext: () => CommandContext): Command {
  return new Command('health')
    .description('Print the liveness payload')
    .action(() => {
      const ctx = getContext();
      const health = getHealth();

      if (ctx.options.json) {
        console.log(JSON.stringify(health));
        return;
      }

      ctx.log(`${chalk.green('✓')} ${health.service}: ${health.status}`);
    });
}
