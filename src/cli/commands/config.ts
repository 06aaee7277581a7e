/**
 * Config Command
 *
 * Manages ~/.workspace-agent/config.toml via CLI:
 *   wsa config get <key>          - Get a specific value
 *   wsa config set <key> <value>  - Set a value
 *   wsa config list               - Show all configuration
 *   wsa config path               - Show config file location
 *   wsa config reset --force      - Restore the template
 *
 * Environment overrides are not reflected here; this is the file only.
 */

import * as fs from 'node:fs';
import { Command } from 'commander';
import chalk from 'chalk';
import { loadConfig, getConfigValue, setConfigValue, listConfig, getConfigPath } from '../../config/loader.js';
import { loadEnv } from '../../config/env.js';
import { resolveSettings, type WorkspaceSettings } from '../../config/settings.js';
import { CLIError } from '../../errors/index.js';
import { isJsonObject } from '../../utils/json.js';
import type { CommandContext } from '../types.js';

/** Keys that may be left unset; they follow models.chat */
const FALLBACK_MODEL_KEYS = new Set(['models.manager', 'models.study']);

/**
 * Create the config command with all subcommands
 */
export function createConfigCommand(getContext: () => CommandContext): Command {
  const configCmd = new Command('config')
    .description('Manage configuration settings');

  // wsa config get <key>
  configCmd
    .command('get <key>')
    .description('Get a configuration value (e.g., wsa config get models.chat)')
    .action((key: string) => {
      const ctx = getContext();

      try {
        const value = getConfigValue(key);

        if (value === undefined && FALLBACK_MODEL_KEYS.has(key)) {
          if (ctx.options.json) {
            console.log(JSON.stringify({ key, value: null }));
          } else {
            ctx.log(chalk.dim('(unset, follows models.chat)'));
          }
          return;
        }

        if (value === undefined) {
          ctx.error(`Unknown config key: ${key}`);
          ctx.log('');
          ctx.log(`Run ${chalk.cyan('wsa config list')} to see all available keys.`);
          process.exitCode = 1;
          return;
        }

        if (ctx.options.json) {
          console.log(JSON.stringify({ key, value }));
        } else {
          // Format the value nicely
          const formatted = formatValue(value);
          ctx.log(formatted);
        }
      } catch (error) {
        handleConfigError(ctx, error);
      }
    });

  // wsa config set <key> <value>
  configCmd
    .command('set <key> <value>')
    .description('Set a configuration value (e.g., wsa config set query.default_top_k 12)')
    .action((key: string, value: string) => {
      const ctx = getContext();

      try {
        setConfigValue(key, value);

        if (ctx.options.json) {
          console.log(JSON.stringify({ success: true, key, value: getConfigValue(key) }));
        } else {
          ctx.log(`${chalk.green('✓')} Set ${chalk.cyan(key)} = ${chalk.yellow(value)}`);
        }
      } catch (error) {
        handleConfigError(ctx, error);
      }
    });

  // wsa config list
  configCmd
    .command('list')
    .alias('ls')
    .description('List all configuration values')
    .option('-e, --effective', 'Show resolved settings, with environment overrides applied')
    .action((options: { effective?: boolean }) => {
      const ctx = getContext();

      try {
        const entries = options.effective
          ? flattenSettings(resolveSettings(loadConfig(), loadEnv()))
          : listConfig();

        if (ctx.options.json) {
          const obj = Object.fromEntries(entries);
          console.log(JSON.stringify(obj, null, 2));
        } else {
          ctx.log(chalk.bold('Configuration:'));
          ctx.log('');

          // Group by top-level key for readability
          let currentGroup = '';
          for (const [key, value] of entries) {
            const group = key.split('.')[0] ?? '';

            // Add spacing between groups
            if (group !== currentGroup) {
              if (currentGroup !== '') ctx.log('');
              currentGroup = group;
            }

            const formatted = formatValue(value);
            ctx.log(`  ${chalk.cyan(key)} = ${chalk.yellow(formatted)}`);
          }

          ctx.log('');
          ctx.log(chalk.dim(`Config file: ${getConfigPath()}`));
        }
      } catch (error) {
        handleConfigError(ctx, error);
      }
    });

  // wsa config path
  configCmd
    .command('path')
    .description('Show the config file location')
    .action(() => {
      const ctx = getContext();
      const configPath = getConfigPath();

      if (ctx.options.json) {
        console.log(JSON.stringify({ path: configPath }));
      } else {
        ctx.log(configPath);
      }
    });

  // wsa config reset
  configCmd
    .command('reset')
    .description('Reset configuration to defaults')
    .option('-f, --force', 'Skip confirmation prompt')
    .action((options: { force?: boolean }) => {
      const ctx = getContext();

      if (!options.force && !ctx.options.json) {
        ctx.log(chalk.yellow('This will reset all configuration to defaults.'));
        ctx.log(`Run with ${chalk.cyan('--force')} to confirm.`);
        process.exitCode = 1;
        return;
      }

      try {
        const configPath = getConfigPath();

        if (fs.existsSync(configPath)) {
          fs.unlinkSync(configPath);
        }

        // Writes the template again
        loadConfig(true);

        if (ctx.options.json) {
          console.log(JSON.stringify({ success: true, message: 'Configuration reset to defaults' }));
        } else {
          ctx.log(`${chalk.green('✓')} Configuration reset to defaults`);
        }
      } catch (error) {
        handleConfigError(ctx, error);
      }
    });

  return configCmd;
}

/**
 * Format a value for display
 */
function formatValue(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  if (typeof value === 'number') return String(value);
  return JSON.stringify(value);
}

/**
 * Flatten resolved settings to dot-notation entries (camelCase keys).
 */
export function flattenSettings(settings: WorkspaceSettings): Array<[string, unknown]> {
  const entries: Array<[string, unknown]> = [];

  function flatten(obj: Record<string, unknown>, prefix: string): void {
    for (const [key, value] of Object.entries(obj)) {
      const fullKey = prefix ? `${prefix}.${key}` : key;
      if (isJsonObject(value)) {
        flatten(value, fullKey);
      } else {
        entries.push([fullKey, value]);
      }
    }
  }

  flatten({ ...settings }, '');
  return entries;
}

/**
 * Report a config error and set its exit code.
 */
function handleConfigError(ctx: CommandContext, error: unknown): void {
  const message = error instanceof Error ? error.message : 'Unknown error';
  const hint = error instanceof CLIError ? error.hint : undefined;

  if (ctx.options.json) {
    console.error(JSON.stringify({ error: message, hint }));
  } else {
    ctx.error(message);
    if (hint) ctx.log(chalk.dim(`Hint: ${hint}`));
  }

  process.exitCode = error instanceof CLIError ? error.code : 1;
}
