import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Command } from 'commander';
import chalk from 'chalk';
import { createHealthCommand } from '../health.js';
import type { CommandContext } from '../../types.js';

describe('createHealthCommand', () => {
  let logOutput: string[];
  let consoleLogSpy: ReturnType<typeof vi.spyOn>;

  function createContext(json: boolean): CommandContext {
    return {
      options: { verbose: false, json },
      log: (msg: string) => logOutput.push(msg),
      debug: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    };
  }

  async function runCommand(context: CommandContext) {
    const program = new Command();
    program.addCommand(createHealthCommand(() => context));
    await program.parseAsync(['node', 'test', 'health']);
  }

  beforeEach(() => {
    chalk.level = 0;
    logOutput = [];
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    consoleLogSpy.mockRestore();
  });

  it('prints the status line', async () => {
    await runCommand(createContext(false));

    expect(logOutput).toEqual(['✓ workspace-agent: ok']);
  });

  it('prints the payload as JSON', async () => {
    await runCommand(createContext(true));

    expect(consoleLogSpy).toHaveBeenCalledWith('{"status":"ok","service":"workspace-agent"}');
  });
});
