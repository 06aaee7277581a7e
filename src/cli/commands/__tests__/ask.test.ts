/**
 * Tests for ask command
 *
 * Tests cover:
 * - Command structure and metadata
 * - Mode and --top-k handling
 * - Text rendering and JSON output
 * - Error propagation
 *
 * The backends are in-process fakes; config.toml is replaced with the
 * defaults.
 */

import { describe, it, expect, vi, beforeEach, afterEach, beforeAll } from 'vitest';
import { Command } from 'commander';
import chalk from 'chalk';
import { createAskCommand, parseTopK } from '../ask.js';
import type { CommandContext } from '../../types.js';
import { createBackendClients } from '../../../providers/backends.js';
import { ENV_KEYS } from '../../../config/env.js';
import { BackendError, CLIError, ValidationError } from '../../../errors/index.js';
import {
  createFakeBackends,
  resetAll,
  type FakeBackends,
  type FakeBackendScript,
} from '../../../test-utils/index.js';

vi.mock('../../../config/loader.js', async () => {
  const { DEFAULT_CONFIG } = await import('../../../config/defaults.js');
  return { loadConfig: vi.fn(() => structuredClone(DEFAULT_CONFIG)) };
});

vi.mock('../../../providers/backends.js', () => ({
  createBackendClients: vi.fn(),
}));

// Mock ora to prevent spinner output
vi.mock('ora', () => ({
  default: vi.fn(() => ({
    start: vi.fn().mockReturnThis(),
    succeed: vi.fn().mockReturnThis(),
    fail: vi.fn().mockReturnThis(),
    text: '',
  })),
}));

const NOTES = {
  chunks: [{ text: 'Entropy measures disorder.', source: 'thermo.pdf', metadata: { page: 3 } }],
};

describe('createAskCommand', () => {
  let mockContext: CommandContext;
  let logOutput: string[];
  let consoleLogSpy: ReturnType<typeof vi.spyOn>;
  let fakes: FakeBackends;

  beforeAll(() => {
    chalk.level = 0;
  });

  beforeEach(() => {
    resetAll();
    for (const key of ENV_KEYS) vi.stubEnv(key, '');

    logOutput = [];
    mockContext = {
      options: { verbose: false, json: false },
      log: (msg: string) => logOutput.push(msg),
      debug: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    };
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    useBackends({});
  });

  afterEach(() => {
    vi.clearAllMocks();
    consoleLogSpy.mockRestore();
    resetAll();
  });

  function useBackends(script: FakeBackendScript): void {
    fakes = createFakeBackends(script);
    vi.mocked(createBackendClients).mockReturnValue(fakes);
  }

  async function runCommand(args: string[], context = mockContext) {
    const program = new Command();
    program.addCommand(createAskCommand(() => context));
    await program.parseAsync(['node', 'test', 'ask', ...args]);
  }

  describe('command structure', () => {
    it('creates a command named "ask" with a required question', () => {
      const command = createAskCommand(() => mockContext);

      expect(command.name()).toBe('ask');
      expect(command.registeredArguments).toHaveLength(1);
      expect(command.registeredArguments[0]?.required).toBe(true);
    });

    it('has --mode and --top-k options without defaults', () => {
      const command = createAskCommand(() => mockContext);
      const mode = command.options.find((o) => o.long === '--mode');
      const topK = command.options.find((o) => o.long === '--top-k');

      expect(mode?.short).toBe('-m');
      expect(topK?.short).toBe('-k');
      expect(topK?.defaultValue).toBeUndefined();
    });
  });

  describe('running a query', () => {
    it('renders the answer and sources in text mode', async () => {
      useBackends({ retrieval: [{ answer: 'Disorder.', ...NOTES }] });

      await runCommand(['What is entropy?', '--mode', 'rag_only']);

      expect(logOutput).toEqual([
        'Disorder.',
        '',
        'Sources (1):',
        '  [1] thermo.pdf, p. 3',
        '      Entropy measures disorder.',
        '',
        'mode: rag_only · top_k: 8',
      ]);
    });

    it('uses the configured default mode', async () => {
      useBackends({ retrieval: [NOTES], assistant: [{ answer: 'From the assistant.' }] });

      await runCommand(['What is entropy?']);

      expect(fakes.calls.order).toEqual(['retrieval', 'assistant']);
      expect(logOutput[0]).toBe('From the assistant.');
    });

    it('passes --top-k through', async () => {
      await runCommand(['q', '-m', 'rag_only', '-k', '3']);

      expect(fakes.calls.retrieval).toEqual([{ question: 'q', k: 3 }]);
    });

    it('prints the envelope verbatim with --json', async () => {
      useBackends({ retrieval: [{ answer: 'Disorder.' }] });
      mockContext.options.json = true;

      await runCommand(['What is entropy?', '--mode', 'rag_only']);

      expect(consoleLogSpy).toHaveBeenCalledTimes(1);
      const printed: unknown = JSON.parse(String(consoleLogSpy.mock.calls[0]?.[0]));
      expect(printed).toEqual({
        mode: 'rag_only',
        question: 'What is entropy?',
        top_k: 8,
        answer: 'Disorder.',
        rag: { answer: 'Disorder.', chunks: [], raw: { answer: 'Disorder.' } },
        copilot: null,
        agent_trace: [],
        markdown_url: null,
        pdf_url: null,
      });
      expect(logOutput).toEqual([]);
    });

    it('shows a placeholder for a blank question without calling a backend', async () => {
      await runCommand(['   ']);

      expect(fakes.calls.order).toEqual([]);
      expect(logOutput[0]).toBe('No answer.');
    });
  });

  describe('errors', () => {
    it('rejects a non-numeric --top-k', async () => {
      await expect(runCommand(['q', '-k', 'abc'])).rejects.toThrow('Invalid --top-k value: "abc"');
    });

    it('rejects a non-positive --top-k', async () => {
      await expect(runCommand(['q', '-k', '0'])).rejects.toBeInstanceOf(ValidationError);
      expect(fakes.calls.order).toEqual([]);
    });

    it('propagates backend failures', async () => {
      useBackends({
        retrieval: [new BackendError('retrieval', 'http://localhost:8080/query', 'HTTP 502 Bad Gateway', { status: 502 })],
      });

      await expect(runCommand(['q', '-m', 'rag_only'])).rejects.toBeInstanceOf(BackendError);
    });
  });
});

describe('parseTopK', () => {
  it('parses numbers', () => {
    expect(parseTopK('12')).toBe(12);
    expect(parseTopK(' 4 ')).toBe(4);
    expect(parseTopK('2.5')).toBe(2.5);
  });

  it('throws CLIError for text', () => {
    expect(() => parseTopK('')).toThrow(CLIError);
    expect(() => parseTopK('ten')).toThrow('Invalid --top-k value: "ten"');
  });
});
