/**
 * In-process stand-ins for the three backends.
 *
 * Each fake answers from a queue of scripted responses; the last
 * response repeats once the queue is down to one. A queued Error is
 * thrown instead of returned. Every call is recorded.
 */

import type { BackendClients } from '../providers/backends.js';
import type { GenerateOptions } from '../providers/generation.js';
import { resolveSettings, type WorkspaceSettings } from '../config/settings.js';
import { DEFAULT_CONFIG } from '../config/defaults.js';
import { EnvSchema } from '../config/env.js';
import type { Config } from '../config/schema.js';

type Scripted<T> = T | Error;

export interface FakeBackendScript {
  retrieval?: Array<Scripted<Record<string, unknown>>>;
  assistant?: Array<Scripted<Record<string, unknown>>>;
  generation?: Array<Scripted<string>>;
}

export interface FakeBackendCalls {
  retrieval: Array<{ question: string; k: number }>;
  assistant: Array<{ question: string; topK: number }>;
  generation: Array<{ prompt: string; options: GenerateOptions }>;
  /** Service names in call order */
  order: Array<'retrieval' | 'assistant' | 'generation'>;
}

export interface FakeBackends extends BackendClients {
  calls: FakeBackendCalls;
}

function nextFrom<T>(queue: Array<Scripted<T>>, fallback: T): T {
  const next = queue.length > 1 ? queue.shift() : queue[0];
  if (next === undefined) return fallback;
  if (next instanceof Error) throw next;
  return next;
}

export function createFakeBackends(script: FakeBackendScript = {}): FakeBackends {
  const retrievalQueue = [...(script.retrieval ?? [])];
  const assistantQueue = [...(script.assistant ?? [])];
  const generationQueue = [...(script.generation ?? [])];

  const calls: FakeBackendCalls = { retrieval: [], assistant: [], generation: [], order: [] };

  return {
    calls,
    retrieval: {
      async query(question, k) {
        calls.retrieval.push({ question, k });
        calls.order.push('retrieval');
        return nextFrom(retrievalQueue, {});
      },
    },
    assistant: {
      async chat(question, topK) {
        calls.assistant.push({ question, topK });
        calls.order.push('assistant');
        return nextFrom(assistantQueue, {});
      },
    },
    generation: {
      async generate(prompt, options) {
        calls.generation.push({ prompt, options });
        calls.order.push('generation');
        return nextFrom(generationQueue, '');
      },
    },
  };
}

/**
 * Settings for tests: defaults, no environment overrides, guides
 * written to `outputDir`.
 */
export function createTestSettings(
  outputDir: string,
  overrides: Partial<Config> = {}
): WorkspaceSettings {
  const config: Config = {
    ...DEFAULT_CONFIG,
    ...overrides,
    export: { ...DEFAULT_CONFIG.export, output_dir: outputDir, ...overrides.export },
  };
  return resolveSettings(config, EnvSchema.parse({}));
}
