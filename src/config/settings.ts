/**
 * Resolved runtime settings.
 *
 * Precedence: environment variables > config.toml > defaults.
 * The result is frozen and shared by every request.
 */

import type { Config } from './schema.js';
import type { EnvVars } from './env.js';
import type { QueryMode } from '../workspace/types.js';
import { DEFAULT_CONFIG } from './defaults.js';
import { expandHome, getDefaultGuidesDir } from './paths.js';

export interface BackendSettings {
  readonly retrievalUrl: string;
  readonly assistantUrl: string;
  readonly generationUrl: string;
  /** Retrieval and assistant calls */
  readonly timeoutMs: number;
  readonly generationTimeoutMs: number;
}

export interface ModelSettings {
  readonly chat: string;
  readonly manager: string;
  readonly study: string;
}

export interface ExportSettings {
  readonly outputDir: string;
  readonly publicBasePath: string;
  readonly pdf: boolean;
  readonly slugMaxLength: number;
}

export interface WorkspaceSettings {
  readonly backends: BackendSettings;
  readonly models: ModelSettings;
  readonly query: {
    readonly defaultTopK: number;
    readonly maxTopK: number;
    readonly defaultMode: QueryMode;
  };
  readonly manager: { readonly maxSteps: number };
  readonly generation: {
    readonly contextWindow: number;
    readonly maxContextChars: number;
  };
  readonly export: ExportSettings;
}

function pickModel(...candidates: Array<string | undefined>): string | undefined {
  return candidates.find((candidate) => candidate !== undefined && candidate.trim() !== '');
}

function resolveOutputDir(config: Config, env: EnvVars): string {
  if (env.WORKSPACE_GUIDES_DIR) {
    return expandHome(env.WORKSPACE_GUIDES_DIR);
  }
  // The default lives under the home dir, which WORKSPACE_AGENT_HOME may move
  if (config.export.output_dir === DEFAULT_CONFIG.export.output_dir) {
    return getDefaultGuidesDir();
  }
  return expandHome(config.export.output_dir);
}

/**
 * Combine the loaded config file with environment overrides.
 */
export function resolveSettings(config: Config, env: EnvVars): WorkspaceSettings {
  const chat = pickModel(env.WORKSPACE_CHAT_MODEL, config.models.chat) ?? DEFAULT_CONFIG.models.chat;

  return Object.freeze({
    backends: Object.freeze({
      retrievalUrl: env.WORKSPACE_RETRIEVAL_URL ?? config.backends.retrieval_url,
      assistantUrl: env.WORKSPACE_ASSISTANT_URL ?? config.backends.assistant_url,
      generationUrl: env.OLLAMA_HOST ?? config.backends.generation_url,
      timeoutMs: config.backends.timeout_ms,
      generationTimeoutMs: config.backends.generation_timeout_ms,
    }),
    models: Object.freeze({
      chat,
      manager: pickModel(env.WORKSPACE_MANAGER_MODEL, config.models.manager) ?? chat,
      study: pickModel(env.WORKSPACE_STUDY_MODEL, config.models.study) ?? chat,
    }),
    query: Object.freeze({
      defaultTopK: config.query.default_top_k,
      maxTopK: config.query.max_top_k,
      defaultMode: config.query.default_mode,
    }),
    manager: Object.freeze({ maxSteps: config.manager.max_steps }),
    generation: Object.freeze({
      contextWindow: config.generation.context_window,
      maxContextChars: config.generation.max_context_chars,
    }),
    export: Object.freeze({
      outputDir: resolveOutputDir(config, env),
      publicBasePath: config.export.public_base_path,
      pdf: config.export.pdf,
      slugMaxLength: config.export.slug_max_length,
    }),
  });
}
