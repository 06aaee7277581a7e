/**
 * Environment Variable Handler
 *
 * Loads backend addresses and model overrides from the environment.
 * Supports .env files for local development via dotenv.
 *
 * Every variable is optional: unset values fall through to config.toml
 * and then to the defaults.
 */

import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';

// No-op if .env doesn't exist
dotenvConfig();

// ============================================================================
// SCHEMA DEFINITIONS
// ============================================================================

/**
 * Blank strings are treated as unset, so `WORKSPACE_MANAGER_MODEL=` in a
 * .env file means "follow the chat model".
 */
const OptionalString = z
  .string()
  .optional()
  .transform((value) => (value?.trim() ? value.trim() : undefined));

export const EnvSchema = z.object({
  WORKSPACE_RETRIEVAL_URL: OptionalString,
  WORKSPACE_ASSISTANT_URL: OptionalString,
  OLLAMA_HOST: OptionalString,
  WORKSPACE_CHAT_MODEL: OptionalString,
  WORKSPACE_MANAGER_MODEL: OptionalString,
  WORKSPACE_STUDY_MODEL: OptionalString,
  WORKSPACE_GUIDES_DIR: OptionalString,
});

export type EnvVars = z.infer<typeof EnvSchema>;

/** Names of the variables this module reads */
export const ENV_KEYS = [
  'WORKSPACE_RETRIEVAL_URL',
  'WORKSPACE_ASSISTANT_URL',
  'OLLAMA_HOST',
  'WORKSPACE_CHAT_MODEL',
  'WORKSPACE_MANAGER_MODEL',
  'WORKSPACE_STUDY_MODEL',
  'WORKSPACE_GUIDES_DIR',
] as const satisfies ReadonlyArray<keyof EnvVars>;

// ============================================================================
// PRIVATE STATE
// ============================================================================

/**
 * Cached environment variables (loaded once at first access).
 * Values won't change mid-request; _clearEnvCache() resets for tests.
 */
let _envCache: EnvVars | null = null;

// ============================================================================
// PUBLIC API
// ============================================================================

/**
 * Load environment variables (called once, then cached).
 */
export function loadEnv(): EnvVars {
  if (_envCache !== null) {
    return _envCache;
  }

  const raw: Record<string, string | undefined> = {};
  for (const key of ENV_KEYS) {
    raw[key] = process.env[key];
  }

  // Every field is an optional string, so this only fails on non-string input
  const result = EnvSchema.safeParse(raw);
  _envCache = result.success ? result.data : EnvSchema.parse({});

  return _envCache;
}

/**
 * Clear the environment cache.
 * FOR TESTING ONLY - allows tests to stub different env values.
 *
 * @internal
 */
export function _clearEnvCache(): void {
  _envCache = null;
}

// ============================================================================
// SETUP INSTRUCTIONS
// ============================================================================

/**
 * Backend-specific setup instructions.
 * Shown when a configured backend URL is invalid.
 */
export const SETUP_INSTRUCTIONS: Record<'retrieval' | 'assistant' | 'generation', string> = {
  retrieval: `
The retrieval service answers POST /query with {"question", "k"}.

Point the agent at it with either:

   export WORKSPACE_RETRIEVAL_URL="http://localhost:8080"
   wsa config set backends.retrieval_url http://localhost:8080
`.trim(),

  assistant: `
The assistant service answers POST /chat with {"question", "top_k"}.

Point the agent at it with either:

   export WORKSPACE_ASSISTANT_URL="http://localhost:8081"
   wsa config set backends.assistant_url http://localhost:8081
`.trim(),

  generation: `
Text generation uses Ollama (https://ollama.ai/):

1. Start the server:   ollama serve
2. Pull the model:     ollama pull llama3.1
3. (Optional) Set a custom host:

   export OLLAMA_HOST="http://localhost:11434"
`.trim(),
};
