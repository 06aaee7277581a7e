/**
 * Configuration Schema
 *
 * Defines the shape of ~/.workspace-agent/config.toml using Zod.
 * This provides both TypeScript types AND runtime validation.
 */

import { z } from 'zod';
import { QueryModeSchema } from '../workspace/types.js';

/**
 * A backend base address. Must be an http(s) URL.
 */
export const BackendUrlSchema = z
  .string()
  .url('Invalid backend URL')
  .refine(
    (url) => url.startsWith('http://') || url.startsWith('https://'),
    'Backend URL must be an HTTP(S) URL'
  );

/**
 * Backend addresses and per-call-class timeouts
 */
export const BackendsConfigSchema = z.object({
  retrieval_url: BackendUrlSchema.describe('Retrieval service base URL (POST /query)'),
  assistant_url: BackendUrlSchema.describe('Assistant service base URL (POST /chat)'),
  generation_url: BackendUrlSchema.describe('Ollama base URL (POST /api/generate)'),
  timeout_ms: z
    .number()
    .int()
    .min(1000)
    .max(600000)
    .describe('Timeout for retrieval and assistant calls'),
  generation_timeout_ms: z
    .number()
    .int()
    .min(1000)
    .max(600000)
    .describe('Timeout for generation calls (longer - local inference is slow)'),
});

/**
 * Model identifiers per role.
 * Empty or missing manager/study models fall back to the chat model.
 */
export const ModelsConfigSchema = z.object({
  chat: z.string().min(1).describe('Model for grounded answers'),
  manager: z.string().optional().describe('Model for tool selection and synthesis'),
  study: z.string().optional().describe('Model for study guide generation'),
});

/**
 * Query defaults and bounds
 */
export const QueryConfigSchema = z.object({
  default_top_k: z.number().int().min(1).max(100).describe('Snippets to retrieve when not given'),
  max_top_k: z.number().int().min(1).max(100).describe('Upper bound applied to every request'),
  default_mode: QueryModeSchema.describe('Mode used by the CLI when --mode is omitted'),
});

/**
 * Manager decision loop settings
 */
export const ManagerConfigSchema = z.object({
  max_steps: z.number().int().min(1).max(10).describe('Decision steps before the loop stops'),
});

/**
 * Generation request settings
 */
export const GenerationConfigSchema = z.object({
  context_window: z.number().int().min(512).max(131072).describe('num_ctx sent to Ollama'),
  max_context_chars: z
    .number()
    .int()
    .min(500)
    .max(200000)
    .describe('Cap on retrieved text placed in one prompt'),
});

/**
 * Study guide export settings
 */
export const ExportConfigSchema = z.object({
  output_dir: z.string().min(1).describe('Directory for generated study guides'),
  public_base_path: z.string().describe('URL prefix under which output_dir is served'),
  pdf: z.boolean().describe('Also render a PDF next to the markdown'),
  slug_max_length: z.number().int().min(8).max(200).describe('Maximum slug length'),
});

/**
 * Root configuration schema
 * This is the complete shape of config.toml
 */
export const ConfigSchema = z.object({
  backends: BackendsConfigSchema,
  models: ModelsConfigSchema,
  query: QueryConfigSchema,
  manager: ManagerConfigSchema,
  generation: GenerationConfigSchema,
  export: ExportConfigSchema,
});

/**
 * TypeScript type inferred from the schema
 */
export type Config = z.infer<typeof ConfigSchema>;

/**
 * Partial config for merging user overrides with defaults
 * Every field becomes optional, allowing sparse config files
 */
export const PartialConfigSchema = ConfigSchema.deepPartial();
export type PartialConfig = z.infer<typeof PartialConfigSchema>;
