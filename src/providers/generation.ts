/**
 * Text Generation Client (Ollama)
 *
 * Non-streaming calls to `POST {baseUrl}/api/generate`. Local models
 * can be slow, especially on first load, so this client gets its own
 * (longer) timeout.
 *
 * @example
 * ```typescript
 * const generation = createGenerationClient({
 *   baseUrl: 'http://localhost:11434',
 *   timeoutMs: 120000,
 *   contextWindow: 4096,
 * });
 * const text = await generation.generate('Say hi', {
 *   model: 'llama3.1',
 *   temperature: 0.2,
 *   maxTokens: 64,
 * });
 * ```
 */

import { postJson, joinUrl } from './http.js';
import type { Logger } from '../utils/logger.js';

// ============================================================================
// TYPES
// ============================================================================

/**
 * Per-call sampling settings.
 */
export interface GenerateOptions {
  /** Model tag, e.g. `llama3.1` */
  model: string;
  temperature: number;
  /** Upper bound on generated tokens (Ollama `num_predict`) */
  maxTokens: number;
}

export interface GenerationClient {
  /**
   * Run one prompt to completion.
   * Returns the trimmed response text, or '' when the backend sent none.
   */
  generate(prompt: string, options: GenerateOptions): Promise<string>;
}

export interface GenerationClientOptions {
  /** Ollama server URL */
  baseUrl: string;
  timeoutMs: number;
  /** Sent as `num_ctx` on every request */
  contextWindow: number;
  logger?: Logger;
}

// ============================================================================
// FACTORY
// ============================================================================

export function createGenerationClient(options: GenerationClientOptions): GenerationClient {
  const url = joinUrl(options.baseUrl, '/api/generate');

  return {
    async generate(prompt, { model, temperature, maxTokens }) {
      const payload = await postJson(
        'generation',
        url,
        {
          model,
          prompt,
          stream: false,
          options: {
            temperature,
            num_ctx: options.contextWindow,
            num_predict: maxTokens,
          },
        },
        { timeoutMs: options.timeoutMs, logger: options.logger }
      );

      const text = payload.response;
      return typeof text === 'string' ? text.trim() : '';
    },
  };
}
