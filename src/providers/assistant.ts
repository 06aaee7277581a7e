/**
 * Assistant service client.
 *
 * `POST {baseUrl}/chat` with `{question, top_k}`. The assistant runs
 * its own retrieval; its payload is passed through as-is.
 */

import { postJson, joinUrl } from './http.js';
import type { Logger } from '../utils/logger.js';

export interface AssistantClient {
  chat(question: string, topK: number): Promise<Record<string, unknown>>;
}

export interface AssistantClientOptions {
  baseUrl: string;
  timeoutMs: number;
  logger?: Logger;
}

export function createAssistantClient(options: AssistantClientOptions): AssistantClient {
  const url = joinUrl(options.baseUrl, '/chat');

  return {
    chat: (question, topK) =>
      postJson('assistant', url, { question, top_k: topK }, {
        timeoutMs: options.timeoutMs,
        logger: options.logger,
      }),
  };
}
