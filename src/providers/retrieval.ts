/**
 * Retrieval service client.
 *
 * `POST {baseUrl}/query` with `{question, k}`. The payload comes back
 * untouched; shaping it into chunks is the normalizer's job.
 */

import { postJson, joinUrl } from './http.js';
import type { Logger } from '../utils/logger.js';

export interface RetrievalClient {
  query(question: string, k: number): Promise<Record<string, unknown>>;
}

export interface RetrievalClientOptions {
  baseUrl: string;
  timeoutMs: number;
  logger?: Logger;
}

export function createRetrievalClient(options: RetrievalClientOptions): RetrievalClient {
  const url = joinUrl(options.baseUrl, '/query');

  return {
    query: (question, k) =>
      postJson('retrieval', url, { question, k }, {
        timeoutMs: options.timeoutMs,
        logger: options.logger,
      }),
  };
}
