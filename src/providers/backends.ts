/**
 * Backend client factory.
 *
 * Builds the three clients from resolved settings. Retrieval and
 * assistant share the medium timeout; generation uses the long one.
 */

import type { WorkspaceSettings } from '../config/settings.js';
import type { Logger } from '../utils/logger.js';
import { createRetrievalClient, type RetrievalClient } from './retrieval.js';
import { createAssistantClient, type AssistantClient } from './assistant.js';
import { createGenerationClient, type GenerationClient } from './generation.js';

export interface BackendClients {
  retrieval: RetrievalClient;
  assistant: AssistantClient;
  generation: GenerationClient;
}

export function createBackendClients(settings: WorkspaceSettings, logger?: Logger): BackendClients {
  const { backends, generation } = settings;

  return {
    retrieval: createRetrievalClient({
      baseUrl: backends.retrievalUrl,
      timeoutMs: backends.timeoutMs,
      logger,
    }),
    assistant: createAssistantClient({
      baseUrl: backends.assistantUrl,
      timeoutMs: backends.timeoutMs,
      logger,
    }),
    generation: createGenerationClient({
      baseUrl: backends.generationUrl,
      timeoutMs: backends.generationTimeoutMs,
      contextWindow: generation.contextWindow,
      logger,
    }),
  };
}
