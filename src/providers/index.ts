/**
 * Providers Module
 *
 * HTTP clients for the retrieval, assistant and generation backends.
 *
 * MAIN ENTRY POINT:
 * ```typescript
 * import { createBackendClients } from './providers';
 * const { retrieval, assistant, generation } = createBackendClients(settings, logger);
 * ```
 */

// ============================================================================
// VALIDATION UTILITIES
// ============================================================================

export { validateBackendUrl, validateBackends, type ValidationResult } from './validation.js';

// ============================================================================
// CLIENTS
// ============================================================================

export { createBackendClients, type BackendClients } from './backends.js';

export {
  createRetrievalClient,
  type RetrievalClient,
  type RetrievalClientOptions,
} from './retrieval.js';

export {
  createAssistantClient,
  type AssistantClient,
  type AssistantClientOptions,
} from './assistant.js';

export {
  createGenerationClient,
  type GenerationClient,
  type GenerationClientOptions,
  type GenerateOptions,
} from './generation.js';

export { postJson, joinUrl, type PostJsonOptions } from './http.js';
