/**
 * Workspace Agent - Library Entry Point
 *
 * One entrypoint for every caller: hand it a question, get back a
 * QueryResult envelope. The `wsa` CLI is a thin shell over the same
 * function.
 *
 * @example One-shot query
 * ```typescript
 * import { runWorkspaceQuery } from 'workspace-agent';
 *
 * const result = await runWorkspaceQuery({ question: 'What is entropy?', mode: 'rag_only' });
 * console.log(result.answer);
 * ```
 *
 * @example Reusing settings and injecting a logger
 * ```typescript
 * import { createWorkspaceOrchestrator, consoleLogger } from 'workspace-agent';
 *
 * const orchestrator = createWorkspaceOrchestrator({ logger: consoleLogger });
 * const guide = await orchestrator.run({ question: 'Optics', mode: 'study_guide' });
 * console.log(guide.markdown_url);
 * ```
 *
 * @packageDocumentation
 */

// Orchestrator
export {
  WorkspaceOrchestrator,
  createWorkspaceOrchestrator,
  runWorkspaceQuery,
  getHealth,
  resolveMode,
  DEFAULT_MODE,
  type WorkspaceOrchestratorOptions,
  type PdfRenderer,
  type ExportedGuide,
  // Envelope and request types
  QUERY_MODES,
  type QueryMode,
  type QueryRequest,
  type QueryResult,
  type Chunk,
  type RagResult,
  type CopilotResult,
  type TraceStep,
  type TraceTool,
} from './workspace/index.js';

// Backend clients, for callers that bring their own transport
export type {
  BackendClients,
  RetrievalClient,
  AssistantClient,
  GenerationClient,
  GenerateOptions,
} from './providers/index.js';

// Settings
export {
  loadConfig,
  loadEnv,
  resolveSettings,
  type Config,
  type WorkspaceSettings,
} from './config/index.js';

// Errors
export {
  CLIError,
  ConfigError,
  ValidationError,
  BackendError,
  ExportError,
  type BackendService,
} from './errors/index.js';

// Logging
export { consoleLogger, silentLogger, type Logger } from './utils/index.js';
