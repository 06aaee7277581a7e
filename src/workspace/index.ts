/**
 * Workspace Module
 *
 * The query orchestrator, its strategies and the pieces they share.
 */

export {
  WorkspaceOrchestrator,
  createWorkspaceOrchestrator,
  runWorkspaceQuery,
  resolveMode,
  getHealth,
  DEFAULT_MODE,
  type WorkspaceOrchestratorOptions,
} from './orchestrator.js';

export {
  STRATEGIES,
  runRagOnly,
  runAssisted,
  runManagerAuto,
  runStudyGuide,
  isStudyGuideRequest,
  emptyResult,
  STUDY_GUIDE_TRIGGERS,
  type Strategy,
  type StrategyContext,
} from './strategies.js';

export {
  ManagerEngine,
  type ManagerState,
  type ManagerOutcome,
  type ManagerRunOptions,
  type ManagerDependencies,
} from './manager.js';

export { parseManagerDecision, extractJsonObject, PARSE_FAILURE_REASON } from './decision.js';
export { normalizeRetrieval, normalizeChunk, findChunkList, CHUNK_LIST_KEYS } from './normalizer.js';
export { GuideExporter, slugify, publicUrl, type ExportedGuide, type PdfRenderer } from './export.js';
export { renderMarkdownPdf } from './pdf.js';
export { TraceRecorder, prependStep, truncateSummary, MAX_SUMMARY_LENGTH } from './trace.js';
export { formatChunkContext, formatTrace } from './prompts.js';

export * from './types.js';
