/**
 * Workspace Query Orchestrator
 *
 * Single entrypoint for every caller: validates the request, picks a
 * strategy by mode and returns its envelope unchanged.
 *
 * @example
 * ```typescript
 * const orchestrator = createWorkspaceOrchestrator();
 * const result = await orchestrator.run({ question: 'What is entropy?', mode: 'rag_only' });
 * console.log(result.answer);
 * ```
 */

import { z } from 'zod';
import { ValidationError } from '../errors/index.js';
import { loadConfig } from '../config/loader.js';
import { loadEnv } from '../config/env.js';
import { resolveSettings, type WorkspaceSettings } from '../config/settings.js';
import { createBackendClients, type BackendClients } from '../providers/backends.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { GuideExporter, type PdfRenderer } from './export.js';
import { STRATEGIES, emptyResult, type StrategyContext } from './strategies.js';
import { QueryModeSchema, type QueryMode, type QueryRequest, type QueryResult } from './types.js';

/** Mode used when none, or an unknown one, is given */
export const DEFAULT_MODE: QueryMode = 'assisted';

/** Older mode names still accepted */
const MODE_ALIASES: Record<string, QueryMode> = {
  copilot: 'assisted',
};

const TopKSchema = z
  .number({ invalid_type_error: 'top_k must be a number' })
  .int('top_k must be an integer')
  .positive('top_k must be a positive integer');

/**
 * Lower-case and validate a mode. Unknown or absent values resolve
 * to `assisted`.
 */
export function resolveMode(mode: string | undefined): QueryMode {
  const normalized = (mode ?? '').trim().toLowerCase();
  const parsed = QueryModeSchema.safeParse(MODE_ALIASES[normalized] ?? normalized);
  return parsed.success ? parsed.data : DEFAULT_MODE;
}

export interface WorkspaceOrchestratorOptions {
  settings: WorkspaceSettings;
  /** Defaults to HTTP clients built from settings */
  clients?: BackendClients;
  logger?: Logger;
  /** Overrides the PDF renderer used for study guides */
  renderPdf?: PdfRenderer;
}

export class WorkspaceOrchestrator {
  private readonly context: StrategyContext;

  constructor(options: WorkspaceOrchestratorOptions) {
    const logger = options.logger ?? silentLogger;

    this.context = {
      settings: options.settings,
      clients: options.clients ?? createBackendClients(options.settings, logger),
      exporter: new GuideExporter({
        settings: options.settings.export,
        logger,
        renderPdf: options.renderPdf,
      }),
      logger,
    };
  }

  get settings(): WorkspaceSettings {
    return this.context.settings;
  }

  /**
   * Answer one question.
   *
   * An empty question returns a neutral envelope without calling any
   * backend.
   *
   * @throws ValidationError if top_k is not a positive integer
   * @throws BackendError if a backend call fails
   * @throws ExportError if a study guide cannot be written
   */
  async run(request: QueryRequest): Promise<QueryResult> {
    const question = request.question.trim();
    const mode = resolveMode(request.mode);
    const requestedTopK = request.top_k ?? this.context.settings.query.defaultTopK;

    if (question === '') {
      return emptyResult(mode, '', requestedTopK);
    }

    const parsedTopK = TopKSchema.safeParse(requestedTopK);
    if (!parsedTopK.success) {
      throw new ValidationError(
        'Invalid query request',
        parsedTopK.error.issues.map((issue) => issue.message)
      );
    }

    const topK = Math.min(parsedTopK.data, this.context.settings.query.maxTopK);
    if (topK !== parsedTopK.data) {
      this.context.logger.debug?.(`top_k ${parsedTopK.data} clamped to ${topK}`);
    }

    this.context.logger.debug?.(`Mode: ${mode} (requested: ${request.mode ?? 'none'}), top_k: ${topK}`);
    return STRATEGIES[mode](question, topK, this.context);
  }
}

/**
 * Build an orchestrator, loading settings from config.toml and the
 * environment unless given.
 */
export function createWorkspaceOrchestrator(
  options: Partial<WorkspaceOrchestratorOptions> = {}
): WorkspaceOrchestrator {
  return new WorkspaceOrchestrator({
    ...options,
    settings: options.settings ?? resolveSettings(loadConfig(), loadEnv()),
  });
}

/**
 * One-shot query with a freshly built orchestrator.
 */
export function runWorkspaceQuery(
  request: QueryRequest,
  options: Partial<WorkspaceOrchestratorOptions> = {}
): Promise<QueryResult> {
  return createWorkspaceOrchestrator(options).run(request);
}

/**
 * Static liveness payload. Touches no backend.
 */
export function getHealth(): { status: 'ok'; service: 'workspace-agent' } {
  return { status: 'ok', service: 'workspace-agent' };
}
