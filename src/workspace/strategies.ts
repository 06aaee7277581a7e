/**
 * Query strategies, one per mode.
 *
 * Each strategy composes the backend clients differently and returns
 * the same QueryResult envelope. Backend errors are not caught here.
 */

import type { BackendClients } from '../providers/backends.js';
import type { WorkspaceSettings } from '../config/settings.js';
import type { Logger } from '../utils/logger.js';
import { normalizeRetrieval } from './normalizer.js';
import { buildGroundedAnswerPrompt, buildStudyGuidePrompt } from './prompts.js';
import { ManagerEngine } from './manager.js';
import { TraceRecorder, prependStep } from './trace.js';
import type { GuideExporter } from './export.js';
import type { QueryMode, QueryResult, RagResult } from './types.js';

export interface StrategyContext {
  clients: BackendClients;
  settings: WorkspaceSettings;
  exporter: GuideExporter;
  logger: Logger;
}

export type Strategy = (
  question: string,
  topK: number,
  context: StrategyContext
) => Promise<QueryResult>;

export const GROUNDED_ANSWER_PARAMS = { temperature: 0.2, maxTokens: 512 } as const;
export const STUDY_GUIDE_PARAMS = { temperature: 0.3, maxTokens: 1024 } as const;

/** Phrases that send a manager_auto question straight to the study guide */
export const STUDY_GUIDE_TRIGGERS = ['study guide', 'study plan', 'learning plan'] as const;

export const DIRECT_STUDY_GUIDE_SUMMARY =
  'User explicitly asked for a study guide/plan, so the manager delegated directly to the study_guide tool.';

/**
 * Envelope with every field at its neutral value.
 */
export function emptyResult(mode: QueryMode, question: string, topK: number): QueryResult {
  return {
    mode,
    question,
    top_k: topK,
    answer: '',
    rag: null,
    copilot: null,
    agent_trace: [],
    markdown_url: null,
    pdf_url: null,
  };
}

export function isStudyGuideRequest(question: string): boolean {
  const lower = question.toLowerCase();
  return STUDY_GUIDE_TRIGGERS.some((phrase) => lower.includes(phrase));
}

async function retrieve(question: string, topK: number, context: StrategyContext): Promise<RagResult> {
  const raw = await context.clients.retrieval.query(question, topK);
  return normalizeRetrieval(raw, topK);
}

/**
 * Short context-only answer over the retrieved chunks.
 * Returns '' without calling the backend when there are no chunks.
 */
async function groundedAnswer(
  question: string,
  rag: RagResult,
  context: StrategyContext
): Promise<string> {
  if (rag.chunks.length === 0) return '';

  return context.clients.generation.generate(
    buildGroundedAnswerPrompt(question, rag.chunks, context.settings.generation.maxContextChars),
    { model: context.settings.models.chat, ...GROUNDED_ANSWER_PARAMS }
  );
}

// ============================================================================
// STRATEGIES
// ============================================================================

export const runRagOnly: Strategy = async (question, topK, context) => {
  const rag = await retrieve(question, topK, context);
  const answer = rag.answer || (await groundedAnswer(question, rag, context));

  return { ...emptyResult('rag_only', question, topK), answer, rag };
};

/**
 * Retrieval for display, assistant for the answer. The two calls are
 * independent; the assistant's own retrieval is never inspected.
 */
export const runAssisted: Strategy = async (question, topK, context) => {
  const rag = await retrieve(question, topK, context);
  const copilot = await context.clients.assistant.chat(question, topK);

  const copilotAnswer = typeof copilot.answer === 'string' ? copilot.answer : '';
  const answer = copilotAnswer || rag.answer || (await groundedAnswer(question, rag, context));

  return { ...emptyResult('assisted', question, topK), answer, rag, copilot };
};

export const runStudyGuide: Strategy = async (question, topK, context) => {
  const trace = new TraceRecorder();

  const rag = await retrieve(question, topK, context);
  trace.record('rag', `Fetched top-${topK} chunks from the retrieval service.`);

  const guide = await context.clients.generation.generate(
    buildStudyGuidePrompt(
      question,
      rag.chunks,
      rag.answer,
      context.settings.generation.maxContextChars
    ),
    { model: context.settings.models.study, ...STUDY_GUIDE_PARAMS }
  );
  trace.record('study_guide_llm', 'Generated a structured study guide based on retrieved context.');

  const files = await context.exporter.export(guide, question);
  trace.record(
    'file_export',
    files.pdfUrl ? 'Saved guide as markdown and PDF.' : 'Saved guide as markdown; no PDF produced.'
  );

  return {
    ...emptyResult('study_guide', question, topK),
    answer: guide,
    rag,
    agent_trace: trace.snapshot(),
    markdown_url: files.markdownUrl,
    pdf_url: files.pdfUrl,
  };
};

export const runManagerAuto: Strategy = async (question, topK, context) => {
  if (isStudyGuideRequest(question)) {
    context.logger.debug?.('Study guide requested; skipping manager loop');
    const result = await runStudyGuide(question, topK, context);

    return {
      ...result,
      mode: 'manager_auto',
      agent_trace: prependStep(result.agent_trace, 'study_guide (direct)', DIRECT_STUDY_GUIDE_SUMMARY),
    };
  }

  const engine = new ManagerEngine({
    retrieval: context.clients.retrieval,
    assistant: context.clients.assistant,
    generation: context.clients.generation,
    models: context.settings.models,
    logger: context.logger,
  });
  const outcome = await engine.run(question, {
    topK,
    maxSteps: context.settings.manager.maxSteps,
  });

  return {
    ...emptyResult('manager_auto', question, topK),
    answer: outcome.answer,
    rag: outcome.rag,
    copilot: outcome.copilot,
    agent_trace: outcome.trace,
  };
};

export const STRATEGIES: Record<QueryMode, Strategy> = {
  rag_only: runRagOnly,
  assisted: runAssisted,
  manager_auto: runManagerAuto,
  study_guide: runStudyGuide,
};
