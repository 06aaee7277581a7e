/**
 * Workspace query types.
 *
 * Every value here is created per request and dropped after the
 * result is returned.
 */

import { z } from 'zod';

// ============================================================================
// MODES
// ============================================================================

export const QUERY_MODES = ['rag_only', 'assisted', 'manager_auto', 'study_guide'] as const;

export const QueryModeSchema = z.enum(QUERY_MODES);

export type QueryMode = z.infer<typeof QueryModeSchema>;

// ============================================================================
// REQUEST
// ============================================================================

/**
 * Input accepted by the orchestrator.
 * `top_k` and `mode` fall back to configured defaults when omitted.
 */
export interface QueryRequest {
  question: string;
  top_k?: number;
  /** Case-insensitive; unknown values resolve to `assisted` */
  mode?: string;
}

// ============================================================================
// RETRIEVAL
// ============================================================================

/**
 * One normalized snippet of retrieved context.
 */
export interface Chunk {
  /** 1-based position in the returned list */
  idx: number;
  source: string;
  page: number | null;
  chunk_id: string | null;
  text: string;
}

export interface RagResult {
  /** Answer supplied by the retrieval backend itself, '' when absent */
  answer: string;
  chunks: Chunk[];
  /** Backend payload as received */
  raw: Record<string, unknown>;
}

/**
 * Assistant backend payload, passed through unmodified.
 */
export type CopilotResult = Record<string, unknown>;

// ============================================================================
// TRACE
// ============================================================================

export type TraceTool =
  | 'manager'
  | 'rag'
  | 'copilot'
  | 'study_guide_llm'
  | 'file_export'
  | 'study_guide (direct)';

export interface TraceStep {
  step: number;
  tool: TraceTool;
  summary: string;
}

// ============================================================================
// RESULT
// ============================================================================

/**
 * The envelope every strategy returns.
 */
export interface QueryResult {
  mode: QueryMode;
  question: string;
  top_k: number;
  answer: string;
  rag: RagResult | null;
  copilot: CopilotResult | null;
  agent_trace: TraceStep[];
  markdown_url: string | null;
  pdf_url: string | null;
}

// ============================================================================
// MANAGER
// ============================================================================

export const MANAGER_ACTIONS = ['rag', 'copilot', 'final'] as const;

export type ManagerAction = (typeof MANAGER_ACTIONS)[number];

export interface ManagerDecision {
  action: ManagerAction;
  reason: string;
}
