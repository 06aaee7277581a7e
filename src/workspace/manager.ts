/**
 * Manager Decision Engine
 *
 * A bounded loop in which a policy model picks the next tool:
 *
 * ```
 *   deciding ──rag/copilot──▶ acting ──▶ deciding
 *      │                                    │
 *      └──final──▶ done ◀──step cap reached─┘
 * ```
 *
 * Each step blocks on one generation call and, when acting, one
 * backend call. Tool calls never overlap. After the loop a synthesis
 * call turns the trace into the answer.
 */

import type { GenerationClient } from '../providers/generation.js';
import type { RetrievalClient } from '../providers/retrieval.js';
import type { AssistantClient } from '../providers/assistant.js';
import type { ModelSettings } from '../config/settings.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { parseManagerDecision } from './decision.js';
import { normalizeRetrieval } from './normalizer.js';
import { buildManagerDecisionPrompt, buildManagerSynthesisPrompt } from './prompts.js';
import { TraceRecorder } from './trace.js';
import type { CopilotResult, ManagerDecision, RagResult, TraceStep } from './types.js';

// ============================================================================
// TYPES
// ============================================================================

export type ManagerState =
  | { kind: 'deciding' }
  | { kind: 'acting'; decision: ManagerDecision }
  | { kind: 'done'; reason: 'final' | 'step_cap' };

export interface ManagerDependencies {
  retrieval: RetrievalClient;
  assistant: AssistantClient;
  generation: GenerationClient;
  models: Pick<ModelSettings, 'manager'>;
  logger?: Logger;
}

export interface ManagerRunOptions {
  topK: number;
  /** Decision steps before the loop stops on its own */
  maxSteps: number;
}

export interface ManagerOutcome {
  answer: string;
  trace: TraceStep[];
  /** Most recent retrieval result, if any */
  rag: RagResult | null;
  /** Most recent assistant payload, if any */
  copilot: CopilotResult | null;
  /** Decision steps taken (at most maxSteps) */
  steps: number;
  stopReason: 'final' | 'step_cap';
}

export const DECISION_PARAMS = { temperature: 0.1, maxTokens: 256 } as const;
export const SYNTHESIS_PARAMS = { temperature: 0.2, maxTokens: 512 } as const;

// ============================================================================
// ENGINE
// ============================================================================

export class ManagerEngine {
  private readonly logger: Logger;

  constructor(private readonly deps: ManagerDependencies) {
    this.logger = deps.logger ?? silentLogger;
  }

  async run(question: string, options: ManagerRunOptions): Promise<ManagerOutcome> {
    const trace = new TraceRecorder();
    let rag: RagResult | null = null;
    let copilot: CopilotResult | null = null;
    let steps = 0;
    let state: ManagerState = { kind: 'deciding' };

    while (state.kind !== 'done') {
      if (state.kind === 'deciding') {
        if (steps >= options.maxSteps) {
          state = { kind: 'done', reason: 'step_cap' };
          continue;
        }
        steps++;

        const decision = await this.decide(question, trace.snapshot());
        this.logger.debug?.(`Manager step ${steps}: ${decision.action} (${decision.reason})`);

        if (decision.action === 'final') {
          trace.record('manager', `Stop and answer now. Reason: ${decision.reason}`);
          state = { kind: 'done', reason: 'final' };
        } else {
          state = { kind: 'acting', decision };
        }
        continue;
      }

      // acting
      if (state.decision.action === 'rag') {
        const raw = await this.deps.retrieval.query(question, options.topK);
        rag = normalizeRetrieval(raw, options.topK);
        const first = rag.chunks[0];
        trace.record('rag', rag.answer || (first ? first.text : '(no chunks)'));
      } else {
        copilot = await this.deps.assistant.chat(question, options.topK);
        const answer = copilot.answer;
        trace.record('copilot', typeof answer === 'string' && answer !== '' ? answer : '(no answer)');
      }
      state = { kind: 'deciding' };
    }

    const finalTrace = trace.snapshot();
    const answer = await this.deps.generation.generate(
      buildManagerSynthesisPrompt(question, finalTrace),
      { model: this.deps.models.manager, ...SYNTHESIS_PARAMS }
    );

    return { answer, trace: finalTrace, rag, copilot, steps, stopReason: state.reason };
  }

  private async decide(question: string, trace: readonly TraceStep[]): Promise<ManagerDecision> {
    const raw = await this.deps.generation.generate(buildManagerDecisionPrompt(question, trace), {
      model: this.deps.models.manager,
      ...DECISION_PARAMS,
    });

    return parseManagerDecision(raw, (error) => {
      this.logger.warn(`Could not parse manager decision (${error}); defaulting to final`);
    });
  }
}
