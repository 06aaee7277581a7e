/**
 * Prompt templates for the generation backend.
 *
 * {{NAME}} placeholders are filled in a single pass, so text inside a
 * question or chunk is never re-expanded.
 */

import { truncateCodePoints } from '../utils/text.js';
import type { Chunk, TraceStep } from './types.js';

export const NO_CONTEXT = '(no context found)';
export const NO_PREVIOUS_STEPS = '(no previous steps)';
export const NO_STEPS_EXECUTED = '(no internal steps executed)';

/**
 * Replace every {{NAME}} with its value. Unknown names become ''.
 */
export function fillTemplate(template: string, values: Record<string, string>): string {
  return template.replace(/\{\{([A-Z_]+)\}\}/g, (_match, name: string) => values[name] ?? '');
}

// ============================================================================
// FORMATTING
// ============================================================================

/**
 * Render chunks as `[idx] text` blocks within a character budget.
 *
 * Chunks are kept in order until the next one no longer fits; the
 * rest are dropped. A first chunk larger than the budget is cut.
 */
export function formatChunkContext(chunks: readonly Chunk[], maxChars: number): string {
  const parts: string[] = [];
  let used = 0;

  for (const chunk of chunks) {
    const entry = `[${chunk.idx}] ${chunk.text}`;

    if (parts.length === 0) {
      if (entry.length > maxChars) {
        parts.push(truncateCodePoints(entry, maxChars));
        break;
      }
      parts.push(entry);
      used = entry.length;
      continue;
    }

    const next = used + 2 + entry.length;
    if (next > maxChars) break;
    parts.push(entry);
    used = next;
  }

  return parts.join('\n\n');
}

/**
 * Render the trace as `Step i via tool: summary` lines.
 */
export function formatTrace(trace: readonly TraceStep[], empty: string): string {
  if (trace.length === 0) return empty;
  return trace.map((entry) => `Step ${entry.step} via ${entry.tool}: ${entry.summary}`).join('\n');
}

// ============================================================================
// TEMPLATES
// ============================================================================

const GROUNDED_ANSWER_TEMPLATE = `The user asked:
{{QUESTION}}

Here are context snippets from their study library:
{{CONTEXT}}

Provide a short, direct answer using ONLY this context.
If you truly cannot answer from it, say so honestly.`;

const MANAGER_DECISION_TEMPLATE = `You are the manager for a workspace agent.

The user asked:
{{QUESTION}}

Internal tool-call history so far:
{{HISTORY}}

Tools you can choose:
  - "rag": query the retrieval service for the top-K context snippets.
  - "copilot": ask the assistant service (which runs its own retrieval).
  - "final": stop calling tools and produce the final answer.

Respond with STRICT JSON, no extra text:
{
  "action": "rag" | "copilot" | "final",
  "reason": "short explanation"
}`;

const MANAGER_SYNTHESIS_TEMPLATE = `You are a workspace agent.

The user asked:
{{QUESTION}}

Here is the internal tool-call trace:
{{TRACE}}

Using ONLY what is implied or explicitly stated in that trace,
provide a clear, concise answer. If information is missing, say so
instead of making it up.`;

const STUDY_GUIDE_TEMPLATE = `You are a strict but helpful study planner.

The user wants a study guide for:
{{QUESTION}}

Here is the context from their study library:
{{CONTEXT}}

Build a clear, structured study guide that stays grounded in the context.
Requirements:
- Use markdown.
- Start with a short overview.
- Then create 5-10 sections with headings.
- Under each section, list concrete bullet points, exercises, or checkpoints.
- Do NOT invent facts that are not supported by the context.`;

// ============================================================================
// BUILDERS
// ============================================================================

export function buildGroundedAnswerPrompt(
  question: string,
  chunks: readonly Chunk[],
  maxContextChars: number
): string {
  return fillTemplate(GROUNDED_ANSWER_TEMPLATE, {
    QUESTION: question,
    CONTEXT: formatChunkContext(chunks, maxContextChars),
  });
}

export function buildManagerDecisionPrompt(question: string, trace: readonly TraceStep[]): string {
  return fillTemplate(MANAGER_DECISION_TEMPLATE, {
    QUESTION: question,
    HISTORY: formatTrace(trace, NO_PREVIOUS_STEPS),
  });
}

export function buildManagerSynthesisPrompt(question: string, trace: readonly TraceStep[]): string {
  return fillTemplate(MANAGER_SYNTHESIS_TEMPLATE, {
    QUESTION: question,
    TRACE: formatTrace(trace, NO_STEPS_EXECUTED),
  });
}

/**
 * With no chunks, the retrieval answer (or a placeholder) stands in
 * as the context.
 */
export function buildStudyGuidePrompt(
  question: string,
  chunks: readonly Chunk[],
  fallbackAnswer: string,
  maxContextChars: number
): string {
  const context =
    chunks.length > 0
      ? formatChunkContext(chunks, maxContextChars)
      : fallbackAnswer || NO_CONTEXT;

  return fillTemplate(STUDY_GUIDE_TEMPLATE, { QUESTION: question, CONTEXT: context });
}
