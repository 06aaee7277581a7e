/**
 * Append-only tool-call trace for one request.
 */

import { truncateCodePoints } from '../utils/text.js';
import type { TraceStep, TraceTool } from './types.js';

export const MAX_SUMMARY_LENGTH = 400;

export function truncateSummary(summary: string, maxLength = MAX_SUMMARY_LENGTH): string {
  return truncateCodePoints(summary, maxLength);
}

export class TraceRecorder {
  private readonly steps: TraceStep[] = [];

  /**
   * Record a step; its number is one past the last recorded step.
   */
  record(tool: TraceTool, summary: string): TraceStep {
    const step: TraceStep = {
      step: this.steps.length + 1,
      tool,
      summary: truncateSummary(summary),
    };
    this.steps.push(step);
    return step;
  }

  get length(): number {
    return this.steps.length;
  }

  /** Copy of the steps recorded so far */
  snapshot(): TraceStep[] {
    return this.steps.map((step) => ({ ...step }));
  }
}

/**
 * Put `entry` in front of `trace` as step 1 and renumber the rest.
 */
export function prependStep(
  trace: readonly TraceStep[],
  tool: TraceTool,
  summary: string
): TraceStep[] {
  return [
    { step: 1, tool, summary: truncateSummary(summary) },
    ...trace.map((entry, index) => ({ ...entry, step: index + 2 })),
  ];
}
