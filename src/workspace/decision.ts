/**
 * Manager decision parser.
 *
 * Policy models wrap their JSON in prose or code fences, or answer
 * with an action that does not exist. Parsing never throws: anything
 * unusable becomes a `final` decision carrying a diagnostic reason.
 */

import { z } from 'zod';
import { tryParseJson, andThen, unwrapOr, type ParseResult } from '../utils/json.js';
import { MANAGER_ACTIONS, type ManagerDecision } from './types.js';

export const PARSE_FAILURE_REASON = 'Failed to parse; defaulting to final.';

const FALLBACK_DECISION: ManagerDecision = Object.freeze({
  action: 'final',
  reason: PARSE_FAILURE_REASON,
});

const ManagerDecisionSchema = z.object({
  action: z
    .string()
    .transform((action) => action.trim().toLowerCase())
    .pipe(z.enum(MANAGER_ACTIONS)),
  reason: z.unknown().transform((reason) => (typeof reason === 'string' ? reason.trim() : '')),
});

/**
 * Cut the text down to the outermost `{...}` span.
 * Text without braces is returned trimmed.
 */
export function extractJsonObject(raw: string): string {
  let text = raw.trim();

  if (!text.startsWith('{')) {
    const start = text.indexOf('{');
    if (start !== -1) text = text.slice(start);
  }
  if (!text.endsWith('}')) {
    const end = text.lastIndexOf('}');
    if (end !== -1) text = text.slice(0, end + 1);
  }

  return text;
}

function validateDecision(value: unknown): ParseResult<ManagerDecision> {
  const result = ManagerDecisionSchema.safeParse(value);
  if (!result.success) {
    return { ok: false, error: result.error.issues[0]?.message ?? 'Invalid decision' };
  }
  return { ok: true, value: result.data };
}

/**
 * Parse raw policy-model output into a decision.
 *
 * @param onFallback - Called with the failure reason when the default is used
 */
export function parseManagerDecision(
  raw: string,
  onFallback?: (error: string) => void
): ManagerDecision {
  const parsed = andThen(tryParseJson(extractJsonObject(raw)), validateDecision);
  return unwrapOr(parsed, () => ({ ...FALLBACK_DECISION }), onFallback);
}
