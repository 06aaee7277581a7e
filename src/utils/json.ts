/**
 * JSON Utilities
 *
 * Fallible JSON parsing for untrusted text (model output, backend bodies).
 * Parsing returns a result value instead of throwing, so callers pick a
 * default explicitly.
 */

/**
 * Outcome of a fallible parse.
 *
 * When ok: { ok: true, value }
 * When not: { ok: false, error }
 */
export type ParseResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: string };

/**
 * Parse a JSON string without throwing.
 *
 * @example
 * ```typescript
 * const parsed = tryParseJson('{"action":"rag"}');
 * if (parsed.ok) {
 *   console.log(parsed.value);
 * }
 * ```
 */
export function tryParseJson(json: string | null | undefined): ParseResult<unknown> {
  if (json === null || json === undefined || json.trim() === '') {
    return { ok: false, error: 'Empty input' };
  }

  try {
    return { ok: true, value: JSON.parse(json) as unknown };
  } catch (error) {
    return {
      ok: false,
      error: error instanceof Error ? error.message : String(error),
    };
  }
}

/**
 * Chain a second fallible step onto a successful parse.
 * Failures pass through untouched.
 */
export function andThen<T, U>(
  result: ParseResult<T>,
  next: (value: T) => ParseResult<U>
): ParseResult<U> {
  return result.ok ? next(result.value) : result;
}

/**
 * Collapse a parse result to a value, using the fallback on failure.
 *
 * @param onError - Optional callback for logging the failure reason
 */
export function unwrapOr<T>(
  result: ParseResult<T>,
  fallback: (error: string) => T,
  onError?: (error: string) => void
): T {
  if (result.ok) {
    return result.value;
  }
  onError?.(result.error);
  return fallback(result.error);
}

/**
 * Type guard for plain JSON objects (not arrays, not null).
 */
export function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
