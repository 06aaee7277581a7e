/**
 * Tests for fallible JSON parsing utilities
 */

import { describe, it, expect, vi } from 'vitest';
import { tryParseJson, andThen, unwrapOr, isJsonObject, type ParseResult } from '../json.js';

describe('tryParseJson', () => {
  it('parses a JSON object', () => {
    expect(tryParseJson('{"action":"rag","reason":"need context"}')).toEqual({
      ok: true,
      value: { action: 'rag', reason: 'need context' },
    });
  });

  it('parses JSON primitives', () => {
    expect(tryParseJson('42')).toEqual({ ok: true, value: 42 });
    expect(tryParseJson('null')).toEqual({ ok: true, value: null });
  });

  it('fails on null, undefined and blank input', () => {
    expect(tryParseJson(null)).toEqual({ ok: false, error: 'Empty input' });
    expect(tryParseJson(undefined)).toEqual({ ok: false, error: 'Empty input' });
    expect(tryParseJson('   ')).toEqual({ ok: false, error: 'Empty input' });
  });

  it('fails on malformed JSON without throwing', () => {
    const result = tryParseJson('{action: rag}');

    expect(result.ok).toBe(false);
  });

  it('fails on truncated JSON', () => {
    expect(tryParseJson('{"action": "fin').ok).toBe(false);
  });
});

describe('andThen', () => {
  const positive = (value: unknown): ParseResult<number> =>
    typeof value === 'number' && value > 0
      ? { ok: true, value }
      : { ok: false, error: 'not positive' };

  it('runs the next step on success', () => {
    expect(andThen(tryParseJson('5'), positive)).toEqual({ ok: true, value: 5 });
  });

  it('reports the next step failure', () => {
    expect(andThen(tryParseJson('-1'), positive)).toEqual({ ok: false, error: 'not positive' });
  });

  it('skips the next step after a failed parse', () => {
    const next = vi.fn(positive);

    const result = andThen(tryParseJson(''), next);

    expect(result).toEqual({ ok: false, error: 'Empty input' });
    expect(next).not.toHaveBeenCalled();
  });
});

describe('unwrapOr', () => {
  it('returns the value on success', () => {
    expect(unwrapOr<number>({ ok: true, value: 3 }, () => 0)).toBe(3);
  });

  it('returns the fallback and reports the error on failure', () => {
    const onError = vi.fn();

    const value = unwrapOr<string>({ ok: false, error: 'bad' }, (e) => `fallback: ${e}`, onError);

    expect(value).toBe('fallback: bad');
    expect(onError).toHaveBeenCalledWith('bad');
  });
});

describe('isJsonObject', () => {
  it('accepts plain objects only', () => {
    expect(isJsonObject({ a: 1 })).toBe(true);
    expect(isJsonObject([])).toBe(false);
    expect(isJsonObject(null)).toBe(false);
    expect(isJsonObject('text')).toBe(false);
  });
});
