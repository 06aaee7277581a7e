/**
 * Retrieval response normalizer.
 *
 * Retrieval backends disagree on where the snippet list lives
 * (`chunks`, `retrieved` or `results`) and on how each snippet names
 * its text and source. This folds them into one Chunk list.
 *
 * Pure and total: any input yields a RagResult.
 */

import { isJsonObject } from '../utils/json.js';
import type { Chunk, RagResult } from './types.js';

/** Snippet list keys, highest priority first */
export const CHUNK_LIST_KEYS = ['chunks', 'retrieved', 'results'] as const;

const TEXT_KEYS = ['content', 'text', 'page_content'] as const;

export const FALLBACK_SOURCE = 'chunk';

/**
 * First non-empty string among the candidates.
 */
function firstText(...candidates: unknown[]): string | undefined {
  for (const candidate of candidates) {
    if (typeof candidate === 'string' && candidate !== '') {
      return candidate;
    }
  }
  return undefined;
}

function toPage(value: unknown): number | null {
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    if (Number.isFinite(parsed)) return parsed;
  }
  return null;
}

function toChunkId(...candidates: unknown[]): string | null {
  for (const candidate of candidates) {
    if (typeof candidate === 'string' && candidate !== '') return candidate;
    if (typeof candidate === 'number' && Number.isFinite(candidate)) return String(candidate);
  }
  return null;
}

/**
 * Locate the snippet list. An empty or non-list value falls through
 * to the next key.
 */
export function findChunkList(payload: Record<string, unknown>): unknown[] {
  for (const key of CHUNK_LIST_KEYS) {
    const value = payload[key];
    if (Array.isArray(value) && value.length > 0) {
      return value;
    }
  }
  return [];
}

/**
 * Normalize one snippet. `idx` is assigned by the caller.
 */
export function normalizeChunk(item: unknown, idx: number): Chunk {
  if (typeof item === 'string') {
    return { idx, source: FALLBACK_SOURCE, page: null, chunk_id: null, text: item };
  }

  const fields = isJsonObject(item) ? item : {};
  const metadata = isJsonObject(fields.metadata) ? fields.metadata : {};

  return {
    idx,
    source:
      firstText(fields.source, metadata.source, metadata.file_name) ?? FALLBACK_SOURCE,
    page: toPage(metadata.page),
    chunk_id: toChunkId(fields.chunk_id, metadata.chunk_id),
    text: firstText(...TEXT_KEYS.map((key) => fields[key]), metadata.text) ?? '',
  };
}

/**
 * Fold a raw retrieval payload into a RagResult holding at most
 * `topK` chunks, numbered from 1 in backend order.
 */
export function normalizeRetrieval(payload: Record<string, unknown>, topK: number): RagResult {
  const limit = Math.max(0, Math.floor(topK));
  const chunks = findChunkList(payload)
    .slice(0, limit)
    .map((item, position) => normalizeChunk(item, position + 1));

  return {
    answer: typeof payload.answer === 'string' ? payload.answer : '',
    chunks,
    raw: payload,
  };
}
