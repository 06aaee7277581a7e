import { describe, it, expect } from 'vitest';
import { normalizeRetrieval, normalizeChunk, findChunkList } from '../normalizer.js';

const SNIPPETS = [
  { content: 'Entropy measures disorder.', metadata: { source: 'thermo.pdf', page: 3 } },
  { text: 'Heat flows from hot to cold.', source: 'notes.md', chunk_id: 'c-2' },
  { page_content: 'The second law...', metadata: { file_name: 'lecture2.pdf', chunk_id: 7 } },
];

describe('normalizeRetrieval', () => {
  it('produces the same chunks for each snippet-list key', () => {
    const fromChunks = normalizeRetrieval({ chunks: SNIPPETS }, 8).chunks;
    const fromRetrieved = normalizeRetrieval({ retrieved: SNIPPETS }, 8).chunks;
    const fromResults = normalizeRetrieval({ results: SNIPPETS }, 8).chunks;

    expect(fromRetrieved).toEqual(fromChunks);
    expect(fromResults).toEqual(fromChunks);
    expect(fromChunks).toEqual([
      { idx: 1, source: 'thermo.pdf', page: 3, chunk_id: null, text: 'Entropy measures disorder.' },
      { idx: 2, source: 'notes.md', page: null, chunk_id: 'c-2', text: 'Heat flows from hot to cold.' },
      { idx: 3, source: 'lecture2.pdf', page: null, chunk_id: '7', text: 'The second law...' },
    ]);
  });

  it('numbers chunks 1..min(top_k, returned)', () => {
    const items = Array.from({ length: 6 }, (_, i) => ({ text: `t${i}` }));

    expect(normalizeRetrieval({ chunks: items }, 4).chunks.map((c) => c.idx)).toEqual([1, 2, 3, 4]);
    expect(normalizeRetrieval({ chunks: items }, 10).chunks.map((c) => c.idx)).toEqual([
      1, 2, 3, 4, 5, 6,
    ]);
  });

  it('handles a results payload with an empty answer', () => {
    const result = normalizeRetrieval(
      { results: [{ text: "Newton's second law..." }], answer: '' },
      8
    );

    expect(result.answer).toBe('');
    expect(result.chunks).toEqual([
      { idx: 1, source: 'chunk', page: null, chunk_id: null, text: "Newton's second law..." },
    ]);
  });

  it('prefers chunks over retrieved over results', () => {
    const result = normalizeRetrieval(
      { chunks: [{ text: 'a' }], retrieved: [{ text: 'b' }], results: [{ text: 'c' }] },
      8
    );

    expect(result.chunks.map((c) => c.text)).toEqual(['a']);
  });

  it('keeps the raw payload and a string answer', () => {
    const payload = { answer: 'It depends.', chunks: [] };

    const result = normalizeRetrieval(payload, 5);

    expect(result.raw).toBe(payload);
    expect(result.answer).toBe('It depends.');
  });

  it('ignores a non-string answer', () => {
    expect(normalizeRetrieval({ answer: { text: 'x' } }, 5).answer).toBe('');
  });

  it('yields an empty list for unknown shapes', () => {
    expect(normalizeRetrieval({}, 5).chunks).toEqual([]);
    expect(normalizeRetrieval({ data: [{ text: 'x' }] }, 5).chunks).toEqual([]);
  });

  it('returns no chunks for a non-positive top_k', () => {
    expect(normalizeRetrieval({ chunks: SNIPPETS }, 0).chunks).toEqual([]);
  });
});

describe('findChunkList', () => {
  it('falls through an empty or non-list value', () => {
    expect(findChunkList({ chunks: [], retrieved: [{ text: 'b' }] })).toEqual([{ text: 'b' }]);
    expect(findChunkList({ chunks: 'oops', results: ['c'] })).toEqual(['c']);
  });
});

describe('normalizeChunk', () => {
  it('uses the text priority content > text > page_content > metadata.text', () => {
    expect(normalizeChunk({ text: 'b', content: 'a' }, 1).text).toBe('a');
    expect(normalizeChunk({ text: 'b', page_content: 'c' }, 1).text).toBe('b');
    expect(normalizeChunk({ content: '', metadata: { text: 'd' } }, 1).text).toBe('d');
  });

  it('reads the source from the item, then metadata source, then file_name', () => {
    expect(normalizeChunk({ source: 'a', metadata: { source: 'b' } }, 1).source).toBe('a');
    expect(normalizeChunk({ metadata: { source: 'b', file_name: 'c' } }, 1).source).toBe('b');
    expect(normalizeChunk({ metadata: { file_name: 'c' } }, 1).source).toBe('c');
  });

  it('reads chunk_id from the item before metadata', () => {
    expect(normalizeChunk({ chunk_id: 'item', metadata: { chunk_id: 'meta' } }, 1).chunk_id).toBe(
      'item'
    );
  });

  it('accepts a numeric page given as text', () => {
    expect(normalizeChunk({ metadata: { page: '12' } }, 1).page).toBe(12);
    expect(normalizeChunk({ metadata: { page: 'twelve' } }, 1).page).toBeNull();
  });

  it('takes a plain string item as the text', () => {
    expect(normalizeChunk('just text', 2)).toEqual({
      idx: 2,
      source: 'chunk',
      page: null,
      chunk_id: null,
      text: 'just text',
    });
  });

  it('never fails on junk items', () => {
    expect(normalizeChunk(null, 1)).toEqual({
      idx: 1,
      source: 'chunk',
      page: null,
      chunk_id: null,
      text: '',
    });
    expect(normalizeChunk({ metadata: 'nope', text: 42 }, 3).text).toBe('');
  });
});
