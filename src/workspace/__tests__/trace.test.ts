import { describe, it, expect } from 'vitest';
import { TraceRecorder, prependStep, truncateSummary, MAX_SUMMARY_LENGTH } from '../trace.js';

describe('TraceRecorder', () => {
  it('numbers steps from 1 in order', () => {
    const trace = new TraceRecorder();

    trace.record('rag', 'a');
    trace.record('copilot', 'b');

    expect(trace.snapshot()).toEqual([
      { step: 1, tool: 'rag', summary: 'a' },
      { step: 2, tool: 'copilot', summary: 'b' },
    ]);
    expect(trace.length).toBe(2);
  });

  it('cuts summaries to 400 characters', () => {
    const trace = new TraceRecorder();

    const step = trace.record('rag', 'x'.repeat(1000));

    expect(step.summary).toHaveLength(MAX_SUMMARY_LENGTH);
  });

  it('keeps an emoji at the cut point whole', () => {
    const trace = new TraceRecorder();

    const step = trace.record('rag', `${'x'.repeat(399)}😀tail`);

    expect(step.summary).toBe(`${'x'.repeat(399)}😀`);
    expect(Array.from(step.summary)).toHaveLength(MAX_SUMMARY_LENGTH);
  });

  it('returns copies from snapshot', () => {
    const trace = new TraceRecorder();
    trace.record('manager', 'stop');

    const snapshot = trace.snapshot();
    snapshot.push({ step: 9, tool: 'rag', summary: 'x' });

    expect(trace.length).toBe(1);
  });
});

describe('truncateSummary', () => {
  it('leaves short text alone', () => {
    expect(truncateSummary('short')).toBe('short');
    expect(truncateSummary('abcdef', 3)).toBe('abc');
  });
});

describe('prependStep', () => {
  it('inserts step 1 and renumbers the rest', () => {
    const result = prependStep(
      [
        { step: 1, tool: 'rag', summary: 'r' },
        { step: 2, tool: 'study_guide_llm', summary: 'g' },
      ],
      'study_guide (direct)',
      'routed'
    );

    expect(result).toEqual([
      { step: 1, tool: 'study_guide (direct)', summary: 'routed' },
      { step: 2, tool: 'rag', summary: 'r' },
      { step: 3, tool: 'study_guide_llm', summary: 'g' },
    ]);
  });
});
