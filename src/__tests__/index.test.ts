import { describe, it, expect } from 'vitest';
import { runWorkspaceQuery, getHealth, QUERY_MODES, BackendError, silentLogger } from '../index.js';
import { createFakeBackends, createTestSettings } from '../test-utils/index.js';

describe('library entry', () => {
  it('exposes the liveness payload and mode list', () => {
    expect(getHealth()).toEqual({ status: 'ok', service: 'workspace-agent' });
    expect(QUERY_MODES).toEqual(['rag_only', 'assisted', 'manager_auto', 'study_guide']);
  });

  it('runs a one-shot query with injected clients', async () => {
    const clients = createFakeBackends({ retrieval: [{ answer: 'Kinetic energy.' }] });

    const result = await runWorkspaceQuery(
      { question: 'What is heat?', mode: 'rag_only', top_k: 2 },
      { settings: createTestSettings('/tmp/unused-guides'), clients, logger: silentLogger }
    );

    expect(result.answer).toBe('Kinetic energy.');
    expect(clients.calls.retrieval).toEqual([{ question: 'What is heat?', k: 2 }]);
  });

  it('lets backend errors through unchanged', async () => {
    const failure = new BackendError('assistant', 'http://localhost:8081/chat', 'Request timed out after 60000ms');
    const clients = createFakeBackends({ assistant: [failure] });

    await expect(
      runWorkspaceQuery({ question: 'q' }, { settings: createTestSettings('/tmp/unused-guides'), clients })
    ).rejects.toBe(failure);
  });
});
