/**
 * HTTP transport tests
 *
 * fetch is stubbed globally; nothing leaves the process.
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { postJson, joinUrl } from '../http.js';
import { BackendError } from '../../errors/index.js';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

async function captureError(promise: Promise<unknown>): Promise<BackendError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof BackendError) return error;
    throw error;
  }
  throw new Error('Expected a BackendError');
}

describe('joinUrl', () => {
  it('joins without doubling slashes', () => {
    expect(joinUrl('http://rag:8080/', '/query')).toBe('http://rag:8080/query');
    expect(joinUrl('http://rag:8080', 'query')).toBe('http://rag:8080/query');
    expect(joinUrl('http://host/base//', '/api/generate')).toBe('http://host/base/api/generate');
  });
});

describe('postJson', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('posts the payload as JSON and returns the decoded object', async () => {
    const fetchMock = vi.fn().mockResolvedValue(jsonResponse({ answer: 'yes' }));
    vi.stubGlobal('fetch', fetchMock);

    const result = await postJson('retrieval', 'http://rag/query', { question: 'q', k: 2 }, {
      timeoutMs: 1000,
    });

    expect(result).toEqual({ answer: 'yes' });
    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe('http://rag/query');
    expect(init.method).toBe('POST');
    expect(JSON.parse(init.body)).toEqual({ question: 'q', k: 2 });
  });

  it('logs the call at debug level', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(jsonResponse({})));
    const logger = { warn: vi.fn(), debug: vi.fn() };

    await postJson('assistant', 'http://copilot/chat', {}, { timeoutMs: 1000, logger });

    expect(logger.debug).toHaveBeenCalledWith('POST http://copilot/chat (assistant)');
  });

  it('maps a non-2xx status to BackendError with the status', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn().mockResolvedValue(new Response('oops', { status: 502, statusText: 'Bad Gateway' }))
    );

    const error = await captureError(
      postJson('retrieval', 'http://rag/query', {}, { timeoutMs: 1000 })
    );

    expect(error.status).toBe(502);
    expect(error.service).toBe('retrieval');
    expect(error.message).toBe('HTTP 502 Bad Gateway (retrieval: http://rag/query)');
  });

  it('maps a transport failure to BackendError with the cause', async () => {
    const cause = new TypeError('fetch failed');
    vi.stubGlobal('fetch', vi.fn().mockRejectedValue(cause));

    const error = await captureError(
      postJson('assistant', 'http://copilot/chat', {}, { timeoutMs: 1000 })
    );

    expect(error.message).toBe('Request failed: fetch failed (assistant: http://copilot/chat)');
    expect(error.cause).toBe(cause);
    expect(error.status).toBeUndefined();
  });

  it('aborts and reports a timeout', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn((_url: string, init?: RequestInit) => {
        return new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
        });
      })
    );

    const error = await captureError(
      postJson('generation', 'http://ollama/api/generate', {}, { timeoutMs: 10 })
    );

    expect(error.message).toBe(
      'Request timed out after 10ms (generation: http://ollama/api/generate)'
    );
  });

  it('rejects a body that is not JSON', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(new Response('<html>', { status: 200 })));

    const error = await captureError(
      postJson('retrieval', 'http://rag/query', {}, { timeoutMs: 1000 })
    );

    expect(error.message).toMatch(/^Response is not valid JSON: /);
    expect(error.status).toBe(200);
  });

  it('rejects an empty body', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(new Response('', { status: 200 })));

    const error = await captureError(
      postJson('retrieval', 'http://rag/query', {}, { timeoutMs: 1000 })
    );

    expect(error.message).toBe('Response is not valid JSON: Empty input (retrieval: http://rag/query)');
  });

  it('rejects JSON that is not an object', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(jsonResponse([1, 2, 3])));

    const error = await captureError(
      postJson('retrieval', 'http://rag/query', {}, { timeoutMs: 1000 })
    );

    expect(error.message).toBe('Response is not a JSON object (retrieval: http://rag/query)');
  });
});
