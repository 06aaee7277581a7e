/**
 * Environment Variable Handler Tests
 *
 * Uses vi.stubEnv() for safe environment variable mocking.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { loadEnv, _clearEnvCache, ENV_KEYS, SETUP_INSTRUCTIONS } from '../env.js';

describe('Environment Variable Loading', () => {
  beforeEach(() => {
    _clearEnvCache();
    for (const key of ENV_KEYS) {
      vi.stubEnv(key, '');
    }
  });

  afterEach(() => {
    _clearEnvCache();
    vi.unstubAllEnvs();
  });

  describe('loadEnv()', () => {
    it('loads backend addresses when set', () => {
      vi.stubEnv('WORKSPACE_RETRIEVAL_URL', 'http://rag.internal:9000');
      vi.stubEnv('OLLAMA_HOST', 'http://192.168.1.100:11434');

      const env = loadEnv();

      expect(env.WORKSPACE_RETRIEVAL_URL).toBe('http://rag.internal:9000');
      expect(env.OLLAMA_HOST).toBe('http://192.168.1.100:11434');
    });

    it('treats blank values as unset', () => {
      vi.stubEnv('WORKSPACE_MANAGER_MODEL', '   ');

      expect(loadEnv().WORKSPACE_MANAGER_MODEL).toBeUndefined();
    });

    it('trims surrounding whitespace', () => {
      vi.stubEnv('WORKSPACE_CHAT_MODEL', ' mistral ');

      expect(loadEnv().WORKSPACE_CHAT_MODEL).toBe('mistral');
    });

    it('caches environment variables after first load', () => {
      vi.stubEnv('WORKSPACE_CHAT_MODEL', 'first');
      const first = loadEnv();

      vi.stubEnv('WORKSPACE_CHAT_MODEL', 'second');
      const second = loadEnv();

      expect(second).toBe(first);
      expect(second.WORKSPACE_CHAT_MODEL).toBe('first');
    });

    it('reloads after the cache is cleared', () => {
      vi.stubEnv('WORKSPACE_CHAT_MODEL', 'first');
      loadEnv();

      vi.stubEnv('WORKSPACE_CHAT_MODEL', 'second');
      _clearEnvCache();

      expect(loadEnv().WORKSPACE_CHAT_MODEL).toBe('second');
    });
  });

  describe('SETUP_INSTRUCTIONS', () => {
    it('names the variable for each backend', () => {
      expect(SETUP_INSTRUCTIONS.retrieval).toContain('WORKSPACE_RETRIEVAL_URL');
      expect(SETUP_INSTRUCTIONS.assistant).toContain('WORKSPACE_ASSISTANT_URL');
      expect(SETUP_INSTRUCTIONS.generation).toContain('OLLAMA_HOST');
    });
  });
});
