/**
 * Test Utilities - Unified Reset
 *
 * Clears module-level caches and stubs for test isolation.
 *
 * @example
 * ```typescript
 * import { resetAll } from '../test-utils/index.js';
 *
 * beforeEach(() => {
 *   resetAll();
 *   vi.clearAllMocks();
 * });
 * ```
 */

import { vi } from 'vitest';
import { _clearEnvCache } from '../config/env.js';

/**
 * Reset cached state shared across tests:
 * 1. Restore stubbed environment variables
 * 2. Restore stubbed globals (fetch)
 * 3. Drop the cached environment so the next read sees the restored values
 */
export function resetAll(): void {
  vi.unstubAllEnvs();
  vi.unstubAllGlobals();
  _clearEnvCache();
}
