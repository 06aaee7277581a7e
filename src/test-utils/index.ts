/**
 * Test Utilities Module
 *
 * Shared utilities for testing across the codebase.
 *
 * @example
 * ```typescript
 * import { resetAll, createFakeBackends } from '../test-utils/index.js';
 *
 * beforeEach(() => {
 *   resetAll();
 * });
 * ```
 */

export { resetAll } from './reset.js';
export {
  createFakeBackends,
  createTestSettings,
  type FakeBackends,
  type FakeBackendCalls,
  type FakeBackendScript,
} from './fakes.js';
