/**
 * Utilities Module
 *
 * Shared utility functions used across the codebase.
 */

// Fallible JSON parsing
export {
  tryParseJson,
  andThen,
  unwrapOr,
  isJsonObject,
  type ParseResult,
} from './json.js';

// Logging
export { consoleLogger, silentLogger, type Logger } from './logger.js';

// Text
export { truncateCodePoints } from './text.js';
