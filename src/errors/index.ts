/**
 * Error handling module for Workspace Agent
 *
 * This module exports:
 * - Custom error classes for different error types
 * - Error formatting and handling utilities
 *
 * Usage:
 *   import { BackendError, handleError } from './errors/index.js';
 *
 *   throw new BackendError('retrieval', url, 'HTTP 502');
 */

// Error types
export {
  CLIError,
  ConfigError,
  ValidationError,
  BackendError,
  ExportError,
  type BackendService,
} from './types.js';

// Error handling utilities
export {
  formatError,
  getExitCode,
  handleError,
  createGlobalErrorHandler,
  type ErrorHandlerOptions,
  type ErrorOutput,
} from './handler.js';
