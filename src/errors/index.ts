/**
 * Error handling module for Delve
 *
 * This module exports:
 * - Custom error classes for different error types
 * - Error formatting and handling utilities
 *
 * Usage:
 *   import { ConfigError, handleError } from './errors/index.js';
 *
 *   throw new ConfigError('Invalid option', 'Try: delve config list');
 */

// Error types
export {
  CLIError,
  ConfigError,
  APIKeyError,
  DatabaseError,
  ValidationError,
  ProviderError,
  ProviderQuotaExceededError,
  ProviderTimeoutError,
  SchemaValidationError,
  AllProvidersFailedError,
  IndexWriteError,
  StageError,
  StageFatalError,
  SessionNotFoundError,
  SessionStateError,
  type ProviderAttempt,
  type IndexBackendName,
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
