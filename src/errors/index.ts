/**
 * Error handling module for the pdfvec CLI and library
 *
 * This module exports:
 * - CLI error classes (end an invocation with an exit code)
 * - Pipeline failure records (returned per chunk/batch, never thrown out of a run)
 * - Error formatting and handling utilities
 *
 * Usage:
 *   import { ConfigError, handleError } from './errors/index.js';
 *
 *   throw new ConfigError('Invalid option', 'Try: pdfvec config list');
 */

// Error types
export {
  CLIError,
  FileNotFoundError,
  ConfigError,
  APIKeyError,
  DatabaseError,
  ValidationError,
  ExitCode,
} from './types.js';

// Pipeline failures
export {
  PipelineError,
  createFailure,
  toPipelineFailure,
  isPipelineFailure,
  describeFailure,
  type PipelineFailure,
  type PipelineFailureKind,
} from './pipeline.js';

// Error handling utilities
export {
  formatError,
  getExitCode,
  handleError,
  createGlobalErrorHandler,
  type ErrorHandlerOptions,
  type ErrorOutput,
} from './handler.js';
