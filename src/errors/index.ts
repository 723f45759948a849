/**
 * Error handling module for docqa
 *
 *   import { ValidationError, handleError } from './errors/index.js';
 */

export {
  CLIError,
  FileNotFoundError,
  ConfigError,
  APIKeyError,
  ValidationError,
  ProviderError,
  StorageError,
  TimeoutError,
  DuplicateDocumentError,
  DocumentNotFoundError,
} from './types.js';

export {
  classifyError,
  failureKindOf,
  type FailureKind,
  type ClassifiedFailure,
} from './classify.js';

export {
  formatError,
  getExitCode,
  handleError,
  createGlobalErrorHandler,
  type ErrorHandlerOptions,
  type ErrorOutput,
} from './handler.js';
