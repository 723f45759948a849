/**
 * Error type definitions for docqa
 *
 * These custom error classes provide:
 * - Actionable error messages with recovery hints
 * - Exit codes for programmatic error handling
 * - A failure taxonomy the RAG pipeline reports to its callers
 */

/**
 * Base class for all docqa errors.
 *
 * - hint: tells the user how to fix the problem
 * - code: process exit code, so scripts can tell failures apart
 */
export class CLIError extends Error {
  /** Recovery suggestion shown to the user */
  public readonly hint?: string;

  /** Exit code (1-255, 0 is reserved for success) */
  public readonly code: number;

  constructor(
    message: string,
    hint?: string,
    code: number = 1,
    options?: ErrorOptions
  ) {
    super(message, options);
    // Required for instanceof checks after transpilation
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = 'CLIError';
    this.hint = hint;
    this.code = code;
  }
}

/**
 * Thrown when a file doesn't exist.
 *
 * Exit code 3: File not found
 */
export class FileNotFoundError extends CLIError {
  constructor(path: string) {
    super(`Path does not exist: ${path}`, 'Check the path and try again', 3);
    this.name = 'FileNotFoundError';
  }
}

/**
 * Thrown for configuration file errors: invalid TOML, unknown keys,
 * values outside their allowed range.
 *
 * Exit code 2: Configuration error
 */
export class ConfigError extends CLIError {
  constructor(message: string, hint?: string) {
    super(message, hint ?? 'Run: docqa config list  to see valid options', 2);
    this.name = 'ConfigError';
  }
}

/**
 * Thrown when a provider API key is missing.
 *
 * Exit code 4: API key error
 */
export class APIKeyError extends CLIError {
  constructor(provider: string, envVar?: string) {
    const envVarName = envVar ?? `${provider.toUpperCase()}_API_KEY`;
    super(
      `${provider} API key not configured`,
      `Set the ${envVarName} environment variable (a .env file works too)`,
      4
    );
    this.name = 'APIKeyError';
  }
}

/**
 * Thrown when input validation fails: empty text, bad chunking options,
 * prompt templates without their placeholders.
 *
 * Exit code 1: General error (validation is user input error)
 */
export class ValidationError extends CLIError {
  /** Individual validation issues */
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    const hint =
      issues.length > 0
        ? `Issues:\n  ${issues.join('\n  ')}`
        : 'Check your input and try again';
    super(message, hint, 1);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

/**
 * Thrown when an embedding or generation call fails.
 *
 * Never retried by docqa itself; the caller decides on a retry policy.
 *
 * Exit code 6: Provider error
 */
export class ProviderError extends CLIError {
  /** HTTP status reported by the provider, when there was a response */
  public readonly status?: number;

  constructor(
    message: string,
    options: { cause?: Error; status?: number; hint?: string } = {}
  ) {
    super(
      message,
      options.hint ?? 'Check your API key and network connection, then retry',
      6,
      { cause: options.cause }
    );
    this.name = 'ProviderError';
    this.status = options.status;
  }
}

/**
 * Thrown for database errors: the file can't be opened, a statement
 * fails, or a constraint is violated.
 *
 * Exit code 5: Storage error
 */
export class StorageError extends CLIError {
  /** `cause` carries the original database error */
  constructor(message: string, cause?: Error) {
    super(message, 'Try running: docqa list  to check database health', 5, {
      cause,
    });
    this.name = 'StorageError';
  }
}

/**
 * Thrown when an external call does not settle within its limit.
 *
 * Kept apart from ProviderError: a timeout is worth retrying with backoff.
 *
 * Exit code 7: Timeout
 */
export class TimeoutError extends CLIError {
  /** The limit that was exceeded, in milliseconds */
  public readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number) {
    super(
      `${operation} timed out after ${timeoutMs}ms`,
      'Retry later, or raise the timeout_ms setting in config.toml',
      7
    );
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Thrown when an upload has the same content as a stored document.
 */
export class DuplicateDocumentError extends ValidationError {
  /** Id of the document that already holds this content */
  public readonly existingId: number;

  constructor(filename: string, existingId: number) {
    super(`${filename} has already been uploaded as document ${existingId}`, [
      `Use: docqa ingest ${filename} --replace ${existingId}  to regenerate its chunks`,
    ]);
    this.name = 'DuplicateDocumentError';
    this.existingId = existingId;
  }
}

/**
 * Thrown when a document id doesn't exist.
 *
 * Exit code 3: Not found
 */
export class DocumentNotFoundError extends CLIError {
  constructor(documentId: number) {
    super(
      `Document ${documentId} not found`,
      'Run: docqa list  to see stored documents',
      3
    );
    this.name = 'DocumentNotFoundError';
  }
}
