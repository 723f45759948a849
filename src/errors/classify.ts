/**
 * Failure classification for the query pipeline.
 *
 * The RAG engine reports failures as a kind plus a message instead of
 * throwing. Anything outside the taxonomy is a bug and is rethrown.
 */

import {
  APIKeyError,
  ConfigError,
  ProviderError,
  StorageError,
  TimeoutError,
  ValidationError,
} from './types.js';

export type FailureKind = 'validation' | 'provider' | 'storage' | 'timeout';

export interface ClassifiedFailure {
  kind: FailureKind;
  message: string;
}

/**
 * Map an error to its failure kind, or undefined when it isn't one of ours.
 */
export function failureKindOf(error: unknown): FailureKind | undefined {
  // TimeoutError first: it must never be reported as a provider failure
  if (error instanceof TimeoutError) return 'timeout';
  if (error instanceof ValidationError || error instanceof ConfigError) {
    return 'validation';
  }
  if (error instanceof ProviderError || error instanceof APIKeyError) {
    return 'provider';
  }
  if (error instanceof StorageError) return 'storage';
  return undefined;
}

/**
 * Classify an error, rethrowing anything that isn't part of the taxonomy.
 */
export function classifyError(error: unknown): ClassifiedFailure {
  const kind = failureKindOf(error);
  if (kind === undefined || !(error instanceof Error)) {
    throw error;
  }
  return { kind, message: error.message };
}
