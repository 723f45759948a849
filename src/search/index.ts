/**
 * Search Module
 *
 * Query embedding, nearest-chunk retrieval, scoring and context assembly.
 *
 * @example
 * ```typescript
 * import { createRetriever, assembleContext } from './search/index.js';
 *
 * const retriever = createRetriever(config.search, { embedder, store });
 * const outcome = await retriever.search('What is machine learning?');
 * const context = outcome.status === 'found'
 *   ? assembleContext(outcome.results, config.search.max_context_length)
 *   : NO_CONTEXT_NOTICE;
 * ```
 *
 * @packageDocumentation
 */

export { Retriever, createRetriever, validateTopK, type RetrieverDeps } from './retriever.js';

export {
  scoreResults,
  similarityFromDistance,
  relevanceScore,
  qualityLabel,
  sourceLabel,
} from './scoring.js';

export {
  assembleContext,
  truncateAtSentence,
  CONTEXT_SEPARATOR,
  NO_CONTEXT_NOTICE,
} from './context.js';

export {
  formatScore,
  truncateSnippet,
  formatResult,
  formatResults,
  formatOutcomeSummary,
  formatResultJSON,
  formatOutcomeJSON,
} from './formatter.js';

export type {
  QualityLabel,
  ScoredChunk,
  SearchOutcome,
  FormatOptions,
  FormattedResultJSON,
} from './types.js';
