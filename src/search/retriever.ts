/**
 * Retriever
 *
 * Embeds a query, asks the chunk store for its nearest chunks and scores
 * them.
 *
 * @example
 * ```typescript
 * const retriever = createRetriever(config.search, { embedder: client, store });
 *
 * const outcome = await retriever.search('What is machine learning?', 3);
 * if (outcome.status === 'found') {
 *   console.log(outcome.results[0].sourceLabel, outcome.relevanceScore);
 * }
 * ```
 */

import type { Config } from '../config/schema.js';
import type { ChunkStore } from '../database/chunk-store.js';
import { ValidationError } from '../errors/index.js';
import type { EmbeddingClient } from '../indexer/embedder/client.js';
import { scoreResults } from './scoring.js';
import type { SearchOutcome } from './types.js';

export interface RetrieverDeps {
  embedder: Pick<EmbeddingClient, 'embedOne'>;
  store: Pick<ChunkStore, 'nearest'>;
}

/**
 * @throws ValidationError unless topK is a positive integer
 */
export function validateTopK(topK: number): void {
  if (!Number.isInteger(topK) || topK < 1) {
    throw new ValidationError(`top_k must be a positive integer (got ${topK})`);
  }
}

export class Retriever {
  constructor(
    private readonly deps: RetrieverDeps,
    readonly defaultTopK: number
  ) {}

  /**
   * Ranked chunks for a question, best match first.
   *
   * @throws ValidationError for an empty query or a bad topK
   * @throws ProviderError | TimeoutError when embedding the query fails
   * @throws StorageError when the store can't be read
   */
  async search(query: string, topK: number = this.defaultTopK): Promise<SearchOutcome> {
    validateTopK(topK);
    const vector = await this.deps.embedder.embedOne(query);
    return this.searchByVector(vector, topK);
  }

  /**
   * Search with an already-computed query vector.
   */
  searchByVector(vector: ArrayLike<number>, topK: number = this.defaultTopK): SearchOutcome {
    validateTopK(topK);
    return scoreResults(this.deps.store.nearest(vector, topK));
  }
}

export function createRetriever(config: Config['search'], deps: RetrieverDeps): Retriever {
  return new Retriever(deps, config.default_top_k);
}
