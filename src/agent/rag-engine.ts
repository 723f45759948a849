/**
 * RAG Engine
 *
 * Answers one question at a time against the stored chunks:
 *
 * ```
 * received ──► embedding ──► retrieving ──► generating ──► completed
 *     │            │              │              │
 *     └────────────┴──────────────┴──────────────┴──► failed
 * ```
 *
 * - received: the query must be non-blank and topK a positive integer
 * - embedding: one embedding request for the query text
 * - retrieving: nearest chunks from the store, scored
 * - generating: one chat request with the assembled context
 *
 * Nothing is retried. A failure in any state ends the request with a
 * failure kind and message instead of a partial answer. Answering writes
 * nothing, so asking again is always safe.
 *
 * @example
 * ```typescript
 * const engine = createRAGEngine(config, { embedder, retriever, generator });
 *
 * const result = await engine.answer('What is machine learning?');
 * if (result.success) {
 *   console.log(result.answer, result.sources);
 * } else {
 *   console.error(`${result.error.kind}: ${result.error.message}`);
 * }
 * ```
 */

import type { Config } from '../config/schema.js';
import { CLIError, ProviderError, ValidationError, classifyError } from '../errors/index.js';
import type { EmbeddingClient } from '../indexer/embedder/client.js';
import type { GenerationProvider, GenerationResponse } from '../providers/types.js';
import { assembleContext, NO_CONTEXT_NOTICE } from '../search/context.js';
import { validateTopK, type Retriever } from '../search/retriever.js';
import type { ScoredChunk, SearchOutcome } from '../search/types.js';
import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';
import { withTimeout } from '../utils/timeout.js';
import { renderUserPrompt, validatePrompts } from './prompt.js';
import type {
  AnswerOptions,
  GenerationSettings,
  PromptSettings,
  RAGAnswer,
  RAGFailure,
  RAGResult,
  RAGState,
  StateChangeListener,
} from './types.js';

export interface RAGEngineDeps {
  embedder: Pick<EmbeddingClient, 'embedOne'>;
  retriever: Pick<Retriever, 'searchByVector' | 'defaultTopK'>;
  generator: GenerationProvider;
  logger?: Logger;
  /** Called on every state transition of every request */
  onStateChange?: StateChangeListener;
}

export interface RAGEngineSettings {
  prompts: PromptSettings;
  generation: GenerationSettings;
  /** Characters of each chunk placed into the context */
  maxContextLength: number;
}

/**
 * Tracks the state of one request.
 */
class RequestState {
  current: RAGState = 'received';

  constructor(
    private readonly logger: Logger,
    private readonly listener?: StateChangeListener
  ) {}

  moveTo(next: RAGState): void {
    const previous = this.current;
    this.current = next;
    this.logger.debug?.(`RAG request: ${previous} -> ${next}`);
    this.listener?.(next, previous);
  }
}

export class RAGEngine {
  private readonly deps: RAGEngineDeps;
  private readonly settings: RAGEngineSettings;
  private readonly logger: Logger;

  /**
   * @throws ValidationError when the prompts are unusable
   */
  constructor(deps: RAGEngineDeps, settings: RAGEngineSettings) {
    validatePrompts(settings.prompts);
    this.deps = deps;
    this.settings = settings;
    this.logger = deps.logger ?? silentLogger;
  }

  /**
   * Answer a question.
   *
   * Never rejects for failures in the pipeline's own error taxonomy; those
   * come back as `{ success: false }`. Anything else is a bug and rejects.
   */
  async answer(query: string, options: AnswerOptions = {}): Promise<RAGResult> {
    const state = new RequestState(this.logger, this.deps.onStateChange);

    try {
      const topK = options.topK ?? this.deps.retriever.defaultTopK;
      this.validateRequest(query, topK);

      state.moveTo('embedding');
      const vector = await this.deps.embedder.embedOne(query);

      state.moveTo('retrieving');
      const outcome = this.deps.retriever.searchByVector(vector, topK);

      state.moveTo('generating');
      const response = await this.generate(query, outcome);

      state.moveTo('completed');
      return this.toAnswer(response, outcome);
    } catch (error) {
      return this.fail(state, error);
    }
  }

  private validateRequest(query: string, topK: number): void {
    if (query.trim().length === 0) {
      throw new ValidationError('Query cannot be empty');
    }
    validateTopK(topK);
  }

  private async generate(query: string, outcome: SearchOutcome): Promise<GenerationResponse> {
    const { prompts, generation, maxContextLength } = this.settings;
    const context =
      outcome.status === 'found' ? assembleContext(outcome.results, maxContextLength) : NO_CONTEXT_NOTICE;
    const userPrompt = renderUserPrompt(prompts.userPromptTemplate, { context, query });
    const { generator } = this.deps;

    try {
      return await withTimeout('Generation request', generation.timeoutMs, (signal) =>
        generator.generate(
          {
            systemPrompt: prompts.systemPrompt,
            userPrompt,
            model: generation.model,
            temperature: generation.temperature,
            maxTokens: generation.maxTokens,
          },
          { signal }
        )
      );
    } catch (error) {
      if (error instanceof CLIError) {
        throw error;
      }
      throw new ProviderError(`${generator.name} generation request failed`, {
        cause: error instanceof Error ? error : new Error(String(error)),
      });
    }
  }

  private toAnswer(response: GenerationResponse, outcome: SearchOutcome): RAGAnswer {
    const results: ScoredChunk[] = outcome.results;
    return {
      success: true,
      answer: response.text,
      relevanceScore: outcome.relevanceScore,
      quality: outcome.quality,
      sources: results.map((result) => ({
        filename: result.filename,
        chunkIndex: result.chunk.chunkIndex,
        similarity: result.similarity,
      })),
      modelUsed: response.model,
      contextFound: outcome.status === 'found',
    };
  }

  private fail(state: RequestState, error: unknown): RAGFailure {
    const failedIn = state.current;
    if (failedIn === 'completed' || failedIn === 'failed') {
      throw error;
    }

    // Rethrows anything outside the taxonomy
    const failure = classifyError(error);
    state.moveTo('failed');
    this.logger.warn(`Question failed while ${failedIn}: ${failure.message}`);
    return { success: false, error: failure, state: failedIn };
  }
}

/**
 * Build an engine from loaded config.
 *
 * @throws ValidationError when the configured prompts are unusable
 */
export function createRAGEngine(
  config: Pick<Config, 'generation' | 'search'>,
  deps: RAGEngineDeps
): RAGEngine {
  return new RAGEngine(deps, {
    prompts: {
      systemPrompt: config.generation.system_prompt,
      userPromptTemplate: config.generation.user_prompt_template,
    },
    generation: {
      model: config.generation.chat_model,
      temperature: config.generation.temperature,
      maxTokens: config.generation.max_tokens,
      timeoutMs: config.generation.timeout_ms,
    },
    maxContextLength: config.search.max_context_length,
  });
}
