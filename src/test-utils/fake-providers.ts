/**
 * In-process stand-ins for the embedding and generation providers.
 */

import type {
  EmbeddingProvider,
  EmbeddingResponse,
  GenerationProvider,
  GenerationRequest,
  GenerationResponse,
} from '../providers/types.js';

/**
 * Embeds text as term counts over a fixed vocabulary, so texts that share
 * vocabulary words point the same way. Words outside the vocabulary are
 * ignored; a text with none of them embeds as the zero vector.
 */
export class KeywordEmbeddingProvider implements EmbeddingProvider {
  readonly name = 'keyword';
  /** Texts of every embed() call, in call order */
  readonly calls: string[][] = [];

  constructor(readonly vocabulary: string[]) {}

  get dimensions(): number {
    return this.vocabulary.length;
  }

  vectorFor(text: string): number[] {
    const words = text.toLowerCase().match(/[a-z0-9]+/g) ?? [];
    return this.vocabulary.map((term) => words.filter((word) => word === term).length);
  }

  async embed(texts: string[]): Promise<EmbeddingResponse> {
    this.calls.push([...texts]);
    return { vectors: texts.map((text) => this.vectorFor(text)) };
  }
}

/**
 * Answers with a fixed text and remembers every request.
 */
export class StaticGenerationProvider implements GenerationProvider {
  readonly name = 'static';
  readonly requests: GenerationRequest[] = [];

  constructor(private readonly answer: string = 'Stub answer') {}

  async generate(request: GenerationRequest): Promise<GenerationResponse> {
    this.requests.push(request);
    return { text: this.answer, model: request.model };
  }
}
