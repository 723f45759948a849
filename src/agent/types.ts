/**
 * RAG Engine Types
 *
 * Request states, runtime options and result shapes for the question
 * answering pipeline.
 */

import type { ClassifiedFailure } from '../errors/index.js';
import type { QualityLabel } from '../search/types.js';

/**
 * States one question moves through. A request ends in `completed` or
 * `failed`; stages never run out of order or in parallel.
 */
export const RAG_STATES = [
  'received',
  'embedding',
  'retrieving',
  'generating',
  'completed',
  'failed',
] as const;
export type RAGState = (typeof RAG_STATES)[number];

/**
 * Prompt pair used for every question.
 */
export interface PromptSettings {
  systemPrompt: string;
  /** Must contain {context} and {query} */
  userPromptTemplate: string;
}

export interface GenerationSettings {
  model: string;
  temperature: number;
  maxTokens: number;
  timeoutMs: number;
}

/**
 * Per-call options for RAGEngine.answer().
 */
export interface AnswerOptions {
  /** Chunks to retrieve (default: search.default_top_k) */
  topK?: number;
}

/**
 * A chunk the answer was grounded on.
 */
export interface RAGSource {
  filename: string;
  chunkIndex: number;
  similarity: number;
}

export interface RAGAnswer {
  success: true;
  answer: string;
  /** Null when no chunk was retrieved */
  relevanceScore: number | null;
  quality: QualityLabel | null;
  /** Best match first */
  sources: RAGSource[];
  modelUsed: string;
  /** False when generation ran without any retrieved context */
  contextFound: boolean;
}

export interface RAGFailure {
  success: false;
  error: ClassifiedFailure;
  /** State the request was in when it failed */
  state: Exclude<RAGState, 'completed' | 'failed'>;
}

/**
 * Either a complete answer or a structured failure; never a partial answer.
 */
export type RAGResult = RAGAnswer | RAGFailure;

export type StateChangeListener = (next: RAGState, previous: RAGState) => void;
