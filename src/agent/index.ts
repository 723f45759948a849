/**
 * Agent Module
 *
 * Question answering over the stored chunks.
 */

export { RAGEngine, createRAGEngine, type RAGEngineDeps, type RAGEngineSettings } from './rag-engine.js';
export { renderUserPrompt, validatePrompts, type PromptValues } from './prompt.js';
export {
  RAG_STATES,
  type RAGState,
  type RAGResult,
  type RAGAnswer,
  type RAGFailure,
  type RAGSource,
  type AnswerOptions,
  type PromptSettings,
  type GenerationSettings,
  type StateChangeListener,
} from './types.js';
