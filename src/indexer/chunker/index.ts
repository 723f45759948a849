/**
 * Chunker Module
 *
 *   for (const chunk of chunkText(text, tokenizer, options)) { ... }
 */

export { chunkText, chunkDocument } from './chunker.js';
export { splitSentences, lastSentenceEnd } from './sentences.js';
export {
  DEFAULT_CHUNK_OPTIONS,
  chunkOptionsFromConfig,
  validateChunkOptions,
} from './config.js';
export type { ChunkDescriptor, ChunkOptions, TextSpan } from './types.js';
