/**
 * Test Utilities Module
 *
 * Shared fakes and helpers for tests across the codebase.
 *
 * @example
 * ```typescript
 * import { createTestDatabase, WordTokenizer } from '../../test-utils/index.js';
 *
 * const db = createTestDatabase();
 * ```
 */

export { resetAll } from './reset.js';
export { WordTokenizer } from './word-tokenizer.js';
export { KeywordEmbeddingProvider, StaticGenerationProvider } from './fake-providers.js';
export { createTestDatabase } from './database.js';
export { AI_GUIDE, AI_GUIDE_VOCABULARY } from './fixtures.js';
export { createTestKnowledgeBase, MemoryUsageSink, type TestKnowledgeBase } from './knowledge-base.js';
