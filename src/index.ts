/**
 * docqa - Library Entry Point
 *
 * The CLI covers everyday use:
 * ```bash
 * docqa ingest ./guide.md
 * docqa search "machine learning"
 * docqa ask "What is machine learning?"
 * ```
 *
 * The same pipeline is available as a library. `createKnowledgeBase`
 * wires everything from a loaded config; the individual modules can be
 * used on their own with injected providers.
 *
 * @example
 * ```typescript
 * import { createKnowledgeBase, loadConfig } from 'docqa';
 *
 * const kb = createKnowledgeBase(loadConfig());
 * await kb.documents.upload('guide.txt', await readFile('guide.txt'));
 *
 * const result = await kb.answer('What is machine learning?');
 * if (result.success) console.log(result.answer);
 * ```
 *
 * @packageDocumentation
 */

export { KnowledgeBase, createKnowledgeBase, type KnowledgeBaseOptions } from './knowledge-base.js';

export * from './config/index.js';
export * from './errors/index.js';
export * from './tokenizer/index.js';
export * from './indexer/index.js';
export * from './database/index.js';
export * from './search/index.js';
export * from './providers/index.js';
export * from './agent/index.js';
export { formatTable, consoleLogger, silentLogger, withTimeout, type Logger, type Column } from './utils/index.js';
