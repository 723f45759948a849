/**
 * Shared utilities
 */

export { formatTable, type Column, type Alignment } from './table.js';
export { consoleLogger, silentLogger, type Logger } from './logger.js';
export { withTimeout } from './timeout.js';
