/**
 * Test Utilities - Unified Reset
 *
 * Clears process-wide state between tests: the cached environment and
 * the shared database connection.
 *
 * @example
 * ```typescript
 * import { resetAll } from '../test-utils/index.js';
 *
 * beforeEach(() => {
 *   resetAll();
 *   vi.clearAllMocks();
 * });
 * ```
 */

import { _clearEnvCache } from '../config/env.js';
import { closeDb } from '../database/connection.js';

/**
 * Close the shared connection first, so a DOCQA_HOME change made after
 * the reset opens a database in the new home.
 */
export function resetAll(): void {
  closeDb();
  _clearEnvCache();
}
