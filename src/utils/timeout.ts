/**
 * Deadline for a single external call.
 *
 * The call receives an AbortSignal that fires when the limit passes, so
 * the provider can drop the request; the returned promise rejects with
 * TimeoutError at that moment whether or not the call notices.
 */

import { TimeoutError } from '../errors/index.js';

export async function withTimeout<T>(
  operation: string,
  timeoutMs: number,
  call: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new TimeoutError(operation, timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([call(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}
