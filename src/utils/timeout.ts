/**
 * Bounded-time helpers for network steps.
 */

import { TimeoutError } from '../errors.js';

/**
 * Run an abortable operation with a deadline.
 * The operation receives an AbortSignal that fires when the deadline passes;
 * the returned promise then rejects with a TimeoutError.
 *
 * @param operation - Human-readable name used in the error message.
 * @param timeoutMs - Deadline in milliseconds.
 * @param run - The work to perform.
 */
export async function withTimeout<T>(
  operation: string,
  timeoutMs: number,
  run: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const deadline = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      // Reject first so the race settles with the timeout, not the abort error.
      reject(new TimeoutError(operation, timeoutMs));
      controller.abort();
    }, timeoutMs);
  });

  try {
    return await Promise.race([run(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
  }
}
