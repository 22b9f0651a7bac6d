/**
 * Timeout Wrapper
 *
 * Runs an async operation under a deadline and an optional parent
 * cancellation signal. The operation receives a signal that fires on
 * either, so in-flight requests are torn down with it. The deadline
 * rejects before the abort fires so the race settles on the deadline error.
 */

import { CancelledError, TimeoutError } from './errors.js';

export const DEFAULT_VALIDATOR_TIMEOUT_MS = 10_000;

/**
 * Wrap an async function with a timeout
 */
export async function withTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  operation: string = 'operation',
  parentSignal?: AbortSignal
): Promise<T> {
  if (parentSignal?.aborted) {
    throw new CancelledError(operation);
  }

  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;
  let onParentAbort: (() => void) | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new TimeoutError(operation, timeoutMs));
      controller.abort();
    }, timeoutMs);

    if (parentSignal) {
      onParentAbort = () => {
        reject(new CancelledError(operation));
        controller.abort();
      };
      parentSignal.addEventListener('abort', onParentAbort, { once: true });
    }
  });

  try {
    return await Promise.race([fn(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
    if (parentSignal && onParentAbort) {
      parentSignal.removeEventListener('abort', onParentAbort);
    }
  }
}
