/**
 * Async Utilities
 *
 * Helpers for bounding async work by the lifetime of the request that
 * is waiting on it.
 */

import type { ServerResponse } from 'http';

/**
 * AbortSignal that fires when the connection closes before the response
 * has been fully written (client disconnect or request cancellation).
 */
export function responseAbortSignal(res: ServerResponse): AbortSignal {
  const controller = new AbortController();
  res.once('close', () => {
    if (!res.writableFinished) {
      controller.abort();
    }
  });
  return controller.signal;
}

/**
 * Wait for a promise, giving up as soon as the signal aborts.
 *
 * The underlying work is not cancelled, only the wait: a shared load keeps
 * running for the other requests awaiting it.
 *
 * @throws the signal's abort reason (an AbortError unless one was given)
 */
export function abortable<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) {
    return Promise.reject(signal.reason);
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });

    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

/**
 * Sleep for a specified duration
 */
export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
