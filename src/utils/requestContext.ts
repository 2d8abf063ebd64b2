/**
 * Request Context
 *
 * Provides request-scoped metadata using AsyncLocalStorage so the
 * correlation ID is available to every log line written while a request
 * is being handled, without explicit parameter passing.
 *
 * Usage:
 *   // In middleware (set by requestLogger)
 *   requestContext.run({ requestId: 'abc123', startTime: Date.now() }, next);
 *
 *   // Anywhere in request handling
 *   requestContext.getRequestId(); // 'abc123'
 */

import { AsyncLocalStorage } from 'async_hooks';
import { randomUUID } from 'crypto';

export interface RequestContextData {
  /** Unique request correlation ID for tracing */
  requestId: string;
  /** Request start time for duration calculation */
  startTime: number;
  /** Request path */
  path?: string;
  /** Request method */
  method?: string;
}

const asyncLocalStorage = new AsyncLocalStorage<RequestContextData>();

export const requestContext = {
  /**
   * Run a function within a request context
   */
  run<T>(context: RequestContextData, fn: () => T): T {
    return asyncLocalStorage.run(context, fn);
  },

  /**
   * Get the current request context (undefined outside request scope)
   */
  get(): RequestContextData | undefined {
    return asyncLocalStorage.getStore();
  },

  /**
   * Get the current request ID ('no-request' outside request scope)
   */
  getRequestId(): string {
    return asyncLocalStorage.getStore()?.requestId ?? 'no-request';
  },

  /**
   * Generate a new request ID
   */
  generateRequestId(): string {
    // 8 characters from a UUID, short enough to read in logs
    return randomUUID().split('-')[0];
  },
};

export default requestContext;
