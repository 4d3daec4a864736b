/**
 * Timeout helpers for backend adapters.
 *
 * The harness itself has no timeout semantics; adapters that talk to
 * external processes bound each call and surface expiry as an error.
 */

import { getLogger } from '../logging/logger.js';

const logger = getLogger('timeout');

/**
 * Error class for timeout errors.
 */
export class TimeoutError extends Error {
  readonly operationName: string;
  readonly timeoutMs: number;

  constructor(operationName: string, timeoutMs: number, message?: string) {
    super(message ?? `${operationName} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
    this.operationName = operationName;
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Wrap a promise with a timeout.
 *
 * @param onTimeout - invoked once when the timer fires, before rejecting
 * @returns The promise result or throws TimeoutError
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  operationName: string,
  onTimeout?: () => void
): Promise<T> {
  let timeoutId: NodeJS.Timeout | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      logger.warn({ operationName, timeoutMs }, 'Operation timed out');
      onTimeout?.();
      reject(new TimeoutError(operationName, timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    clearTimeout(timeoutId);
  }
}
