import { toError } from '../core/errors.js';

export interface RetryOptions<E extends Error = Error> {
  /** Total attempts, the first one included. */
  maxAttempts: number;
  /** Map whatever was thrown into the error type the policy understands. */
  normalize: (err: unknown) => E;
  /**
   * Milliseconds to wait before the next attempt, or null to stop retrying
   * and rethrow this error as-is. `attempt` is zero-based.
   */
  delayFor: (error: E, attempt: number) => number | null;
  onAttempt?: (attempt: number) => void;
  onRetry?: (attempt: number, error: E, delayMs: number) => void;
  sleep?: (ms: number) => Promise<void>;
}

/** Every attempt failed with an error the policy considered retryable. */
export class RetryExhaustedError<E extends Error = Error> extends Error {
  constructor(public readonly lastError: E, public readonly attempts: number) {
    super(`Gave up after ${attempts} attempts: ${lastError.message}`);
    this.name = 'RetryExhaustedError';
  }
}

/**
 * Run `fn` until it succeeds, the policy declines to retry, or the attempts
 * run out. There is no wait after the final attempt.
 */
export async function retry<T, E extends Error = Error>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions<E>,
): Promise<T> {
  const wait = options.sleep ?? sleep;
  let lastError: E | undefined;

  for (let attempt = 0; attempt < options.maxAttempts; attempt++) {
    options.onAttempt?.(attempt);
    try {
      return await fn(attempt);
    } catch (err) {
      const error = options.normalize(err);
      const delayMs = options.delayFor(error, attempt);
      if (delayMs === null) {
        throw error;
      }
      lastError = error;

      if (attempt < options.maxAttempts - 1) {
        options.onRetry?.(attempt, error, delayMs);
        await wait(delayMs);
      }
    }
  }

  if (!lastError) {
    throw new RangeError(`maxAttempts must be at least 1, got ${options.maxAttempts}`);
  }
  throw new RetryExhaustedError(lastError, options.maxAttempts);
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Reject with `onTimeout()` if `promise` has not settled within `ms`.
 */
export function withTimeout<T>(promise: Promise<T>, ms: number, onTimeout?: () => Error): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(onTimeout ? onTimeout() : new Error(`Operation timed out after ${ms}ms`));
    }, ms);

    promise
      .then(value => {
        clearTimeout(timer);
        resolve(value);
      })
      .catch((err: unknown) => {
        clearTimeout(timer);
        reject(toError(err));
      });
  });
}
