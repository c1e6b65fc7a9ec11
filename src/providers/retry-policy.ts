import {
  ProviderApiError,
  ProviderClientError,
  ProviderRateLimitError,
  ProviderTimeoutError,
  ProviderUnexpectedError,
  type ProviderError,
} from '../core/errors.js';

/**
 * Backoff before attempt `attempt + 1`, or null when the failure must not be
 * retried. Rate limits back off harder, scaled by the provider's factor.
 */
export function retryDelay(error: ProviderError, attempt: number, backoffFactor: number): number | null {
  if (!error.retryable) return null;
  const base = 2 ** attempt * 1000;
  return error.kind === 'rate_limit' ? base * backoffFactor : base;
}

/** Map an HTTP status from a backend to the matching failure kind. */
export function errorForStatus(status: number, message: string, provider: string, cause?: Error): ProviderError {
  if (status === 429) return new ProviderRateLimitError(message, provider, status, cause);
  if (status === 408) return new ProviderTimeoutError(message, provider, cause);
  if (status >= 400 && status < 500) return new ProviderClientError(message, provider, status, cause);
  if (status >= 500) return new ProviderApiError(message, provider, status, cause);
  return new ProviderUnexpectedError(message, provider, cause);
}
