import { describe, it, expect } from 'vitest';
import {
  ProviderApiError,
  ProviderClientError,
  ProviderConnectionError,
  ProviderRateLimitError,
  ProviderTimeoutError,
  ProviderUnexpectedError,
} from '../../../src/core/errors.js';
import { errorForStatus, retryDelay } from '../../../src/providers/retry-policy.js';

describe('retryDelay', () => {
  it('should scale rate-limit waits by the backoff factor', () => {
    const error = new ProviderRateLimitError('slow down', 'p');
    expect([0, 1, 2].map(a => retryDelay(error, a, 1.5))).toEqual([1500, 3000, 6000]);
    expect(retryDelay(error, 1, 2)).toBe(4000);
  });

  it('should double waits for timeouts, connection and server errors', () => {
    expect(retryDelay(new ProviderTimeoutError('t', 'p'), 0, 1.5)).toBe(1000);
    expect(retryDelay(new ProviderConnectionError('c', 'p'), 1, 1.5)).toBe(2000);
    expect(retryDelay(new ProviderApiError('a', 'p', 500), 2, 1.5)).toBe(4000);
  });

  it('should refuse to retry client and unexpected errors', () => {
    expect(retryDelay(new ProviderClientError('c', 'p', 400), 0, 1.5)).toBeNull();
    expect(retryDelay(new ProviderUnexpectedError('u', 'p'), 0, 1.5)).toBeNull();
  });

  it('should wait exactly when the error is retryable', () => {
    const errors = [
      new ProviderRateLimitError('r', 'p'),
      new ProviderTimeoutError('t', 'p'),
      new ProviderConnectionError('c', 'p'),
      new ProviderApiError('a', 'p', 502),
      new ProviderClientError('c', 'p', 404),
      new ProviderUnexpectedError('u', 'p'),
    ];
    expect(errors.map(e => retryDelay(e, 0, 1) !== null)).toEqual(errors.map(e => e.retryable));
  });
});

describe('errorForStatus', () => {
  it('should map HTTP statuses to failure kinds', () => {
    expect(errorForStatus(429, 'm', 'p').kind).toBe('rate_limit');
    expect(errorForStatus(408, 'm', 'p').kind).toBe('timeout');
    expect(errorForStatus(401, 'm', 'p').kind).toBe('client');
    expect(errorForStatus(503, 'm', 'p').kind).toBe('api');
    expect(errorForStatus(302, 'm', 'p').kind).toBe('unexpected');
  });

  it('should keep the status', () => {
    expect(errorForStatus(404, 'missing', 'p')).toMatchObject({ status: 404, provider: 'p', message: 'missing' });
  });
});
