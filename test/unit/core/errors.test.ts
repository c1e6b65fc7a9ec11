import { describe, it, expect } from 'vitest';
import {
  AllProvidersFailedError,
  BudgetExceededError,
  PromptgateError,
  ProviderApiError,
  ProviderClientError,
  ProviderExhaustedError,
  ProviderRateLimitError,
  ProviderTimeoutError,
  ToolExecutionError,
  ToolNotFoundError,
  ToolValidationError,
  toError,
} from '../../../src/core/errors.js';

describe('errors', () => {
  it('should serialize code and cause', () => {
    const error = new PromptgateError('outer', 'SOME_CODE', new Error('inner'));
    expect(error.toJSON()).toEqual({
      name: 'PromptgateError',
      code: 'SOME_CODE',
      message: 'outer',
      cause: 'inner',
    });
  });

  it('should mark transient provider failures retryable', () => {
    expect(new ProviderRateLimitError('slow down', 'p').retryable).toBe(true);
    expect(new ProviderTimeoutError('late', 'p').retryable).toBe(true);
    expect(new ProviderApiError('down', 'p', 503).retryable).toBe(true);
    expect(new ProviderClientError('bad', 'p', 400).retryable).toBe(false);
  });

  it('should describe exhausted retries', () => {
    const error = new ProviderExhaustedError('deepseek', 3, new ProviderRateLimitError('rate limited', 'deepseek'));
    expect(error.message).toBe('Provider "deepseek" failed after 3 attempts: rate limited');
    expect(error.kind).toBe('rate_limit');
    expect(error.code).toBe('PROVIDER_EXHAUSTED');
  });

  it('should name every provider in AllProvidersFailedError', () => {
    const error = new AllProvidersFailedError([
      { provider: 'a', error: new Error('first') },
      { provider: 'b', error: new Error('second') },
    ]);
    expect(error.message).toBe('All 2 providers failed: a: first; b: second');
    expect(error.providers).toEqual(['a', 'b']);
    expect(error.cause?.message).toBe('second');
  });

  it('should format token and cost budgets differently', () => {
    expect(new BudgetExceededError('hourly_tokens', 200, 900, 1000).message).toBe(
      'Hourly token budget exceeded: 900 used + 200 requested > 1000',
    );
    expect(new BudgetExceededError('hourly_cost', 0.5, 9.75, 10).message).toBe(
      'Hourly cost budget exceeded: $9.7500 used + $0.5000 requested > $10.0000',
    );
  });

  it('should list available tools when one is missing', () => {
    expect(new ToolNotFoundError('search', ['calculate']).message).toBe(
      'Tool "search" not found. Available: calculate',
    );
    expect(new ToolNotFoundError('search', []).message).toBe('Tool "search" not found. Available: (none)');
  });

  it('should treat validation errors as execution errors', () => {
    const error = new ToolValidationError('calculate', ['expression: Required']);
    expect(error).toBeInstanceOf(ToolExecutionError);
    expect(error.code).toBe('TOOL_VALIDATION_FAILED');
    expect(error.message).toBe('Invalid arguments for tool "calculate": expression: Required');
  });

  it('should wrap non-errors', () => {
    const error = toError('plain string');
    expect(error).toBeInstanceOf(Error);
    expect(error.message).toBe('plain string');
  });
});
