import { describe, it, expect } from 'vitest';
import { InvalidInputError } from '../../../src/core/errors.js';
import { resolveProviderConfig } from '../../../src/providers/presets.js';

describe('resolveProviderConfig', () => {
  it('should fill preset defaults', () => {
    expect(resolveProviderConfig({ type: 'deepseek' }, {})).toEqual({
      name: 'deepseek',
      type: 'deepseek',
      apiKey: undefined,
      baseUrl: 'https://api.deepseek.com',
      defaultModel: 'deepseek-chat',
      priority: 100,
      timeoutMs: 60_000,
      maxRetries: 3,
      backoffFactor: 1.5,
    });
  });

  it('should read the API key from the preset environment variable', () => {
    expect(resolveProviderConfig({ type: 'openai' }, { OPENAI_API_KEY: 'test-secret' }).apiKey).toBe('test-secret');
  });

  it('should prefer explicit settings and strip trailing slashes', () => {
    const settings = resolveProviderConfig(
      { type: 'local', name: 'gpu-box', baseUrl: 'http://gpu.local:11434//', defaultModel: 'mistral' },
      {},
    );
    expect(settings).toMatchObject({ name: 'gpu-box', baseUrl: 'http://gpu.local:11434', defaultModel: 'mistral' });
  });

  it('should reject invalid entries', () => {
    expect(() => resolveProviderConfig({ type: 'openai', maxRetries: 0 }, {})).toThrow(InvalidInputError);
    expect(() => resolveProviderConfig({ type: 'openai', maxRetries: 0 }, {})).toThrow(
      /^Invalid provider configuration: maxRetries: /,
    );
  });
});
