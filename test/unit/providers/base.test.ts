import { describe, it, expect, vi } from 'vitest';
import {
  ProviderApiError,
  ProviderClientError,
  ProviderExhaustedError,
  ProviderRateLimitError,
  ProviderTimeoutError,
  ProviderUnexpectedError,
} from '../../../src/core/errors.js';
import { EventBus } from '../../../src/core/events.js';
import { ScriptedProvider, StallingProvider, sleepRecorder } from '../../helpers/mock-provider.js';

const USER = [{ role: 'user' as const, content: 'hi' }];

function connectionRefused(): Error {
  return Object.assign(new Error('connect ECONNREFUSED 127.0.0.1:443'), { code: 'ECONNREFUSED' });
}

async function collect(stream: AsyncIterable<string>): Promise<string[]> {
  const out: string[] = [];
  for await (const fragment of stream) out.push(fragment);
  return out;
}

describe('BaseProvider', () => {
  it('should stamp its name and default model on the reply', async () => {
    const provider = new ScriptedProvider({ name: 'primary' });
    const reply = await provider.chat(USER);

    expect(reply).toEqual({ content: 'Response from primary', model: 'mock-model', provider: 'primary', tokensUsed: 30 });
    expect(provider.calls[0].request.model).toBe('mock-model');
  });

  it('should pass an explicit model through', async () => {
    const provider = new ScriptedProvider();
    await provider.chat(USER, { model: 'other-model', maxTokens: 50 });
    expect(provider.calls[0].request).toEqual({ model: 'other-model', maxTokens: 50 });
  });

  it('should back off on rate limits using the backoff factor', async () => {
    const recorder = sleepRecorder();
    const provider = new ScriptedProvider(
      {},
      {
        chat: [
          new ProviderRateLimitError('slow down', 'mock'),
          new ProviderRateLimitError('slow down', 'mock'),
          { content: 'finally' },
        ],
      },
      { sleep: recorder.sleep },
    );

    const reply = await provider.chat(USER);
    expect(reply.content).toBe('finally');
    expect(recorder.delays).toEqual([1500, 3000]);
    expect(provider.getStats()).toMatchObject({ requests: 3, errors: 0 });
  });

  it('should back off exponentially on timeouts and give up after maxRetries attempts', async () => {
    const recorder = sleepRecorder();
    const provider = new ScriptedProvider(
      { maxRetries: 3 },
      { chat: [new ProviderTimeoutError('late', 'mock')] },
      { sleep: recorder.sleep },
    );

    const error = await provider.chat(USER).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(ProviderExhaustedError);
    expect(error).toMatchObject({ provider: 'mock', attempts: 3 });
    expect(error instanceof ProviderExhaustedError && error.kind).toBe('timeout');
    expect(recorder.delays).toEqual([1000, 2000]);
    expect(provider.getStats()).toMatchObject({ requests: 3, errors: 1 });
  });

  it('should classify connection failures as retryable', async () => {
    const recorder = sleepRecorder();
    const provider = new ScriptedProvider(
      {},
      { chat: [connectionRefused(), { content: 'reconnected' }] },
      { sleep: recorder.sleep },
    );

    await expect(provider.chat(USER)).resolves.toMatchObject({ content: 'reconnected' });
    expect(recorder.delays).toEqual([1000]);
  });

  it('should not retry client errors or count them against the provider', async () => {
    const recorder = sleepRecorder();
    const clientError = new ProviderClientError('bad request', 'mock', 400);
    const provider = new ScriptedProvider({}, { chat: [clientError] }, { sleep: recorder.sleep });

    await expect(provider.chat(USER)).rejects.toBe(clientError);
    expect(recorder.delays).toEqual([]);
    expect(provider.getStats()).toMatchObject({ requests: 1, errors: 0 });
  });

  it('should wrap unknown failures as unexpected and stop', async () => {
    const recorder = sleepRecorder();
    const provider = new ScriptedProvider({}, { chat: [new Error('weird')] }, { sleep: recorder.sleep });

    const error = await provider.chat(USER).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(ProviderUnexpectedError);
    expect(error).toMatchObject({ message: 'Unexpected error from mock: weird', kind: 'unexpected' });
    expect(recorder.delays).toEqual([]);
    expect(provider.getStats()).toMatchObject({ requests: 1, errors: 1 });
  });

  it('should emit attempt, retry and exhausted events', async () => {
    const events = new EventBus();
    const retries = vi.fn();
    const exhausted = vi.fn();
    events.on('provider:retry', retries);
    events.on('provider:exhausted', exhausted);

    const provider = new ScriptedProvider(
      { maxRetries: 2 },
      { chat: [new ProviderRateLimitError('slow down', 'mock')] },
      { events, sleep: sleepRecorder().sleep },
    );
    await expect(provider.chat(USER)).rejects.toThrow(ProviderExhaustedError);

    expect(retries).toHaveBeenCalledTimes(1);
    expect(retries).toHaveBeenCalledWith({
      provider: 'mock',
      attempt: 1,
      kind: 'rate_limit',
      delayMs: 1500,
      error: 'slow down',
    });
    expect(exhausted).toHaveBeenCalledWith({ provider: 'mock', attempts: 2, error: 'slow down' });
  });

  describe('stream', () => {
    it('should yield every fragment', async () => {
      const provider = new ScriptedProvider({}, { stream: [{ fragments: ['a', 'b', 'c'] }] });
      expect(await collect(provider.stream(USER))).toEqual(['a', 'b', 'c']);
    });

    it('should retry a stream that fails before its first fragment', async () => {
      const recorder = sleepRecorder();
      const provider = new ScriptedProvider(
        {},
        {
          stream: [
            { fragments: [], failWith: new ProviderRateLimitError('slow down', 'mock') },
            { fragments: ['ok'] },
          ],
        },
        { sleep: recorder.sleep },
      );

      expect(await collect(provider.stream(USER))).toEqual(['ok']);
      expect(recorder.delays).toEqual([1500]);
      expect(provider.getStats().requests).toBe(2);
    });

    it('should propagate a failure after the first fragment without retrying', async () => {
      const recorder = sleepRecorder();
      const provider = new ScriptedProvider(
        {},
        { stream: [{ fragments: ['partial'], failWith: new ProviderApiError('dropped', 'mock', 502) }] },
        { sleep: recorder.sleep },
      );

      const received: string[] = [];
      const error = await (async () => {
        for await (const fragment of provider.stream(USER)) received.push(fragment);
      })().catch((err: unknown) => err);

      expect(received).toEqual(['partial']);
      expect(error).toBeInstanceOf(ProviderApiError);
      expect(recorder.delays).toEqual([]);
      expect(provider.getStats()).toMatchObject({ requests: 1, errors: 1 });
    });
  });

  describe('timeouts', () => {
    it('should time out a stream that stalls after its first fragment', async () => {
      const provider = new StallingProvider({ timeoutMs: 20 }, { fragments: ['first'] });

      const received: string[] = [];
      const error = await (async () => {
        for await (const fragment of provider.stream(USER)) received.push(fragment);
      })().catch((err: unknown) => err);

      expect(received).toEqual(['first']);
      expect(error).toBeInstanceOf(ProviderTimeoutError);
      expect(provider.signals).toHaveLength(1);
      expect(provider.signals[0].aborted).toBe(true);
      expect(provider.getStats()).toMatchObject({ requests: 1, errors: 1 });
    });

    it('should abort every attempt that stalls before its first fragment', async () => {
      const provider = new StallingProvider({ timeoutMs: 20, maxRetries: 2 }, { fragments: [] });

      await expect(collect(provider.stream(USER))).rejects.toBeInstanceOf(ProviderExhaustedError);
      expect(provider.signals).toHaveLength(2);
      expect(provider.signals.every(signal => signal.aborted)).toBe(true);
    });

    it('should abort a chat attempt that times out', async () => {
      const provider = new StallingProvider({ timeoutMs: 20, maxRetries: 1 }, { fragments: [] });

      await expect(provider.chat(USER)).rejects.toBeInstanceOf(ProviderExhaustedError);
      expect(provider.signals).toHaveLength(1);
      expect(provider.signals[0].aborted).toBe(true);
      expect(provider.signals[0].reason).toBeInstanceOf(ProviderTimeoutError);
    });

    it('should bound each fragment gap rather than the whole stream', async () => {
      const provider = new StallingProvider(
        { timeoutMs: 100 },
        { fragments: ['a', 'b', 'c', 'd', 'e'], gapMs: 30, stall: false },
      );

      expect(await collect(provider.stream(USER))).toEqual(['a', 'b', 'c', 'd', 'e']);
      expect(provider.signals[0].aborted).toBe(false);
    });

    it('should abort the attempt when the consumer stops early', async () => {
      const provider = new StallingProvider({}, { fragments: ['a', 'b'], stall: false });

      for await (const fragment of provider.stream(USER)) {
        expect(fragment).toBe('a');
        break;
      }
      expect(provider.signals[0].aborted).toBe(true);
    });
  });

  it('should report availability', async () => {
    const provider = new ScriptedProvider();
    expect(await provider.isAvailable()).toBe(true);
    provider.setAvailable(false);
    expect(await provider.isAvailable()).toBe(false);
  });
});
