import type pino from 'pino';
import type {
  AIResponse,
  BackendReply,
  GenerationOptions,
  LLMProvider,
  Message,
  ProviderSettings,
  ProviderStats,
} from './types.js';
import {
  ProviderConnectionError,
  ProviderError,
  ProviderExhaustedError,
  ProviderTimeoutError,
  ProviderUnexpectedError,
  toError,
} from '../core/errors.js';
import type { EventBus } from '../core/events.js';
import { getLogger } from '../core/logger.js';
import { retry, RetryExhaustedError, sleep, withTimeout } from '../utils/retry.js';
import { retryDelay } from './retry-policy.js';

export interface ProviderRuntime {
  logger?: pino.Logger;
  events?: EventBus;
  /** Replaces the backoff wait; tests pass a recorder. */
  sleep?: (ms: number) => Promise<void>;
}

/** The request a concrete provider receives; the model is always resolved. */
export type BackendRequest = GenerationOptions & { model: string };

const CONNECTION_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'ENOTFOUND', 'EAI_AGAIN', 'EPIPE', 'UND_ERR_SOCKET']);

export abstract class BaseProvider implements LLMProvider {
  readonly name: string;
  readonly type: string;
  readonly config: Readonly<ProviderSettings>;

  protected logger: pino.Logger;
  protected events?: EventBus;
  private readonly wait: (ms: number) => Promise<void>;
  private requestCount = 0;
  private errorCount = 0;

  constructor(config: ProviderSettings, runtime: ProviderRuntime = {}) {
    this.config = Object.freeze({ ...config });
    this.name = config.name;
    this.type = config.type;
    this.logger = (runtime.logger ?? getLogger()).child({ provider: config.name });
    this.events = runtime.events;
    this.wait = runtime.sleep ?? sleep;
  }

  get priority(): number {
    return this.config.priority;
  }

  get defaultModel(): string {
    return this.config.defaultModel;
  }

  async chat(messages: Message[], options: GenerationOptions = {}): Promise<AIResponse> {
    const request: BackendRequest = { ...options, model: options.model ?? this.defaultModel };
    this.logger.debug({ model: request.model, messages: messages.length }, 'Chat request');

    const reply = await this.withRetry(() => {
      const attempt = new AbortController();
      return this.bounded(this.sendChat(messages, request, attempt.signal), attempt);
    });
    return { ...reply, provider: this.name };
  }

  /**
   * Stream fragments. Retries cover opening the stream up to its first
   * fragment; a failure after that propagates to the consumer. Every wait on
   * the backend, the first fragment and each gap after it, is bounded by the
   * provider timeout.
   */
  async *stream(messages: Message[], options: GenerationOptions = {}): AsyncGenerator<string> {
    const request: BackendRequest = { ...options, model: options.model ?? this.defaultModel };
    this.logger.debug({ model: request.model, messages: messages.length }, 'Stream request');

    const { attempt, iterator, first } = await this.withRetry(async () => {
      const attempt = new AbortController();
      const iterator = this.sendStream(messages, request, attempt.signal)[Symbol.asyncIterator]();
      const first = await this.bounded(iterator.next(), attempt);
      return { attempt, iterator, first };
    });
    if (first.done) return;

    let settled = false;
    try {
      yield first.value;
      while (true) {
        const next = await this.bounded(iterator.next(), attempt);
        if (next.done) break;
        yield next.value;
      }
      settled = true;
    } catch (err) {
      settled = true;
      attempt.abort();
      this.errorCount++;
      throw this.normalizeError(err);
    } finally {
      if (!settled) {
        // the consumer stopped early and the backend sits idle at a yield
        attempt.abort();
        await iterator.return?.();
      }
    }
  }

  async isAvailable(): Promise<boolean> {
    try {
      return await this.checkAvailability();
    } catch (err) {
      this.logger.debug({ error: toError(err).message }, 'Availability check failed');
      return false;
    }
  }

  getStats(): ProviderStats {
    return {
      name: this.name,
      type: this.type,
      priority: this.priority,
      defaultModel: this.defaultModel,
      requests: this.requestCount,
      errors: this.errorCount,
    };
  }

  /** `signal` aborts once the attempt has timed out or been abandoned. */
  protected abstract sendChat(messages: Message[], request: BackendRequest, signal: AbortSignal): Promise<BackendReply>;
  protected abstract sendStream(messages: Message[], request: BackendRequest, signal: AbortSignal): AsyncIterable<string>;
  protected abstract checkAvailability(): Promise<boolean>;

  /**
   * Translate a failure into a ProviderError. Subclasses handle their SDK's
   * error classes first and defer to this for everything else.
   */
  protected classify(err: unknown): ProviderError {
    if (err instanceof ProviderError) return err;
    const error = toError(err);

    if (error.name === 'TimeoutError' || error.name === 'AbortError') {
      return new ProviderTimeoutError(`Request to ${this.name} timed out`, this.name, error);
    }
    if (isConnectionFailure(error)) {
      return new ProviderConnectionError(`Could not reach ${this.name}: ${error.message}`, this.name, error);
    }
    return new ProviderUnexpectedError(`Unexpected error from ${this.name}: ${error.message}`, this.name, error);
  }

  private normalizeError(err: unknown): ProviderError {
    return err instanceof ProviderError ? err : this.classify(err);
  }

  private timeoutError(): ProviderTimeoutError {
    return new ProviderTimeoutError(
      `Request to ${this.name} timed out after ${this.config.timeoutMs}ms`,
      this.name,
    );
  }

  /** On expiry the attempt's request is aborted and a timeout error raised. */
  private bounded<T>(step: Promise<T>, attempt: AbortController): Promise<T> {
    return withTimeout(step, this.config.timeoutMs, () => {
      const error = this.timeoutError();
      attempt.abort(error);
      return error;
    });
  }

  private async withRetry<T>(fn: () => Promise<T>): Promise<T> {
    try {
      return await retry(fn, {
        maxAttempts: this.config.maxRetries,
        normalize: err => this.normalizeError(err),
        delayFor: (error, attempt) => retryDelay(error, attempt, this.config.backoffFactor),
        onAttempt: attempt => {
          this.requestCount++;
          this.events?.emit('provider:attempt', { provider: this.name, attempt: attempt + 1 });
        },
        onRetry: (attempt, error, delayMs) => {
          this.logger.warn(
            { attempt: attempt + 1, kind: error.kind, delayMs, error: error.message },
            'Retrying provider call',
          );
          this.events?.emit('provider:retry', {
            provider: this.name,
            attempt: attempt + 1,
            kind: error.kind,
            delayMs,
            error: error.message,
          });
        },
        sleep: this.wait,
      });
    } catch (err) {
      if (err instanceof RetryExhaustedError && err.lastError instanceof ProviderError) {
        this.errorCount++;
        this.logger.error({ attempts: err.attempts, error: err.lastError.message }, 'Provider retries exhausted');
        this.events?.emit('provider:exhausted', {
          provider: this.name,
          attempts: err.attempts,
          error: err.lastError.message,
        });
        throw new ProviderExhaustedError(this.name, err.attempts, err.lastError);
      }
      // client errors are the caller's fault and do not count against the provider
      if (err instanceof ProviderError && err.kind === 'unexpected') {
        this.errorCount++;
        this.logger.error({ error: err.message }, 'Unexpected provider failure');
      }
      throw err;
    }
  }
}

function isConnectionFailure(error: Error): boolean {
  if (error.message === 'fetch failed') return true;
  const code = errorCode(error) ?? (error.cause instanceof Error ? errorCode(error.cause) : undefined);
  return code !== undefined && CONNECTION_CODES.has(code);
}

function errorCode(error: Error): string | undefined {
  if ('code' in error && typeof error.code === 'string') return error.code;
  return undefined;
}
