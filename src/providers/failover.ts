/**
 * Cascading provider fallback with health tracking.
 * Tries providers in the order given; on failure, moves to the next.
 */

import type pino from 'pino';
import type { LLMProvider } from './types.js';
import { AllProvidersFailedError, toError, type ProviderFailure } from '../core/errors.js';
import type { EventBus } from '../core/events.js';
import { getLogger } from '../core/logger.js';

interface ProviderHealth {
  successes: number;
  failures: number;
  consecutiveFailures: number;
  lastFailure?: number;
  lastSuccess?: number;
}

export interface ProviderHealthReport {
  successRate: number;
  consecutiveFailures: number;
  totalCalls: number;
  lastFailure?: number;
  lastSuccess?: number;
}

export class FailoverRunner {
  private health = new Map<string, ProviderHealth>();
  private logger: pino.Logger;
  private events?: EventBus;

  constructor(options: { logger?: pino.Logger; events?: EventBus } = {}) {
    this.logger = options.logger ?? getLogger();
    this.events = options.events;
  }

  /**
   * Call providers in order until one succeeds. Any failure, a client error
   * included, moves on to the next provider.
   */
  async run<T>(
    providers: readonly LLMProvider[],
    call: (provider: LLMProvider) => Promise<T>,
  ): Promise<{ result: T; provider: LLMProvider }> {
    const failures: ProviderFailure[] = [];

    for (const [index, provider] of providers.entries()) {
      try {
        const result = await call(provider);
        this.recordSuccess(provider.name);
        return { result, provider };
      } catch (err) {
        this.recordFailed(provider, toError(err), providers.length - index - 1, failures);
      }
    }

    throw new AllProvidersFailedError(failures);
  }

  /**
   * Stream from the first provider that opens. Once a fragment has been
   * delivered the stream is committed to that provider and a later failure
   * propagates instead of failing over.
   */
  async *stream(
    providers: readonly LLMProvider[],
    open: (provider: LLMProvider) => AsyncIterable<string>,
    onProvider?: (provider: LLMProvider) => void,
  ): AsyncGenerator<string> {
    const failures: ProviderFailure[] = [];

    for (const [index, provider] of providers.entries()) {
      let started = false;
      try {
        for await (const fragment of open(provider)) {
          if (!started) {
            started = true;
            onProvider?.(provider);
          }
          yield fragment;
        }
        if (!started) onProvider?.(provider);
        this.recordSuccess(provider.name);
        return;
      } catch (err) {
        const error = toError(err);
        if (started) {
          this.recordFailure(provider.name);
          this.logger.error({ provider: provider.name, error: error.message }, 'Stream failed after first fragment');
          throw error;
        }
        this.recordFailed(provider, error, providers.length - index - 1, failures);
      }
    }

    throw new AllProvidersFailedError(failures);
  }

  getHealthReport(): Record<string, ProviderHealthReport> {
    const report: Record<string, ProviderHealthReport> = {};
    for (const [name, health] of this.health) {
      const total = health.successes + health.failures;
      report[name] = {
        successRate: total > 0 ? health.successes / total : 1,
        consecutiveFailures: health.consecutiveFailures,
        totalCalls: total,
        ...(health.lastFailure !== undefined ? { lastFailure: health.lastFailure } : {}),
        ...(health.lastSuccess !== undefined ? { lastSuccess: health.lastSuccess } : {}),
      };
    }
    return report;
  }

  private recordFailed(provider: LLMProvider, error: Error, remaining: number, failures: ProviderFailure[]): void {
    this.recordFailure(provider.name);
    failures.push({ provider: provider.name, error });
    this.logger.warn(
      { provider: provider.name, error: error.message, remaining },
      remaining > 0 ? 'Provider failed, trying next in failover chain' : 'Last provider in failover chain failed',
    );
    if (remaining > 0) {
      this.events?.emit('failover:next', { from: provider.name, error: error.message, remaining });
    }
  }

  private healthOf(name: string): ProviderHealth {
    let health = this.health.get(name);
    if (!health) {
      health = { successes: 0, failures: 0, consecutiveFailures: 0 };
      this.health.set(name, health);
    }
    return health;
  }

  private recordSuccess(name: string): void {
    const health = this.healthOf(name);
    health.successes++;
    health.consecutiveFailures = 0;
    health.lastSuccess = Date.now();
  }

  private recordFailure(name: string): void {
    const health = this.healthOf(name);
    health.failures++;
    health.consecutiveFailures++;
    health.lastFailure = Date.now();
  }
}
