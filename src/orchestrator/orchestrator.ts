import type pino from 'pino';
import { ConfigError, InvalidInputError } from '../core/errors.js';
import { EventBus } from '../core/events.js';
import { getLogger } from '../core/logger.js';
import { CostController, type BudgetReservation } from '../cost/controller.js';
import { SemanticCache, type ResponseCache } from '../cache/semantic-cache.js';
import { ConversationContext, type ConversationStore } from '../conversation/context.js';
import { FailoverRunner } from '../providers/failover.js';
import { ProviderRegistry } from '../providers/registry.js';
import type { GenerationOptions, LLMProvider, Message } from '../providers/types.js';
import { createDefaultToolRegistry } from '../tools/builtin/index.js';
import { ToolExecutor } from '../tools/executor.js';
import type { ToolRegistry } from '../tools/registry.js';
import type { ToolResult } from '../tools/types.js';
import { estimateTokens } from '../utils/tokens.js';
import { RequestHistory } from './history.js';
import type { Analytics, ChatOptions, OrchestratorOptions, OrchestratorResponse } from './types.js';

const DEFAULT_HISTORY_LIMIT = 1000;

/**
 * Routes prompts across priority-ordered providers. Each request is admitted
 * against the budget before any provider is contacted, then walks a snapshot
 * of the providers until one succeeds.
 */
export class AIOrchestrator {
  readonly costController: CostController;
  readonly conversation: ConversationStore;
  readonly cache: ResponseCache | null;
  readonly tools: ToolRegistry | null;
  readonly events: EventBus;

  private readonly registry: ProviderRegistry;
  private readonly failover: FailoverRunner;
  private readonly executor: ToolExecutor | null;
  private readonly history: RequestHistory;
  private readonly logger: pino.Logger;
  private readonly estimate: (text: string) => number;

  constructor(options: OrchestratorOptions = {}) {
    this.logger = options.logger ?? getLogger();
    this.events = options.events ?? new EventBus();
    const shared = { logger: this.logger, events: this.events };

    this.costController = options.costController ?? new CostController(options.budget, shared);
    this.conversation = options.conversation ?? new ConversationContext(options.conversationConfig);
    this.cache = options.cache ?? (options.enableCache ? new SemanticCache(options.cacheConfig, shared) : null);
    this.tools = options.tools ?? (options.enableTools ? createDefaultToolRegistry({ logger: this.logger }) : null);
    this.executor = this.tools ? new ToolExecutor(this.tools, shared) : null;

    this.registry = new ProviderRegistry({ logger: this.logger });
    this.failover = new FailoverRunner(shared);
    this.history = new RequestHistory(options.historyLimit ?? DEFAULT_HISTORY_LIMIT);
    this.estimate = options.estimateTokens ?? estimateTokens;
  }

  registerProvider(provider: LLMProvider, priority?: number): void {
    this.registry.register(provider, priority);
    this.logger.info({ provider: provider.name, priority: this.registry.priorityOf(provider.name) }, 'Provider registered');
  }

  deregisterProvider(name: string): boolean {
    return this.registry.deregister(name);
  }

  /** Provider names in the order they are tried. */
  getProviders(): string[] {
    return this.registry.list();
  }

  async chat(prompt: string, options: ChatOptions = {}): Promise<OrchestratorResponse> {
    const started = Date.now();
    const providers = this.prepare(prompt);
    const cacheable = this.isCacheable(options);

    if (cacheable && this.cache) {
      const hit = await this.cache.getCachedResponse(prompt);
      if (hit !== null) {
        const model = options.model ?? 'cache';
        this.recordRequest({ provider: 'cache', model, tokens: 0, cached: true, started, streamed: false, toolCalls: 0 });
        return { content: hit, model, provider: 'cache', tokensUsed: 0, cached: true, toolResults: [] };
      }
    }

    const messages = this.buildMessages(prompt, options);
    const generation = this.generationOptions(options);
    const tools = options.useTools ? this.tools?.getToolDefinitions() ?? [] : [];
    if (tools.length > 0) generation.tools = tools;

    const estimated = this.estimateMessages(messages);
    const reservation = await this.costController.reserve(estimated, options.model ?? providers[0].defaultModel);

    const { result: response } = await this.releaseOnFailure(reservation, () =>
      this.failover.run(providers, provider => provider.chat(messages, generation)),
    );

    // some backends omit usage; fall back to the estimate plus the reply
    const tokens = response.tokensUsed > 0 ? response.tokensUsed : estimated + this.estimate(response.content);
    await reservation.commit(tokens, response.model);

    if (options.useConversation) {
      this.conversation.addMessage('user', prompt, this.estimate(prompt));
      this.conversation.addMessage('assistant', response.content, this.estimate(response.content));
    }
    const toolCalls = response.toolCalls ?? [];
    if (cacheable && this.cache && response.content && toolCalls.length === 0) {
      await this.cache.cacheResponse(prompt, response.content);
    }

    this.recordRequest({
      provider: response.provider,
      model: response.model,
      tokens,
      cached: false,
      started,
      streamed: false,
      toolCalls: toolCalls.length,
    });

    let toolResults: ToolResult[] = [];
    if (options.useTools && this.executor && toolCalls.length > 0) {
      toolResults = await this.executor.executeAll(toolCalls);
    }

    return { ...response, cached: false, toolResults };
  }

  /**
   * Stream the reply. The provider walk may move on only before the first
   * fragment; usage is estimated from the streamed text.
   */
  async *chatStream(prompt: string, options: ChatOptions = {}): AsyncGenerator<string> {
    const started = Date.now();
    const providers = this.prepare(prompt);
    const cacheable = this.isCacheable(options);

    if (cacheable && this.cache) {
      const hit = await this.cache.getCachedResponse(prompt);
      if (hit !== null) {
        this.recordRequest({
          provider: 'cache',
          model: options.model ?? 'cache',
          tokens: 0,
          cached: true,
          started,
          streamed: true,
          toolCalls: 0,
        });
        yield hit;
        return;
      }
    }

    const messages = this.buildMessages(prompt, options);
    const generation = this.generationOptions(options);
    const estimated = this.estimateMessages(messages);
    const reservation = await this.costController.reserve(estimated, options.model ?? providers[0].defaultModel);

    const state: { provider?: LLMProvider; text: string; completed: boolean } = { text: '', completed: false };
    try {
      const fragments = this.failover.stream(
        providers,
        provider => provider.stream(messages, generation),
        provider => {
          state.provider = provider;
        },
      );
      for await (const fragment of fragments) {
        state.text += fragment;
        yield fragment;
      }
      state.completed = true;
    } finally {
      await this.settleStream(reservation, prompt, options, cacheable, estimated, started, state);
    }
  }

  getAnalytics(): Analytics {
    const totals = this.history.getTotals();
    const health = this.failover.getHealthReport();
    const cache: Analytics['cache'] = this.cache ? { ...this.cache.getStats(), enabled: true } : { enabled: false };

    return {
      ...totals,
      providers: this.registry.snapshot().map(provider => ({
        ...provider.getStats(),
        priority: this.registry.priorityOf(provider.name) ?? provider.priority,
        health: health[provider.name],
      })),
      budget: this.costController.getCurrentUsage(),
      cache,
      conversation: this.conversation.getStats(),
      recentRequests: this.history.toArray(),
    };
  }

  resetConversation(): void {
    this.conversation.clear();
    this.logger.debug('Conversation reset');
  }

  private prepare(prompt: string): LLMProvider[] {
    if (prompt.trim() === '') {
      throw new InvalidInputError('Prompt must not be empty');
    }
    const providers = this.registry.snapshot();
    if (providers.length === 0) {
      throw new ConfigError('No AI providers registered');
    }
    return providers;
  }

  /** Cached answers ignore history, so conversation turns bypass the cache. */
  private isCacheable(options: ChatOptions): boolean {
    return (options.useCache ?? true) && !options.useConversation;
  }

  private buildMessages(prompt: string, options: ChatOptions): Message[] {
    const messages: Message[] = [];
    if (options.systemPrompt) {
      messages.push({ role: 'system', content: options.systemPrompt });
    }
    if (options.useConversation) {
      messages.push(...this.conversation.getMessages());
    }
    messages.push({ role: 'user', content: prompt });
    return messages;
  }

  private generationOptions(options: ChatOptions): GenerationOptions {
    return {
      ...(options.model !== undefined ? { model: options.model } : {}),
      ...(options.maxTokens !== undefined ? { maxTokens: options.maxTokens } : {}),
      ...(options.temperature !== undefined ? { temperature: options.temperature } : {}),
    };
  }

  private estimateMessages(messages: Message[]): number {
    return messages.reduce((sum, m) => sum + this.estimate(m.content), 0);
  }

  private async releaseOnFailure<T>(reservation: BudgetReservation, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      await reservation.release();
      throw err;
    }
  }

  private async settleStream(
    reservation: BudgetReservation,
    prompt: string,
    options: ChatOptions,
    cacheable: boolean,
    estimated: number,
    started: number,
    state: { provider?: LLMProvider; text: string; completed: boolean },
  ): Promise<void> {
    const provider = state.provider;
    if (!provider) {
      await reservation.release();
      return;
    }

    // a stream cut short still consumed what it delivered
    const tokens = estimated + this.estimate(state.text);
    const model = options.model ?? provider.defaultModel;
    await reservation.commit(tokens, model);
    this.recordRequest({ provider: provider.name, model, tokens, cached: false, started, streamed: true, toolCalls: 0 });

    if (!state.completed) return;
    if (options.useConversation) {
      this.conversation.addMessage('user', prompt, this.estimate(prompt));
      this.conversation.addMessage('assistant', state.text, this.estimate(state.text));
    }
    if (cacheable && this.cache && state.text) {
      await this.cache.cacheResponse(prompt, state.text);
    }
  }

  private recordRequest(entry: {
    provider: string;
    model: string;
    tokens: number;
    cached: boolean;
    started: number;
    streamed: boolean;
    toolCalls: number;
  }): void {
    const durationMs = Date.now() - entry.started;
    this.history.push({
      timestamp: Date.now(),
      provider: entry.provider,
      model: entry.model,
      tokens: entry.tokens,
      cached: entry.cached,
      durationMs,
      streamed: entry.streamed,
      toolCalls: entry.toolCalls,
    });
    this.logger.info(
      { provider: entry.provider, model: entry.model, tokens: entry.tokens, cached: entry.cached, durationMs },
      'Request complete',
    );
    this.events.emit('request:complete', {
      provider: entry.provider,
      model: entry.model,
      tokens: entry.tokens,
      cached: entry.cached,
      durationMs,
    });
  }
}
