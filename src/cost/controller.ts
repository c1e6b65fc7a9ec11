import type pino from 'pino';
import { nanoid } from 'nanoid';
import { ZodError } from 'zod';
import { AsyncMutex } from '../core/mutex.js';
import { BudgetExceededError, ConfigError, InvalidInputError, toError, type BudgetWindow } from '../core/errors.js';
import type { EventBus } from '../core/events.js';
import { getLogger } from '../core/logger.js';
import { BudgetConfigSchema, type BudgetConfig, type BudgetConfigInput } from '../core/types.js';
import { PriceTable } from './pricing.js';
import type { UsageSnapshot } from './types.js';
import { UsageWindow } from './windows.js';

const HOUR_MS = 3_600_000;
const DAY_MS = 24 * HOUR_MS;

export const DEFAULT_BUDGET_MODEL = 'deepseek-chat';

export interface CostControllerOptions {
  logger?: pino.Logger;
  events?: EventBus;
  /** Clock used for bucket selection; tests pin it. */
  now?: () => Date;
}

interface Hold {
  id: string;
  tokens: number;
  cost: number;
}

/**
 * Budget admitted ahead of a request. Exactly one of `commit` or `release`
 * takes effect; later calls are ignored.
 */
export class BudgetReservation {
  private settled = false;

  constructor(
    private readonly controller: CostController,
    private readonly hold: Hold,
    readonly model: string,
  ) {}

  get id(): string {
    return this.hold.id;
  }

  get tokens(): number {
    return this.hold.tokens;
  }

  get isSettled(): boolean {
    return this.settled;
  }

  /** Replace the held estimate with what the provider actually reported. */
  async commit(actualTokens: number, model: string = this.model): Promise<void> {
    if (this.settled) return;
    this.settled = true;
    await this.controller.settle(this.hold.id, { tokens: actualTokens, model });
  }

  async release(): Promise<void> {
    if (this.settled) return;
    this.settled = true;
    await this.controller.settle(this.hold.id, null);
  }
}

/**
 * Token and cost ceilings over calendar-hour and calendar-day windows.
 *
 * Admission and recording are serialized through one mutex. A request is
 * admitted against committed usage plus every outstanding reservation, so
 * concurrent requests cannot jointly overshoot a ceiling.
 */
export class CostController {
  readonly config: Readonly<BudgetConfig>;

  private readonly prices: PriceTable;
  private readonly hourlyTokens = new UsageWindow('hour', 2 * HOUR_MS);
  private readonly dailyTokens = new UsageWindow('day', 2 * DAY_MS);
  private readonly hourlyCost = new UsageWindow('hour', 2 * HOUR_MS);
  private readonly holds = new Map<string, Hold>();
  private readonly lock = new AsyncMutex();
  private readonly logger: pino.Logger;
  private readonly events?: EventBus;
  private readonly now: () => Date;

  constructor(config: BudgetConfigInput = {}, options: CostControllerOptions = {}) {
    try {
      this.config = Object.freeze(BudgetConfigSchema.parse(config));
    } catch (err) {
      const detail = err instanceof ZodError
        ? err.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ')
        : toError(err).message;
      throw new ConfigError(`Invalid budget configuration: ${detail}`, toError(err));
    }
    this.prices = new PriceTable(this.config.pricing, this.config.defaultPricePer1M);
    this.logger = options.logger ?? getLogger();
    this.events = options.events;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Resolve to true when `estimatedTokens` fits every ceiling, otherwise
   * reject with BudgetExceededError naming the window that would overflow.
   */
  async checkBudget(estimatedTokens: number, model: string = DEFAULT_BUDGET_MODEL): Promise<true> {
    return this.lock.withLock(() => {
      this.admit(estimatedTokens, model);
      return true;
    });
  }

  /** Check and hold the estimate in one step. */
  async reserve(estimatedTokens: number, model: string = DEFAULT_BUDGET_MODEL): Promise<BudgetReservation> {
    return this.lock.withLock(() => {
      const cost = this.admit(estimatedTokens, model);
      const hold: Hold = { id: nanoid(10), tokens: estimatedTokens, cost };
      this.holds.set(hold.id, hold);
      this.logger.debug({ reservation: hold.id, tokens: estimatedTokens, model }, 'Budget reserved');
      return new BudgetReservation(this, hold, model);
    });
  }

  /** Record consumption unconditionally; the request already happened. */
  async recordUsage(tokens: number, model: string = DEFAULT_BUDGET_MODEL): Promise<void> {
    validateTokens(tokens, 'tokens');
    await this.lock.withLock(() => this.apply(tokens, model));
  }

  /** @internal settled through BudgetReservation */
  async settle(holdId: string, usage: { tokens: number; model: string } | null): Promise<void> {
    if (usage) validateTokens(usage.tokens, 'tokens');
    await this.lock.withLock(() => {
      this.holds.delete(holdId);
      if (usage) this.apply(usage.tokens, usage.model);
    });
  }

  getCurrentUsage(): UsageSnapshot {
    const now = this.now();
    const hourTokens = this.hourlyTokens.current(now);
    const dayTokens = this.dailyTokens.current(now);
    let pendingTokens = 0;
    for (const hold of this.holds.values()) pendingTokens += hold.tokens;

    return {
      hourly: {
        tokens: hourTokens,
        limit: this.config.maxTokensPerHour,
        percent: (hourTokens * 100) / this.config.maxTokensPerHour,
        cost: this.hourlyCost.current(now),
        costLimit: this.config.maxCostPerHour,
      },
      daily: {
        tokens: dayTokens,
        limit: this.config.maxTokensPerDay,
        percent: (dayTokens * 100) / this.config.maxTokensPerDay,
      },
      pending: { reservations: this.holds.size, tokens: pendingTokens },
    };
  }

  costOf(tokens: number, model: string = DEFAULT_BUDGET_MODEL): number {
    return this.prices.costOf(tokens, model);
  }

  /** Clear all windows. Outstanding reservations stay held. */
  resetBudgets(): void {
    this.hourlyTokens.clear();
    this.dailyTokens.clear();
    this.hourlyCost.clear();
    this.logger.info('Budgets reset');
  }

  /** Returns the estimated cost of the admitted request. */
  private admit(estimatedTokens: number, model: string): number {
    validateTokens(estimatedTokens, 'estimatedTokens');
    if (estimatedTokens > this.config.maxTokensPerHour) {
      throw new InvalidInputError(
        `estimatedTokens (${estimatedTokens}) exceeds the hourly ceiling of ${this.config.maxTokensPerHour}`,
      );
    }

    const now = this.now();
    this.evict(now);

    let pendingTokens = 0;
    let pendingCost = 0;
    for (const hold of this.holds.values()) {
      pendingTokens += hold.tokens;
      pendingCost += hold.cost;
    }

    const hourUsed = this.hourlyTokens.current(now) + pendingTokens;
    if (hourUsed + estimatedTokens > this.config.maxTokensPerHour) {
      this.reject('hourly_tokens', estimatedTokens, hourUsed, this.config.maxTokensPerHour);
    }

    const dayUsed = this.dailyTokens.current(now) + pendingTokens;
    if (dayUsed + estimatedTokens > this.config.maxTokensPerDay) {
      this.reject('daily_tokens', estimatedTokens, dayUsed, this.config.maxTokensPerDay);
    }

    const cost = this.prices.costOf(estimatedTokens, model);
    const costUsed = this.hourlyCost.current(now) + pendingCost;
    if (costUsed + cost > this.config.maxCostPerHour) {
      this.reject('hourly_cost', cost, costUsed, this.config.maxCostPerHour);
    }

    const ratio = (hourUsed + estimatedTokens) / this.config.maxTokensPerHour;
    if (ratio > this.config.alertThreshold) {
      const percent = ((hourUsed + estimatedTokens) * 100) / this.config.maxTokensPerHour;
      this.logger.warn(
        { percent, threshold: this.config.alertThreshold },
        'Hourly token budget nearly exhausted',
      );
      this.events?.emit('budget:alert', { window: 'hourly', percent, threshold: this.config.alertThreshold });
    }

    return cost;
  }

  private reject(window: BudgetWindow, requested: number, used: number, limit: number): never {
    this.logger.warn({ window, requested, used, limit }, 'Budget check rejected request');
    this.events?.emit('budget:rejected', { reason: window, requested, used, limit });
    throw new BudgetExceededError(window, requested, used, limit);
  }

  private apply(tokens: number, model: string): void {
    const now = this.now();
    const cost = this.prices.costOf(tokens, model);
    const hourlyTokens = this.hourlyTokens.add(now, tokens);
    const dailyTokens = this.dailyTokens.add(now, tokens);
    this.hourlyCost.add(now, cost);
    this.evict(now);

    this.logger.debug({ tokens, model, cost, hourlyTokens, dailyTokens }, 'Usage recorded');
    this.events?.emit('usage:recorded', { tokens, model, cost, hourlyTokens, dailyTokens });
  }

  private evict(now: Date): void {
    this.hourlyTokens.evict(now);
    this.dailyTokens.evict(now);
    this.hourlyCost.evict(now);
  }
}

function validateTokens(value: number, label: string): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new InvalidInputError(`${label} must be a non-negative number, got ${value}`);
  }
}
