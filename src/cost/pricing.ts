import type { ModelPricing } from './types.js';

export const MODEL_PRICING: ModelPricing[] = [
  { model: 'deepseek-chat', provider: 'deepseek', per1M: 0.14 },
  { model: 'deepseek-reasoner', provider: 'deepseek', per1M: 0.55 },
  { model: 'gpt-3.5-turbo', provider: 'openai', per1M: 0.5 },
  { model: 'gpt-4', provider: 'openai', per1M: 30 },
  { model: 'gpt-4o', provider: 'openai', per1M: 2.5 },
  { model: 'gpt-4o-mini', provider: 'openai', per1M: 0.15 },
  { model: 'claude-3-5-haiku-latest', provider: 'anthropic', per1M: 0.8 },
  { model: 'claude-3-5-sonnet-latest', provider: 'anthropic', per1M: 3 },
  { model: 'llama3.2', provider: 'local', per1M: 0 },
];

/** 0.001 USD per token: unknown models are charged pessimistically. */
export const DEFAULT_PRICE_PER_1M = 1000;

export class PriceTable {
  private prices = new Map<string, number>();

  constructor(overrides: Record<string, number> = {}, private readonly defaultPer1M = DEFAULT_PRICE_PER_1M) {
    for (const entry of MODEL_PRICING) {
      this.prices.set(entry.model, entry.per1M);
    }
    for (const [model, per1M] of Object.entries(overrides)) {
      this.prices.set(model, per1M);
    }
  }

  pricePer1M(model: string): number {
    return this.prices.get(model) ?? this.defaultPer1M;
  }

  costOf(tokens: number, model: string): number {
    return (tokens * this.pricePer1M(model)) / 1_000_000;
  }
}
