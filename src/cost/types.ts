export interface ModelPricing {
  model: string;
  provider: string;
  /** Blended USD per 1M tokens; usage is metered as a single total. */
  per1M: number;
}

export interface HourlyUsage {
  tokens: number;
  limit: number;
  percent: number;
  cost: number;
  costLimit: number;
}

export interface DailyUsage {
  tokens: number;
  limit: number;
  percent: number;
}

export interface UsageSnapshot {
  hourly: HourlyUsage;
  daily: DailyUsage;
  /** Admitted requests whose usage has not been committed yet. */
  pending: { reservations: number; tokens: number };
}
