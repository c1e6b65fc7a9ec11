import { z } from 'zod';
import type { BudgetWindow, ProviderErrorKind } from './errors.js';

// ── Configuration schema ────────────────────────────────────────────────────

export const ProviderTypeSchema = z.enum(['deepseek', 'openai', 'anthropic', 'local']);
export type ProviderType = z.infer<typeof ProviderTypeSchema>;

export const ProviderEntrySchema = z.object({
  type: ProviderTypeSchema,
  name: z.string().min(1).optional(),
  apiKey: z.string().min(1).optional(),
  baseUrl: z.string().url().optional(),
  defaultModel: z.string().min(1).optional(),
  /** Lower is tried first. */
  priority: z.number().finite().default(100),
  timeoutMs: z.number().int().positive().default(60_000),
  /** Total attempts per call, the first one included. */
  maxRetries: z.number().int().min(1).max(10).default(3),
  backoffFactor: z.number().positive().default(1.5),
});
export type ProviderEntry = z.infer<typeof ProviderEntrySchema>;
export type ProviderEntryInput = z.input<typeof ProviderEntrySchema>;

export const BudgetConfigSchema = z.object({
  maxTokensPerHour: z.number().int().positive().default(100_000),
  maxTokensPerDay: z.number().int().positive().default(1_000_000),
  maxCostPerHour: z.number().positive().default(10),
  alertThreshold: z.number().min(0).max(1).default(0.8),
  /** USD per million tokens, by model. Merged over the built-in table. */
  pricing: z.record(z.number().nonnegative()).default({}),
  /** Charged for models missing from the table. */
  defaultPricePer1M: z.number().nonnegative().default(1000),
});
export type BudgetConfig = z.infer<typeof BudgetConfigSchema>;
export type BudgetConfigInput = z.input<typeof BudgetConfigSchema>;

export const ConversationConfigSchema = z.object({
  maxMessages: z.number().int().positive().default(20),
  contextWindow: z.number().int().positive().default(4096),
  summarizeOldMessages: z.boolean().default(false),
});
export type ConversationConfig = z.infer<typeof ConversationConfigSchema>;
export type ConversationConfigInput = z.input<typeof ConversationConfigSchema>;

export const CacheConfigSchema = z.object({
  enabled: z.boolean().default(false),
  similarityThreshold: z.number().min(0).max(1).default(0.95),
  maxEntries: z.number().int().positive().default(1000),
  ttlMs: z.number().int().positive().default(3_600_000),
});
export type CacheConfig = z.infer<typeof CacheConfigSchema>;
export type CacheConfigInput = z.input<typeof CacheConfigSchema>;

export const PromptgateConfigSchema = z.object({
  providers: z.array(ProviderEntrySchema).default([]),
  budget: BudgetConfigSchema.default({}),
  conversation: ConversationConfigSchema.default({}),
  cache: CacheConfigSchema.default({}),
  tools: z.object({
    enabled: z.boolean().default(false),
    builtins: z.boolean().default(true),
  }).default({}),
  history: z.object({
    limit: z.number().int().positive().default(1000),
  }).default({}),
  logging: z.object({
    level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    pretty: z.boolean().default(false),
    file: z.string().optional(),
  }).default({}),
});

export type PromptgateConfig = z.infer<typeof PromptgateConfigSchema>;
export type PromptgateConfigInput = z.input<typeof PromptgateConfigSchema>;

// ── Event types ─────────────────────────────────────────────────────────────

export interface PromptgateEvents {
  'provider:attempt': { provider: string; attempt: number };
  'provider:retry': { provider: string; attempt: number; kind: ProviderErrorKind; delayMs: number; error: string };
  'provider:exhausted': { provider: string; attempts: number; error: string };
  'failover:next': { from: string; error: string; remaining: number };
  'budget:alert': { window: 'hourly'; percent: number; threshold: number };
  'budget:rejected': { reason: BudgetWindow; requested: number; used: number; limit: number };
  'usage:recorded': { tokens: number; model: string; cost: number; hourlyTokens: number; dailyTokens: number };
  'tool:executed': { tool: string; durationMs: number };
  'tool:failed': { tool: string; code: string; error: string };
  'cache:hit': { query: string };
  'cache:miss': { query: string };
  'request:complete': { provider: string; model: string; tokens: number; cached: boolean; durationMs: number };
}
