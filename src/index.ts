/**
 * promptgate: budget-aware gateway for chat-completion providers.
 * Public SDK exports for programmatic usage.
 *
 * @example
 * ```typescript
 * import { ConfigManager, createOrchestrator } from 'promptgate';
 *
 * const config = new ConfigManager().load();
 * const orchestrator = createOrchestrator(config);
 * const reply = await orchestrator.chat('Summarize the release notes', { maxTokens: 300 });
 * ```
 */

// Core
export { EventBus, type PromptgateListeners } from './core/events.js';
export { ConfigManager, redactConfig, PROJECT_CONFIG_FILE, type ConfigManagerOptions } from './core/config.js';
export { createLogger, getLogger, setLogger, type LogLevel, type LoggerOptions } from './core/logger.js';
export { AsyncMutex } from './core/mutex.js';
export {
  PromptgateError,
  ConfigError,
  InvalidInputError,
  ProviderError,
  ProviderRateLimitError,
  ProviderTimeoutError,
  ProviderConnectionError,
  ProviderClientError,
  ProviderApiError,
  ProviderUnexpectedError,
  ProviderExhaustedError,
  AllProvidersFailedError,
  BudgetExceededError,
  ToolError,
  ToolNotFoundError,
  ToolExecutionError,
  ToolValidationError,
  PromptTemplateError,
  ResponseFormatError,
  toError,
  type ProviderErrorKind,
  type ProviderFailure,
  type BudgetWindow,
} from './core/errors.js';
export {
  PromptgateConfigSchema,
  ProviderEntrySchema,
  BudgetConfigSchema,
  ConversationConfigSchema,
  CacheConfigSchema,
  type PromptgateConfig,
  type PromptgateConfigInput,
  type ProviderEntry,
  type ProviderEntryInput,
  type ProviderType,
  type BudgetConfig,
  type BudgetConfigInput,
  type ConversationConfig,
  type ConversationConfigInput,
  type CacheConfig,
  type CacheConfigInput,
  type PromptgateEvents,
} from './core/types.js';

// Providers
export { BaseProvider, type ProviderRuntime, type BackendRequest } from './providers/base.js';
export { OpenAICompatibleProvider, type OpenAICompatibleConfig } from './providers/openai-compatible.js';
export { AnthropicProvider } from './providers/anthropic.js';
export { LocalProvider } from './providers/local.js';
export { ProviderRegistry, createProvider } from './providers/registry.js';
export { FailoverRunner, type ProviderHealthReport } from './providers/failover.js';
export { PROVIDER_PRESETS, resolveProviderConfig, type ProviderPreset } from './providers/presets.js';
export { retryDelay, errorForStatus } from './providers/retry-policy.js';
export type {
  LLMProvider,
  Message,
  MessageRole,
  ToolCall,
  GenerationOptions,
  AIResponse,
  ProviderStats,
  ProviderSettings,
  BackendReply,
} from './providers/types.js';

// Cost control
export { CostController, BudgetReservation, DEFAULT_BUDGET_MODEL, type CostControllerOptions } from './cost/controller.js';
export { PriceTable, MODEL_PRICING, DEFAULT_PRICE_PER_1M } from './cost/pricing.js';
export { UsageWindow, bucketKey, type Granularity } from './cost/windows.js';
export type { ModelPricing, UsageSnapshot, HourlyUsage, DailyUsage } from './cost/types.js';

// Tools
export { ToolRegistry, type RegisteredTool } from './tools/registry.js';
export { ToolExecutor, ToolArgumentError } from './tools/executor.js';
export { compileToolSchema } from './tools/schema.js';
export { BUILTIN_TOOLS, createDefaultToolRegistry, calculateTool, evaluateArithmetic } from './tools/builtin/index.js';
export type {
  Tool,
  ToolDefinition,
  ToolHandler,
  ToolArgs,
  ToolParameters,
  ToolProperty,
  ToolResult,
} from './tools/types.js';

// Conversation & cache
export {
  ConversationContext,
  defaultSummarizer,
  type ConversationStore,
  type ConversationMessage,
  type ConversationStats,
  type Summarizer,
} from './conversation/context.js';
export {
  SemanticCache,
  type ResponseCache,
  type CacheStats,
  type SemanticCacheOptions,
} from './cache/semantic-cache.js';
export { HashedEmbedder, cosineSimilarity, type EmbeddingFunction } from './cache/embedding.js';

// Prompts
export { PromptLibrary, render, placeholders, parseJsonResponse, type TemplateParams } from './prompt/library.js';
export {
  summarize,
  translate,
  generateHtmlTailwind,
  fillFormFields,
  analyzeSalesData,
  analyzeTrafficData,
  type ChatClient,
} from './prompt/tasks.js';

// Orchestrator
export { AIOrchestrator } from './orchestrator/orchestrator.js';
export { createOrchestrator, type CreateOrchestratorOptions } from './orchestrator/factory.js';
export { RequestHistory, type RequestRecord, type HistoryTotals } from './orchestrator/history.js';
export type {
  ChatOptions,
  OrchestratorResponse,
  OrchestratorOptions,
  Analytics,
  ProviderAnalytics,
} from './orchestrator/types.js';

// Utils
export { retry, RetryExhaustedError, sleep, withTimeout, type RetryOptions } from './utils/retry.js';
export { estimateTokens, estimateMessageTokens, formatTokens, formatCost, truncate } from './utils/tokens.js';

// Version
export { VERSION, NAME } from './version.js';
