import type pino from 'pino';
import type { EventBus } from '../core/events.js';
import type { BudgetConfigInput, CacheConfigInput, ConversationConfigInput } from '../core/types.js';
import type { CostController } from '../cost/controller.js';
import type { UsageSnapshot } from '../cost/types.js';
import type { CacheStats, ResponseCache } from '../cache/semantic-cache.js';
import type { ConversationStats, ConversationStore } from '../conversation/context.js';
import type { ProviderHealthReport } from '../providers/failover.js';
import type { AIResponse, ProviderStats } from '../providers/types.js';
import type { ToolRegistry } from '../tools/registry.js';
import type { ToolResult } from '../tools/types.js';
import type { RequestRecord } from './history.js';

export interface ChatOptions {
  /** Sent to every provider tried; by default each uses its own default model. */
  model?: string;
  maxTokens?: number;
  temperature?: number;
  systemPrompt?: string;
  /** Prepend the conversation history and append this exchange to it. */
  useConversation?: boolean;
  /** Consult and populate the response cache (stateless requests only). */
  useCache?: boolean;
  /** Advertise registered tools and run the calls the model makes. */
  useTools?: boolean;
}

export interface OrchestratorResponse extends AIResponse {
  cached: boolean;
  toolResults: ToolResult[];
}

export interface OrchestratorOptions {
  costController?: CostController;
  budget?: BudgetConfigInput;
  conversation?: ConversationStore;
  conversationConfig?: ConversationConfigInput;
  cache?: ResponseCache;
  /** Build a SemanticCache when no cache is given. */
  enableCache?: boolean;
  cacheConfig?: CacheConfigInput;
  tools?: ToolRegistry;
  /** Build the built-in tool registry when no registry is given. */
  enableTools?: boolean;
  historyLimit?: number;
  events?: EventBus;
  logger?: pino.Logger;
  estimateTokens?: (text: string) => number;
}

export interface ProviderAnalytics extends ProviderStats {
  health?: ProviderHealthReport;
}

export interface Analytics {
  totalRequests: number;
  cachedResponses: number;
  totalTokens: number;
  providersUsed: Record<string, number>;
  modelsUsed: Record<string, number>;
  providers: ProviderAnalytics[];
  budget: UsageSnapshot;
  cache: (CacheStats & { enabled: true }) | { enabled: false };
  conversation: ConversationStats;
  recentRequests: RequestRecord[];
}
