import type pino from 'pino';
import type { PromptgateConfig } from '../core/types.js';
import { EventBus } from '../core/events.js';
import { getLogger } from '../core/logger.js';
import { createProvider } from '../providers/registry.js';
import { createDefaultToolRegistry } from '../tools/builtin/index.js';
import { ToolRegistry } from '../tools/registry.js';
import { AIOrchestrator } from './orchestrator.js';

export interface CreateOrchestratorOptions {
  logger?: pino.Logger;
  events?: EventBus;
  sleep?: (ms: number) => Promise<void>;
}

/** Build an orchestrator with every configured provider registered. */
export function createOrchestrator(config: PromptgateConfig, options: CreateOrchestratorOptions = {}): AIOrchestrator {
  const logger = options.logger ?? getLogger();
  const events = options.events ?? new EventBus();

  let tools: ToolRegistry | undefined;
  if (config.tools.enabled) {
    tools = config.tools.builtins ? createDefaultToolRegistry({ logger }) : new ToolRegistry({ logger });
  }

  const orchestrator = new AIOrchestrator({
    budget: config.budget,
    conversationConfig: config.conversation,
    enableCache: config.cache.enabled,
    cacheConfig: config.cache,
    tools,
    historyLimit: config.history.limit,
    logger,
    events,
  });

  for (const entry of config.providers) {
    orchestrator.registerProvider(createProvider(entry, { logger, events, sleep: options.sleep }));
  }

  if (config.providers.length === 0) {
    logger.warn('No providers configured; set DEEPSEEK_API_KEY, OPENAI_API_KEY or add providers to the config');
  }
  return orchestrator;
}
