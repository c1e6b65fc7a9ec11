import type pino from 'pino';
import type { LLMProvider } from './types.js';
import type { ProviderEntryInput } from '../core/types.js';
import { InvalidInputError } from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import type { ProviderRuntime } from './base.js';
import { AnthropicProvider } from './anthropic.js';
import { LocalProvider } from './local.js';
import { OpenAICompatibleProvider } from './openai-compatible.js';

interface Entry {
  provider: LLMProvider;
  priority: number;
}

/**
 * Providers ordered by ascending priority; equal priorities keep their
 * registration order. Callers take a snapshot per request, so registration
 * changes never affect a request already in flight.
 */
export class ProviderRegistry {
  private entries: Entry[] = [];
  private logger: pino.Logger;

  constructor(options: { logger?: pino.Logger } = {}) {
    this.logger = options.logger ?? getLogger();
  }

  register(provider: LLMProvider, priority: number = provider.priority): void {
    if (!Number.isFinite(priority)) {
      throw new InvalidInputError(`Priority for provider "${provider.name}" must be a finite number`);
    }
    const replaced = this.deregister(provider.name);
    this.entries.push({ provider, priority });
    // Array#sort is stable, so ties stay in registration order
    this.entries.sort((a, b) => a.priority - b.priority);
    this.logger.debug({ provider: provider.name, priority, replaced }, 'Provider registered');
  }

  deregister(name: string): boolean {
    const index = this.entries.findIndex(e => e.provider.name === name);
    if (index === -1) return false;
    this.entries.splice(index, 1);
    return true;
  }

  get(name: string): LLMProvider {
    const entry = this.entries.find(e => e.provider.name === name);
    if (!entry) {
      throw new InvalidInputError(`Provider "${name}" not found. Available: ${this.list().join(', ') || '(none)'}`);
    }
    return entry.provider;
  }

  has(name: string): boolean {
    return this.entries.some(e => e.provider.name === name);
  }

  priorityOf(name: string): number | undefined {
    return this.entries.find(e => e.provider.name === name)?.priority;
  }

  /** Provider names in failover order. */
  list(): string[] {
    return this.entries.map(e => e.provider.name);
  }

  snapshot(): LLMProvider[] {
    return this.entries.map(e => e.provider);
  }

  get size(): number {
    return this.entries.length;
  }

  static fromConfig(entries: ProviderEntryInput[], runtime: ProviderRuntime = {}): ProviderRegistry {
    const registry = new ProviderRegistry({ logger: runtime.logger });
    for (const entry of entries) {
      registry.register(createProvider(entry, runtime));
    }
    return registry;
  }
}

export function createProvider(entry: ProviderEntryInput, runtime: ProviderRuntime = {}): LLMProvider {
  switch (entry.type) {
    case 'deepseek':
    case 'openai':
      return new OpenAICompatibleProvider({ ...entry, type: entry.type }, runtime);
    case 'anthropic':
      return new AnthropicProvider(entry, runtime);
    case 'local':
      return new LocalProvider(entry, runtime);
  }
}
