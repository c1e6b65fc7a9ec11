import { Command } from 'commander';
import { getLogger } from '../../core/logger.js';
import { ProviderRegistry } from '../../providers/registry.js';
import type { LLMProvider } from '../../providers/types.js';
import { loadSession } from '../session.js';

export function formatProviderLine(provider: LLMProvider, priority: number, available?: boolean): string {
  const status = available === undefined ? '' : available ? '  ✓ reachable' : '  ✗ unreachable';
  return `${priority.toString().padStart(4)}  ${provider.name} (${provider.type}, ${provider.defaultModel})${status}`;
}

/** `promptgate providers` lists configured providers in failover order. */
export function createProvidersCommand(): Command {
  return new Command('providers')
    .description('List configured providers in the order they are tried')
    .option('-d, --dir <directory>', 'Project directory', '.')
    .option('--check', 'Check whether each provider is reachable')
    .action(async (options: { dir: string; check?: boolean }) => {
      const config = loadSession(options);
      const registry = ProviderRegistry.fromConfig(config.providers, { logger: getLogger() });

      if (registry.size === 0) {
        console.log('No providers configured.');
        return;
      }
      for (const provider of registry.snapshot()) {
        const available = options.check ? await provider.isAvailable() : undefined;
        console.log(formatProviderLine(provider, registry.priorityOf(provider.name) ?? provider.priority, available));
      }
    });
}
