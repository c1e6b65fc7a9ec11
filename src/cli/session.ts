import { resolve } from 'node:path';
import { ConfigManager } from '../core/config.js';
import { createLogger, setLogger } from '../core/logger.js';
import type { PromptgateConfig, PromptgateConfigInput } from '../core/types.js';

export interface SessionOptions {
  dir?: string;
  verbose?: boolean;
}

/**
 * Load configuration for a command and install the process logger it asks
 * for. `--verbose` forces debug output to stderr.
 */
export function loadSession(options: SessionOptions, overrides?: PromptgateConfigInput): PromptgateConfig {
  const manager = new ConfigManager({ projectDir: resolve(options.dir ?? '.') });
  const config = manager.load(overrides);

  const logging = options.verbose ? { ...config.logging, level: 'debug' as const, pretty: true } : config.logging;
  setLogger(createLogger('promptgate', logging));
  return config;
}
