import { readFileSync, existsSync } from 'node:fs';
import { join } from 'node:path';
import { homedir } from 'node:os';
import { parse as parseYaml } from 'yaml';
import { ZodError } from 'zod';
import {
  PromptgateConfigSchema,
  type PromptgateConfig,
  type PromptgateConfigInput,
  type ProviderType,
} from './types.js';
import { ConfigError, toError } from './errors.js';
import { isRecord } from '../utils/guards.js';

export const PROJECT_CONFIG_FILE = '.promptgate.yaml';

/** Providers that an API key in the environment alone is enough to enable. */
const ENV_PROVIDERS: ReadonlyArray<{ type: ProviderType; envVar: string; priority: number }> = [
  { type: 'deepseek', envVar: 'DEEPSEEK_API_KEY', priority: 1 },
  { type: 'openai', envVar: 'OPENAI_API_KEY', priority: 2 },
  { type: 'anthropic', envVar: 'ANTHROPIC_API_KEY', priority: 3 },
];

export interface ConfigManagerOptions {
  projectDir?: string;
  globalDir?: string;
  env?: NodeJS.ProcessEnv;
}

export class ConfigManager {
  private config: PromptgateConfig | null = null;
  private readonly globalDir: string;
  private readonly projectDir: string;
  private readonly env: NodeJS.ProcessEnv;

  constructor(options: ConfigManagerOptions = {}) {
    this.globalDir = options.globalDir ?? join(homedir(), '.promptgate');
    this.projectDir = options.projectDir ?? process.cwd();
    this.env = options.env ?? process.env;
  }

  /**
   * Load configuration from all sources, merged in order:
   * defaults <- global config <- project config <- env vars <- overrides
   */
  load(overrides?: PromptgateConfigInput): PromptgateConfig {
    let raw: Record<string, unknown> = {};

    raw = this.deepMerge(raw, this.readYaml(join(this.globalDir, 'config.yaml'), 'global'));
    raw = this.deepMerge(raw, this.readYaml(join(this.projectDir, PROJECT_CONFIG_FILE), 'project'));
    raw = this.applyEnvVars(raw);

    if (overrides) {
      raw = this.deepMerge(raw, overrides);
    }

    try {
      this.config = PromptgateConfigSchema.parse(raw);
    } catch (err) {
      if (err instanceof ZodError) {
        const issues = err.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`);
        throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, err);
      }
      throw new ConfigError('Invalid configuration', toError(err));
    }

    return this.config;
  }

  get(): PromptgateConfig {
    if (!this.config) {
      return this.load();
    }
    return this.config;
  }

  getGlobalDir(): string {
    return this.globalDir;
  }

  getProjectDir(): string {
    return this.projectDir;
  }

  private readYaml(path: string, scope: string): Record<string, unknown> {
    if (!existsSync(path)) return {};

    let parsed: unknown;
    try {
      parsed = parseYaml(readFileSync(path, 'utf-8'));
    } catch (err) {
      throw new ConfigError(`Failed to parse ${scope} config at ${path}`, toError(err));
    }

    if (parsed === null || parsed === undefined) return {};
    if (!isRecord(parsed)) {
      throw new ConfigError(`Expected a mapping at the top of ${scope} config ${path}`);
    }
    return parsed;
  }

  private applyEnvVars(raw: Record<string, unknown>): Record<string, unknown> {
    const providers: unknown[] = Array.isArray(raw.providers) ? [...raw.providers] : [];

    const withKey = (type: ProviderType, apiKey: string, priority: number): void => {
      const existing = providers.filter(
        (entry): entry is Record<string, unknown> => isRecord(entry) && entry.type === type,
      );
      if (existing.length === 0) {
        providers.push({ type, apiKey, priority });
        return;
      }
      for (const entry of existing) {
        if (entry.apiKey === undefined) {
          providers[providers.indexOf(entry)] = { ...entry, apiKey };
        }
      }
    };

    for (const { type, envVar, priority } of ENV_PROVIDERS) {
      const key = this.env[envVar];
      if (key) withKey(type, key, priority);
    }

    const ollamaUrl = this.env.OLLAMA_BASE_URL;
    if (ollamaUrl) {
      const local = providers.findIndex(entry => isRecord(entry) && entry.type === 'local');
      if (local === -1) {
        providers.push({ type: 'local', baseUrl: ollamaUrl, priority: 99 });
      } else {
        const entry = providers[local];
        if (isRecord(entry) && entry.baseUrl === undefined) {
          providers[local] = { ...entry, baseUrl: ollamaUrl };
        }
      }
    }

    const result: Record<string, unknown> = { ...raw, providers };

    const level = this.env.PROMPTGATE_LOG_LEVEL;
    if (level) {
      const logging = isRecord(raw.logging) ? raw.logging : {};
      result.logging = { ...logging, level: level.toLowerCase() };
    }

    return result;
  }

  private deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
    const result = { ...target };
    for (const key of Object.keys(source)) {
      const from = source[key];
      const into = target[key];
      if (from === undefined) continue;
      // arrays (the provider list) are replaced, never concatenated
      result[key] = isRecord(from) && isRecord(into) ? this.deepMerge(into, from) : from;
    }
    return result;
  }
}

/** Copy of the configuration that is safe to print. */
export function redactConfig(config: PromptgateConfig): PromptgateConfig {
  return {
    ...config,
    providers: config.providers.map(p => (p.apiKey ? { ...p, apiKey: `***${p.apiKey.slice(-4)}` } : p)),
  };
}
