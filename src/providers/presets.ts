/**
 * Per-backend defaults. A provider entry only has to name its type; the
 * endpoint, default model and the environment variable holding its key come
 * from here.
 */

import { ZodError } from 'zod';
import { InvalidInputError, toError } from '../core/errors.js';
import {
  ProviderEntrySchema,
  type ProviderEntry,
  type ProviderEntryInput,
  type ProviderType,
} from '../core/types.js';
import type { ProviderSettings } from './types.js';

export interface ProviderPreset {
  baseUrl: string;
  defaultModel: string;
  apiKeyEnvVar?: string;
  models: string[];
}

export const PROVIDER_PRESETS: Record<ProviderType, ProviderPreset> = {
  deepseek: {
    baseUrl: 'https://api.deepseek.com',
    defaultModel: 'deepseek-chat',
    apiKeyEnvVar: 'DEEPSEEK_API_KEY',
    models: ['deepseek-chat', 'deepseek-reasoner'],
  },
  openai: {
    baseUrl: 'https://api.openai.com/v1',
    defaultModel: 'gpt-3.5-turbo',
    apiKeyEnvVar: 'OPENAI_API_KEY',
    models: ['gpt-3.5-turbo', 'gpt-4', 'gpt-4o', 'gpt-4o-mini'],
  },
  anthropic: {
    baseUrl: 'https://api.anthropic.com',
    defaultModel: 'claude-3-5-haiku-latest',
    apiKeyEnvVar: 'ANTHROPIC_API_KEY',
    models: ['claude-3-5-haiku-latest', 'claude-3-5-sonnet-latest'],
  },
  local: {
    baseUrl: 'http://localhost:11434',
    defaultModel: 'llama3.2',
    models: ['llama3.2', 'mistral', 'qwen2.5'],
  },
};

function parseEntry(input: ProviderEntryInput): ProviderEntry {
  try {
    return ProviderEntrySchema.parse(input);
  } catch (err) {
    if (err instanceof ZodError) {
      const issues = err.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`);
      throw new InvalidInputError(`Invalid provider configuration: ${issues.join('; ')}`, err);
    }
    throw new InvalidInputError('Invalid provider configuration', toError(err));
  }
}

export function resolveProviderConfig(
  input: ProviderEntryInput,
  env: NodeJS.ProcessEnv = process.env,
): ProviderSettings {
  const entry = parseEntry(input);
  const preset = PROVIDER_PRESETS[entry.type];
  return {
    name: entry.name ?? entry.type,
    type: entry.type,
    apiKey: entry.apiKey ?? (preset.apiKeyEnvVar ? env[preset.apiKeyEnvVar] : undefined),
    baseUrl: (entry.baseUrl ?? preset.baseUrl).replace(/\/+$/, ''),
    defaultModel: entry.defaultModel ?? preset.defaultModel,
    priority: entry.priority,
    timeoutMs: entry.timeoutMs,
    maxRetries: entry.maxRetries,
    backoffFactor: entry.backoffFactor,
  };
}
