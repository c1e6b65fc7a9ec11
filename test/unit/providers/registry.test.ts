import { describe, it, expect } from 'vitest';
import { InvalidInputError } from '../../../src/core/errors.js';
import { AnthropicProvider } from '../../../src/providers/anthropic.js';
import { LocalProvider } from '../../../src/providers/local.js';
import { OpenAICompatibleProvider } from '../../../src/providers/openai-compatible.js';
import { ProviderRegistry, createProvider } from '../../../src/providers/registry.js';
import { ScriptedProvider } from '../../helpers/mock-provider.js';

describe('ProviderRegistry', () => {
  it('should order providers by ascending priority', () => {
    const registry = new ProviderRegistry();
    registry.register(new ScriptedProvider({ name: 'b', priority: 2 }));
    registry.register(new ScriptedProvider({ name: 'a', priority: 1 }));
    registry.register(new ScriptedProvider({ name: 'c', priority: 3 }));

    expect(registry.list()).toEqual(['a', 'b', 'c']);
  });

  it('should keep registration order for equal priorities', () => {
    const registry = new ProviderRegistry();
    registry.register(new ScriptedProvider({ name: 'b', priority: 2 }));
    registry.register(new ScriptedProvider({ name: 'a', priority: 1 }));
    registry.register(new ScriptedProvider({ name: 'c', priority: 1 }));

    expect(registry.list()).toEqual(['a', 'c', 'b']);
  });

  it('should let an explicit priority override the provider default', () => {
    const registry = new ProviderRegistry();
    registry.register(new ScriptedProvider({ name: 'a', priority: 1 }));
    registry.register(new ScriptedProvider({ name: 'b', priority: 50 }), 0);

    expect(registry.list()).toEqual(['b', 'a']);
    expect(registry.priorityOf('b')).toBe(0);
  });

  it('should replace a provider registered under the same name', () => {
    const registry = new ProviderRegistry();
    const first = new ScriptedProvider({ name: 'a', priority: 1 });
    const second = new ScriptedProvider({ name: 'a', priority: 5 });
    registry.register(first);
    registry.register(new ScriptedProvider({ name: 'b', priority: 3 }));
    registry.register(second);

    expect(registry.size).toBe(2);
    expect(registry.list()).toEqual(['b', 'a']);
    expect(registry.get('a')).toBe(second);
  });

  it('should reject non-finite priorities', () => {
    const registry = new ProviderRegistry();
    expect(() => registry.register(new ScriptedProvider({ name: 'a' }), Number.NaN)).toThrow(InvalidInputError);
  });

  it('should deregister by name', () => {
    const registry = new ProviderRegistry();
    registry.register(new ScriptedProvider({ name: 'a' }));

    expect(registry.deregister('a')).toBe(true);
    expect(registry.deregister('a')).toBe(false);
    expect(registry.has('a')).toBe(false);
  });

  it('should list available names when a provider is missing', () => {
    const registry = new ProviderRegistry();
    registry.register(new ScriptedProvider({ name: 'a' }));
    expect(() => registry.get('zzz')).toThrow('Provider "zzz" not found. Available: a');
  });

  it('should hand out snapshots unaffected by later changes', () => {
    const registry = new ProviderRegistry();
    registry.register(new ScriptedProvider({ name: 'a' }));
    const snapshot = registry.snapshot();
    registry.register(new ScriptedProvider({ name: 'b' }));

    expect(snapshot.map(p => p.name)).toEqual(['a']);
  });

  it('should build providers from config entries', () => {
    const registry = ProviderRegistry.fromConfig([
      { type: 'local', priority: 99 },
      { type: 'deepseek', apiKey: 'test-secret', priority: 1 },
    ]);
    expect(registry.list()).toEqual(['deepseek', 'local']);
  });
});

describe('createProvider', () => {
  it('should pick the class for each provider type', () => {
    expect(createProvider({ type: 'deepseek', apiKey: 'test-secret' })).toBeInstanceOf(OpenAICompatibleProvider);
    expect(createProvider({ type: 'openai', apiKey: 'test-secret' })).toBeInstanceOf(OpenAICompatibleProvider);
    expect(createProvider({ type: 'anthropic', apiKey: 'test-secret' })).toBeInstanceOf(AnthropicProvider);
    expect(createProvider({ type: 'local' })).toBeInstanceOf(LocalProvider);
  });

  it('should apply preset default models', () => {
    expect(createProvider({ type: 'deepseek', apiKey: 'test-secret' }).defaultModel).toBe('deepseek-chat');
    expect(createProvider({ type: 'local' }).defaultModel).toBe('llama3.2');
  });
});
