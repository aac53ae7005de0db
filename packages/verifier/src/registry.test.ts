import { describe, it, expect } from 'vitest';
import { createAdapter as createDeepSeekAdapter } from '@llmverify/adapters-deepseek';
import { createAdapter as createOpenAIAdapter } from '@llmverify/adapters-openai';
import { AdapterRegistry } from './registry.js';

describe('AdapterRegistry', () => {
  it('resolves names case-insensitively', () => {
    const registry = new AdapterRegistry();
    const adapter = createOpenAIAdapter();
    registry.register(adapter);

    const lookup = registry.resolve('OpenAI');

    expect(lookup).toEqual({ found: true, adapter });
  });

  it('reports misses with the requested name', () => {
    expect(new AdapterRegistry().resolve('mistral')).toEqual({ found: false, name: 'mistral' });
  });

  it('lets the last registration win', () => {
    const registry = new AdapterRegistry();
    registry.register(createOpenAIAdapter({ name: 'gateway' }));
    const replacement = createDeepSeekAdapter({ name: 'Gateway' });
    registry.register(replacement);

    const lookup = registry.resolve('gateway');

    expect(registry.size).toBe(1);
    expect(lookup.found && lookup.adapter).toBe(replacement);
  });

  it('unregisters and lists manifests', () => {
    const registry = new AdapterRegistry();
    registry.register(createOpenAIAdapter());
    registry.register(createDeepSeekAdapter());

    expect(registry.list().map((entry) => [entry.name, entry.manifest.id])).toEqual([
      ['openai', 'openai-provider'],
      ['deepseek', 'deepseek-provider'],
    ]);
    expect(registry.unregister('DEEPSEEK')).toBe(true);
    expect(registry.unregister('deepseek')).toBe(false);
    expect(registry.size).toBe(1);
  });

  it('stays consistent under interleaved concurrent access', async () => {
    const registry = new AdapterRegistry();
    const names = Array.from({ length: 50 }, (_, i) => `provider-${i}`);

    const lookups = await Promise.all(
      names.map(async (name) => {
        await Promise.resolve();
        registry.register(createOpenAIAdapter({ name }));
        await Promise.resolve();
        return registry.resolve(name.toUpperCase());
      }),
    );

    lookups.forEach((lookup, i) => {
      expect(lookup.found && lookup.adapter.name()).toBe(names[i]);
    });
    expect(registry.size).toBe(50);
  });
});
