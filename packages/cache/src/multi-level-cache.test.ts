import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { ICacheTier, ILogger } from '@llmverify/core';
import { MultiLevelCache } from './multi-level-cache.js';
import type { MultiLevelCacheConfig, MultiLevelCacheDeps } from './multi-level-cache.js';

interface Entry {
  score: number;
  tags: string[];
}

/**
 * Distributed tier stand-in holding JSON in a Map, like a remote store would.
 */
class MapTier implements ICacheTier {
  readonly values = new Map<string, string>();
  disconnects = 0;

  async get<T>(key: string): Promise<T | null> {
    const raw = this.values.get(key);
    if (raw === undefined) return null;
    const parsed: T = JSON.parse(raw);
    return parsed;
  }
  async set<T>(key: string, value: T, _ttlMs: number): Promise<void> {
    this.values.set(key, JSON.stringify(value));
  }
  async delete(key: string): Promise<void> {
    this.values.delete(key);
  }
  async clear(_pattern?: string): Promise<void> {
    this.values.clear();
  }
  async disconnect(): Promise<void> {
    this.disconnects += 1;
  }
}

class FailingTier implements ICacheTier {
  async get<T>(_key: string): Promise<T | null> {
    throw new Error('connection refused');
  }
  async set<T>(_key: string, _value: T, _ttlMs: number): Promise<void> {
    throw new Error('connection refused');
  }
  async delete(_key: string): Promise<void> {
    throw new Error('connection refused');
  }
  async clear(_pattern?: string): Promise<void> {
    throw new Error('connection refused');
  }
  async disconnect(): Promise<void> {}
}

class HangingTier implements ICacheTier {
  get<T>(_key: string): Promise<T | null> {
    return new Promise(() => {});
  }
  set<T>(_key: string, _value: T, _ttlMs: number): Promise<void> {
    return new Promise(() => {});
  }
  delete(_key: string): Promise<void> {
    return new Promise(() => {});
  }
  clear(_pattern?: string): Promise<void> {
    return new Promise(() => {});
  }
  async disconnect(): Promise<void> {}
}

class RecordingLogger implements ILogger {
  readonly warnings: string[] = [];
  debug(_message: string, _meta?: Record<string, unknown>): void {}
  info(_message: string, _meta?: Record<string, unknown>): void {}
  warn(message: string, _meta?: Record<string, unknown>): void {
    this.warnings.push(message);
  }
  error(_message: string, _error?: Error, _meta?: Record<string, unknown>): void {}
  child(_bindings: Record<string, unknown>): ILogger {
    return this;
  }
}

describe('MultiLevelCache', () => {
  const caches: Array<MultiLevelCache<Entry>> = [];

  function build(config?: MultiLevelCacheConfig<Entry>, deps?: MultiLevelCacheDeps): MultiLevelCache<Entry> {
    const cache = new MultiLevelCache<Entry>(config, deps);
    caches.push(cache);
    return cache;
  }

  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(async () => {
    await Promise.all(caches.splice(0).map((cache) => cache.close()));
    vi.useRealTimers();
  });

  it('returns a hit immediately and a miss once the TTL has passed', async () => {
    const cache = build();
    const value = { score: 87, tags: ['chat'] };

    await cache.set('k', value, 100);
    expect(await cache.get('k')).toEqual({ hit: true, value });

    await vi.advanceTimersByTimeAsync(150);
    expect(await cache.get('k')).toEqual({ hit: false });

    expect(cache.stats()).toMatchObject({ hits: 1, misses: 1, hitRate: 50 });
  });

  it('rejects non-positive TTLs', async () => {
    const cache = build();

    await expect(cache.set('k', { score: 1, tags: [] }, 0)).rejects.toThrow(RangeError);
    await expect(cache.set('k', { score: 1, tags: [] }, -5)).rejects.toThrow('TTL must be positive, got -5');
    expect(cache.stats().items).toBe(0);
  });

  it('promotes distributed hits into the fast tier as independent copies', async () => {
    const tier = new MapTier();
    tier.values.set('k', JSON.stringify({ score: 42, tags: ['vision'] }));
    const cache = build({}, { tier });

    const first = await cache.get('k');
    expect(first).toEqual({ hit: true, value: { score: 42, tags: ['vision'] } });
    if (first.hit) first.value.tags.push('mutated');

    tier.values.clear();
    expect(await cache.get('k')).toEqual({ hit: true, value: { score: 42, tags: ['vision'] } });
    expect(cache.stats().items).toBe(1);
  });

  it('passes distributed values through revive before promoting them', async () => {
    const tier = new MapTier();
    tier.values.set('k', JSON.stringify({ score: 42, tags: ['vision'] }));
    const cache = build({ revive: (value) => Object.freeze({ ...value, tags: [...value.tags, 'revived'] }) }, { tier });

    const first = await cache.get('k');
    tier.values.clear();
    const second = await cache.get('k');

    expect(first).toEqual({ hit: true, value: { score: 42, tags: ['vision', 'revived'] } });
    expect(second).toEqual(first);
    expect(second.hit && Object.isFrozen(second.value)).toBe(true);
  });

  it('treats values revive rejects as misses', async () => {
    const tier = new MapTier();
    const logger = new RecordingLogger();
    tier.values.set('k', JSON.stringify({ score: 'high' }));
    const cache = build({ revive: (value) => (typeof value.score === 'number' ? value : null) }, { tier, logger });

    expect(await cache.get('k')).toEqual({ hit: false });
    expect(cache.stats()).toMatchObject({ hits: 0, misses: 1, items: 0 });
    expect(logger.warnings).toEqual(['Distributed tier returned an unusable value']);
  });

  it('stops waiting on a distributed tier that does not answer', async () => {
    const logger = new RecordingLogger();
    const cache = build({ tierTimeoutMs: 200 }, { tier: new HangingTier(), logger });

    const write = cache.set('k', { score: 3, tags: [] }, 1000);
    await vi.advanceTimersByTimeAsync(200);
    await expect(write).resolves.toBeUndefined();

    const read = cache.get('other');
    await vi.advanceTimersByTimeAsync(200);
    await expect(read).resolves.toEqual({ hit: false });

    expect(await cache.get('k')).toEqual({ hit: true, value: { score: 3, tags: [] } });
    expect(logger.warnings).toEqual(['Distributed tier write failed', 'Distributed tier read failed']);
  });

  it('peeks without counting or promoting', async () => {
    const tier = new MapTier();
    tier.values.set('remote', JSON.stringify({ score: 9, tags: [] }));
    const cache = build({}, { tier });
    await cache.set('local', { score: 1, tags: [] }, 1000);

    expect(await cache.peek('local')).toEqual({ hit: true, value: { score: 1, tags: [] } });
    expect(await cache.peek('remote')).toEqual({ hit: true, value: { score: 9, tags: [] } });
    expect(await cache.peek('missing')).toEqual({ hit: false });
    expect(cache.stats()).toMatchObject({ hits: 0, misses: 0, items: 1 });
  });

  it('writes through to the distributed tier', async () => {
    const tier = new MapTier();
    const cache = build({}, { tier });

    await cache.set('k', { score: 10, tags: [] }, 1000);
    expect(tier.values.get('k')).toBe('{"score":10,"tags":[]}');

    await cache.delete('k');
    expect(tier.values.has('k')).toBe(false);
    expect(await cache.get('k')).toEqual({ hit: false });
  });

  it('keeps working on the fast tier when the distributed tier fails', async () => {
    const logger = new RecordingLogger();
    const cache = build({}, { tier: new FailingTier(), logger });

    await expect(cache.set('k', { score: 5, tags: [] }, 1000)).resolves.toBeUndefined();
    expect(await cache.get('k')).toEqual({ hit: true, value: { score: 5, tags: [] } });
    expect(await cache.get('other')).toEqual({ hit: false });
    await expect(cache.clear()).resolves.toBeUndefined();

    expect(logger.warnings).toEqual([
      'Distributed tier write failed',
      'Distributed tier read failed',
      'Distributed tier clear failed',
    ]);
  });

  it('sweeps expired entries on demand', async () => {
    const cache = build();
    await cache.set('short', { score: 1, tags: [] }, 100);
    await cache.set('long', { score: 2, tags: [] }, 1000);

    vi.advanceTimersByTime(200);

    expect(cache.sweep()).toBe(1);
    expect(cache.stats().items).toBe(1);
    expect(cache.stats().lastSweep).toEqual(new Date(Date.now()));
  });

  it('sweeps on the configured interval', async () => {
    const cache = build({ sweepIntervalMs: 1000 });
    await cache.set('k', { score: 1, tags: [] }, 500);

    expect(cache.stats().lastSweep).toBeNull();
    vi.advanceTimersByTime(1000);

    expect(cache.stats().items).toBe(0);
    expect(cache.stats().lastSweep).not.toBeNull();
  });

  it('evicts the least recently used entry beyond capacity', async () => {
    const cache = build({ maxItems: 2 });
    await cache.set('a', { score: 1, tags: [] }, 1000);
    await cache.set('b', { score: 2, tags: [] }, 1000);
    await cache.get('a');
    await cache.set('c', { score: 3, tags: [] }, 1000);

    expect((await cache.get('b')).hit).toBe(false);
    expect((await cache.get('a')).hit).toBe(true);
    expect((await cache.get('c')).hit).toBe(true);
  });

  it('disconnects the distributed tier once on close', async () => {
    const tier = new MapTier();
    const cache = build({}, { tier });

    await cache.close();
    await cache.close();

    expect(tier.disconnects).toBe(1);
  });
});
