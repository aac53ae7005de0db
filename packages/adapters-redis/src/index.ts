/**
 * @module @llmverify/adapters-redis
 * Redis adapter implementing the distributed ICacheTier.
 *
 * @example
 * ```typescript
 * import { createAdapter } from '@llmverify/adapters-redis';
 *
 * const tier = createAdapter({
 *   host: 'localhost',
 *   port: 6379,
 * });
 *
 * await tier.set('verification:openai:gpt-4o', result, 60000); // TTL 60s
 * const cached = await tier.get('verification:openai:gpt-4o');
 * await tier.clear('verification:openai:*');
 * ```
 */

import Redis, { type RedisOptions } from 'ioredis';
import type { ICacheTier } from '@llmverify/core';

export { manifest } from './manifest.js';

/**
 * Configuration for Redis cache tier.
 */
export interface RedisCacheConfig extends RedisOptions {
  /** Connection URL (redis://...); takes precedence over host/port */
  url?: string;
  /** Redis host (default: 'localhost') */
  host?: string;
  /** Redis port (default: 6379) */
  port?: number;
  /** Key prefix for all cache keys (default: 'llmv:') */
  keyPrefix?: string;
}

const SCAN_COUNT = 100;

/**
 * Fail fast while Redis is unreachable so callers fall back to their fast
 * tier instead of waiting through ioredis' default reconnect retries.
 */
export const FAIL_FAST_OPTIONS = {
  maxRetriesPerRequest: 1,
  commandTimeout: 500,
  connectTimeout: 2000,
} satisfies RedisOptions;

/**
 * Redis implementation of ICacheTier. Values are stored as JSON with a
 * millisecond (`PX`) expiry.
 */
export class RedisCacheAdapter implements ICacheTier {
  private readonly client: Redis;
  private readonly keyPrefix: string;

  constructor(config: RedisCacheConfig = {}) {
    const { url, ...options } = config;
    this.keyPrefix = config.keyPrefix ?? 'llmv:';

    const redisOptions: RedisOptions = {
      host: config.host ?? 'localhost',
      port: config.port ?? 6379,
      ...FAIL_FAST_OPTIONS,
      ...options,
      keyPrefix: this.keyPrefix,
    };
    this.client = url ? new Redis(url, redisOptions) : new Redis(redisOptions);
  }

  async get<T>(key: string): Promise<T | null> {
    const value = await this.client.get(key);
    if (value === null) return null;

    const parsed: T = JSON.parse(value);
    return parsed;
  }

  async set<T>(key: string, value: T, ttlMs: number): Promise<void> {
    if (!(ttlMs > 0)) {
      throw new RangeError(`TTL must be positive, got ${ttlMs}`);
    }
    await this.client.set(key, JSON.stringify(value), 'PX', Math.ceil(ttlMs));
  }

  async delete(key: string): Promise<void> {
    await this.client.del(key);
  }

  /**
   * Remove keys matching `pattern` (default: every key under the prefix).
   * Uses SCAN so large keyspaces are never listed in one blocking call.
   */
  async clear(pattern = '*'): Promise<void> {
    const match = `${this.keyPrefix}${pattern}`;
    const keys: string[] = [];
    let cursor = '0';
    do {
      // eslint-disable-next-line no-await-in-loop -- cursor iteration is sequential
      const [next, page] = await this.client.scan(cursor, 'MATCH', match, 'COUNT', SCAN_COUNT);
      keys.push(...page);
      cursor = next;
    } while (cursor !== '0');

    if (keys.length > 0) {
      // SCAN returns full keys; del() adds the prefix again
      await this.client.del(...keys.map((k) => k.slice(this.keyPrefix.length)));
    }
  }

  /**
   * Close Redis connection.
   * Call this on app shutdown.
   */
  async disconnect(): Promise<void> {
    await this.client.quit();
  }
}

/**
 * Create Redis cache tier.
 * This is the factory the engine bootstrap calls when a Redis URL is configured.
 */
export function createAdapter(config?: RedisCacheConfig): RedisCacheAdapter {
  return new RedisCacheAdapter(config);
}

// Default export for direct import
export default createAdapter;
