/**
 * @module @llmverify/cache
 * Multi-level cache for verification results.
 *
 * @example
 * ```typescript
 * import { MultiLevelCache } from '@llmverify/cache';
 * import { createAdapter as createRedisTier } from '@llmverify/adapters-redis';
 *
 * const cache = new MultiLevelCache<VerificationResult>(
 *   { defaultTtlMs: 3600000 },
 *   { tier: createRedisTier({ url: 'redis://localhost:6379' }), logger },
 * );
 *
 * const lookup = await cache.get('verification:openai:gpt-4o');
 * if (lookup.hit) console.log(lookup.value.score);
 * await cache.close();
 * ```
 */

export { MultiLevelCache } from './multi-level-cache.js';
export type {
  MultiLevelCacheConfig,
  MultiLevelCacheDeps,
  CacheItem,
  CacheLookup,
  CacheStats,
} from './multi-level-cache.js';
