/**
 * @module @llmverify/cache/multi-level-cache
 * Two-tier cache: a synchronous in-process Map in front of a pluggable
 * distributed ICacheTier.
 */

import { NoopCacheTier, NoopLogger } from '@llmverify/core';
import type { ICacheTier, ILogger } from '@llmverify/core';

export interface MultiLevelCacheConfig<V = unknown> {
  /** TTL used when `set` gets none, and for promoted entries (default: 15 minutes) */
  defaultTtlMs?: number;
  /** Interval of the expiry sweep (default: 60 seconds) */
  sweepIntervalMs?: number;
  /** Fast-tier capacity; the least recently used entry is evicted beyond it (default: 10000) */
  maxItems?: number;
  /** Longest wait on one distributed-tier call before it counts as failed (default: 1000) */
  tierTimeoutMs?: number;
  /** Clock in ms since epoch (default: Date.now) */
  now?: () => number;
  /**
   * Checks and rebuilds a value read from the distributed tier before it is
   * promoted. Returning null discards it and counts a miss.
   */
  revive?: (value: V) => V | null;
}

export interface MultiLevelCacheDeps {
  /** Distributed tier; a null tier is used when absent */
  tier?: ICacheTier;
  logger?: ILogger;
}

export interface CacheItem<V> {
  key: string;
  value: V;
  expiresAt: number;
  accessCount: number;
  lastAccess: number;
}

export type CacheLookup<V> = { hit: true; value: V } | { hit: false };

export interface CacheStats {
  hits: number;
  misses: number;
  /** Percentage of lookups that hit, 0 when nothing was looked up */
  hitRate: number;
  /** Entries held by the fast tier */
  items: number;
  lastSweep: Date | null;
}

const MISS: CacheLookup<never> = { hit: false };

/**
 * Multi-level cache.
 *
 * Reads check the fast tier, then the distributed tier; a distributed hit is
 * promoted into the fast tier as an independent copy. Writes always land in the
 * fast tier; distributed-tier failures are logged and never reach the caller.
 * Fast-tier operations are synchronous, so no reader can observe a partial write.
 */
export class MultiLevelCache<V> {
  private readonly items = new Map<string, CacheItem<V>>();
  private readonly tier: ICacheTier;
  private readonly logger: ILogger;
  private readonly defaultTtlMs: number;
  private readonly maxItems: number;
  private readonly tierTimeoutMs: number;
  private readonly now: () => number;
  private readonly revive: (value: V) => V | null;
  private readonly sweepTimer: ReturnType<typeof setInterval>;
  private hits = 0;
  private misses = 0;
  private lastSweep: Date | null = null;
  private closed = false;

  constructor(config: MultiLevelCacheConfig<V> = {}, deps: MultiLevelCacheDeps = {}) {
    this.tier = deps.tier ?? new NoopCacheTier();
    this.logger = (deps.logger ?? new NoopLogger()).child({ component: 'cache' });
    this.defaultTtlMs = config.defaultTtlMs ?? 15 * 60 * 1000;
    this.maxItems = config.maxItems ?? 10_000;
    this.tierTimeoutMs = config.tierTimeoutMs ?? 1000;
    this.now = config.now ?? (() => Date.now());
    this.revive = config.revive ?? ((value) => value);

    this.sweepTimer = setInterval(() => this.sweep(), config.sweepIntervalMs ?? 60_000);
    this.sweepTimer.unref();
  }

  async get(key: string): Promise<CacheLookup<V>> {
    const local = this.items.get(key);
    const now = this.now();

    if (local) {
      if (local.expiresAt > now) {
        local.accessCount += 1;
        local.lastAccess = now;
        // Re-insert to keep Map order least-recently-used first
        this.items.delete(key);
        this.items.set(key, local);
        this.hits += 1;
        return { hit: true, value: local.value };
      }
      this.items.delete(key);
    }

    let remote: V | null = null;
    try {
      remote = await this.bounded(this.tier.get<V>(key), 'read');
    } catch (error) {
      this.logger.warn('Distributed tier read failed', { key, error: errorMessage(error) });
    }

    if (remote === null) {
      this.misses += 1;
      return MISS;
    }

    const promoted = this.revive(structuredClone(remote));
    const value = promoted === null ? null : this.revive(remote);
    if (promoted === null || value === null) {
      this.logger.warn('Distributed tier returned an unusable value', { key });
      this.misses += 1;
      return MISS;
    }

    this.hits += 1;
    this.store(key, promoted, this.defaultTtlMs);
    return { hit: true, value };
  }

  /**
   * Read without counting a hit or miss, touching access metadata or
   * promoting a distributed value.
   */
  async peek(key: string): Promise<CacheLookup<V>> {
    const local = this.items.get(key);
    if (local && local.expiresAt > this.now()) {
      return { hit: true, value: local.value };
    }

    let remote: V | null = null;
    try {
      remote = await this.bounded(this.tier.get<V>(key), 'read');
    } catch (error) {
      this.logger.warn('Distributed tier read failed', { key, error: errorMessage(error) });
    }
    const value = remote === null ? null : this.revive(remote);
    return value === null ? MISS : { hit: true, value };
  }

  /**
   * Store `value` for `ttlMs` (default: the configured TTL).
   * @throws RangeError when the TTL is not positive
   */
  async set(key: string, value: V, ttlMs: number = this.defaultTtlMs): Promise<void> {
    if (!(ttlMs > 0)) {
      throw new RangeError(`TTL must be positive, got ${ttlMs}`);
    }

    this.store(key, value, ttlMs);

    try {
      await this.bounded(this.tier.set(key, value, ttlMs), 'write');
    } catch (error) {
      this.logger.warn('Distributed tier write failed', { key, error: errorMessage(error) });
    }
  }

  async delete(key: string): Promise<void> {
    this.items.delete(key);
    try {
      await this.bounded(this.tier.delete(key), 'delete');
    } catch (error) {
      this.logger.warn('Distributed tier delete failed', { key, error: errorMessage(error) });
    }
  }

  async clear(): Promise<void> {
    this.items.clear();
    try {
      await this.bounded(this.tier.clear(), 'clear');
    } catch (error) {
      this.logger.warn('Distributed tier clear failed', { error: errorMessage(error) });
    }
  }

  /**
   * Remove expired fast-tier entries. Runs on the sweep interval.
   * @returns number of entries removed
   */
  sweep(): number {
    const now = this.now();
    let removed = 0;
    for (const [key, item] of this.items) {
      if (item.expiresAt <= now) {
        this.items.delete(key);
        removed += 1;
      }
    }
    this.lastSweep = new Date(now);
    if (removed > 0) {
      this.logger.debug('Expired entries swept', { removed });
    }
    return removed;
  }

  stats(): CacheStats {
    const lookups = this.hits + this.misses;
    return {
      hits: this.hits,
      misses: this.misses,
      hitRate: lookups === 0 ? 0 : (this.hits / lookups) * 100,
      items: this.items.size,
      lastSweep: this.lastSweep,
    };
  }

  /**
   * Stop the sweep and disconnect the distributed tier. Safe to call twice.
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    clearInterval(this.sweepTimer);
    try {
      await this.tier.disconnect();
    } catch (error) {
      this.logger.warn('Distributed tier disconnect failed', { error: errorMessage(error) });
    }
  }

  private async bounded<T>(operation: Promise<T>, what: string): Promise<T> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    let timedOut = false;
    const deadline = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => {
        timedOut = true;
        reject(new Error(`distributed tier ${what} timed out after ${this.tierTimeoutMs}ms`));
      }, this.tierTimeoutMs);
    });
    operation.catch((error: unknown) => {
      if (timedOut) {
        this.logger.debug('Distributed tier failed after its deadline', { operation: what, error: errorMessage(error) });
      }
    });
    try {
      return await Promise.race([operation, deadline]);
    } finally {
      clearTimeout(timer);
    }
  }

  private store(key: string, value: V, ttlMs: number): void {
    const now = this.now();
    this.items.delete(key);
    while (this.items.size >= this.maxItems) {
      const oldest = this.items.keys().next();
      if (oldest.done) break;
      this.items.delete(oldest.value);
    }
    this.items.set(key, { key, value, expiresAt: now + ttlMs, accessCount: 0, lastAccess: now });
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
