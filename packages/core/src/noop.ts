/**
 * @module @llmverify/core/noop
 * Null-object implementations used when a collaborator is not configured.
 */

import type { ICacheTier, ILogger, IResultStore, ResultFilter } from './adapters.js';
import type { VerificationResult } from './types.js';

/**
 * Logger that discards everything.
 */
export class NoopLogger implements ILogger {
  debug(_message: string, _meta?: Record<string, unknown>): void {}
  info(_message: string, _meta?: Record<string, unknown>): void {}
  warn(_message: string, _meta?: Record<string, unknown>): void {}
  error(_message: string, _error?: Error, _meta?: Record<string, unknown>): void {}
  child(_bindings: Record<string, unknown>): ILogger {
    return this;
  }
}

/**
 * Cache tier that stores nothing. Stands in for an absent distributed tier so
 * the multi-level cache never branches on its presence.
 */
export class NoopCacheTier implements ICacheTier {
  async get<T>(_key: string): Promise<T | null> {
    return null;
  }
  async set<T>(_key: string, _value: T, _ttlMs: number): Promise<void> {}
  async delete(_key: string): Promise<void> {}
  async clear(_pattern?: string): Promise<void> {}
  async disconnect(): Promise<void> {}
}

/**
 * Result store kept in process memory, newest first.
 */
export class MemoryResultStore implements IResultStore {
  private readonly results: VerificationResult[] = [];

  async save(result: VerificationResult): Promise<void> {
    this.results.unshift(result);
  }

  async list(filter: ResultFilter = {}, limit = 50, offset = 0): Promise<VerificationResult[]> {
    const provider = filter.provider?.toLowerCase();
    return this.results
      .filter((r) => provider === undefined || r.provider.toLowerCase() === provider)
      .filter((r) => filter.model === undefined || r.model === filter.model)
      .filter((r) => filter.minScore === undefined || r.score >= filter.minScore)
      .slice(offset, offset + limit);
  }

  get size(): number {
    return this.results.length;
  }
}
