/**
 * @module @llmverify/verifier/registry
 * Name → provider adapter lookup.
 */

import type { AdapterManifest, IProviderAdapter } from '@llmverify/core';

export type AdapterLookup = { found: true; adapter: IProviderAdapter } | { found: false; name: string };

export interface RegisteredAdapter {
  name: string;
  manifest: AdapterManifest;
}

/**
 * Adapters keyed by lower-cased name. Registering a name twice replaces the
 * earlier adapter. All operations are synchronous, so a lookup never observes
 * a half-applied registration.
 */
export class AdapterRegistry {
  private readonly adapters = new Map<string, IProviderAdapter>();

  register(adapter: IProviderAdapter): void {
    this.adapters.set(adapter.name().toLowerCase(), adapter);
  }

  resolve(name: string): AdapterLookup {
    const adapter = this.adapters.get(name.toLowerCase());
    return adapter ? { found: true, adapter } : { found: false, name };
  }

  unregister(name: string): boolean {
    return this.adapters.delete(name.toLowerCase());
  }

  list(): RegisteredAdapter[] {
    return [...this.adapters.entries()].map(([name, adapter]) => ({ name, manifest: adapter.manifest }));
  }

  get size(): number {
    return this.adapters.size;
  }
}
