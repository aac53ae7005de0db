/**
 * @module @llmverify/adapters-redis/manifest
 */

import type { AdapterManifest } from '@llmverify/core';

/**
 * Shared tier behind the in-process cache, so several verifier processes
 * reuse each other's results until they expire.
 */
export const manifest: AdapterManifest = {
  manifestVersion: '1.0.0',
  id: 'redis-cache-tier',
  name: 'Redis Cache Tier',
  version: '1.0.0',
  description: 'Verification results shared across processes, stored as JSON with millisecond expiry',
  license: 'MIT',
  type: 'core',
  implements: 'ICacheTier',
  capabilities: {
    custom: {
      ttl: true,
      patterns: true,
      crossProcess: true,
    },
  },
  configSchema: {
    url: {
      type: 'string',
      description: 'Connection URL, taken from LLMV_REDIS_URL by the engine',
    },
    keyPrefix: {
      type: 'string',
      default: 'llmv:',
      description: 'Namespace for verification keys (LLMV_REDIS_KEY_PREFIX)',
    },
  },
};
