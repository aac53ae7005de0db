/**
 * @module @llmverify/adapters-eventbus-memory/manifest
 * Adapter manifest for the in-process EventBus.
 */

import type { AdapterManifest } from '@llmverify/core';

/**
 * Adapter manifest for the in-process EventBus.
 */
export const manifest: AdapterManifest = {
  manifestVersion: '1.0.0',
  id: 'eventbus-memory',
  name: 'In-process EventBus',
  version: '1.0.0',
  description: 'EventBus delivering verification events to in-process subscribers',
  license: 'MIT',
  type: 'core',
  implements: 'IEventBus',
  capabilities: {
    custom: {
      persistence: false,
      distributed: false,
      typeFilter: true,
    },
  },
  configSchema: {
    name: {
      type: 'string',
      default: 'eventbus',
      description: 'Source tag added to log records',
    },
  },
};
