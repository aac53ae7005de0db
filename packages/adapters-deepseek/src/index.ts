/**
 * @module @llmverify/adapters-deepseek
 * DeepSeek provider adapter for the verification engine.
 *
 * @example
 * ```typescript
 * import { createAdapter } from '@llmverify/adapters-deepseek';
 *
 * registry.register(createAdapter());
 * ```
 */

export { manifest } from './manifest.js';
export {
  DeepSeekProviderAdapter,
  type DeepSeekAdapterConfig,
  DEEPSEEK_MAX_TOKENS,
  DEEPSEEK_CREATIVE_TEMPERATURE,
} from './provider.js';

import { DeepSeekProviderAdapter, type DeepSeekAdapterConfig } from './provider.js';

export function createAdapter(config?: DeepSeekAdapterConfig): DeepSeekProviderAdapter {
  return new DeepSeekProviderAdapter(config);
}

// Default export for direct import
export default createAdapter;
