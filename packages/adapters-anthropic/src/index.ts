/**
 * @module @llmverify/adapters-anthropic
 * Anthropic provider adapter entry point.
 */

export {
  AnthropicProviderAdapter,
  type AnthropicAdapterConfig,
  ANTHROPIC_MAX_TOKENS,
  ANTHROPIC_CODE_TEMPERATURE,
  decodeMessageEvent,
} from "./provider.js";

export { manifest } from "./manifest.js";

import { AnthropicProviderAdapter, type AnthropicAdapterConfig } from "./provider.js";

export function createAdapter(config?: AnthropicAdapterConfig): AnthropicProviderAdapter {
  return new AnthropicProviderAdapter(config);
}

// Default export
export default createAdapter;
