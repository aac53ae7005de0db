/**
 * @module @llmverify/adapters-openai
 * OpenAI provider adapter for the verification engine.
 *
 * Implements IProviderAdapter from @llmverify/core and exports the
 * chat-completions wire helpers reused by other OpenAI-compatible adapters.
 *
 * @example
 * ```typescript
 * import { createAdapter } from '@llmverify/adapters-openai';
 *
 * registry.register(createAdapter());
 * // OpenAI-compatible gateway under its own name
 * registry.register(createAdapter({ name: 'groq' }));
 * ```
 */

export { manifest } from './manifest.js';
export {
  OpenAIProviderAdapter,
  type OpenAIAdapterConfig,
  OPENAI_MAX_TOKENS,
  OPENAI_CODE_TEMPERATURE,
} from './provider.js';
export { EMBEDDING_MODELS, inferModel, discoverOpenAIModels } from './discovery.js';
export {
  type OpenAIWireSupport,
  parseResetValue,
  chatCompletionBody,
  buildOpenAIExchange,
  decodeChatChunk,
  checkEmbedding,
  checkOpenAIFeature,
} from './wire.js';

import { OpenAIProviderAdapter, type OpenAIAdapterConfig } from './provider.js';

/**
 * Create the OpenAI provider adapter.
 * This is the factory the engine bootstrap calls for built-in adapters.
 */
export function createAdapter(config?: OpenAIAdapterConfig): OpenAIProviderAdapter {
  return new OpenAIProviderAdapter(config);
}

// Default export for direct import
export default createAdapter;
