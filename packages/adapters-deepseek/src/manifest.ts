/**
 * @module @llmverify/adapters-deepseek/manifest
 * Adapter manifest for the DeepSeek provider.
 */

import type { AdapterManifest } from "@llmverify/core";

export const manifest: AdapterManifest = {
  manifestVersion: "1.0.0",
  id: "deepseek-provider",
  name: "DeepSeek",
  version: "1.0.0",
  description: "DeepSeek chat provider adapter (OpenAI-compatible wire format, conservative concurrency)",
  license: "MIT",
  type: "provider",
  implements: "IProviderAdapter",
  capabilities: {
    streaming: true,
    functionCalling: true,
    vision: false,
    embeddings: false,
    discovery: true,
  },
  configSchema: {
    baseURL: {
      type: "string",
      default: "https://api.deepseek.com/v1",
      description: "API base URL",
    },
    credential: {
      type: "string",
      description: "API key, or env:VAR reference (e.g. env:DEEPSEEK_API_KEY)",
    },
  },
};
