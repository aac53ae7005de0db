/**
 * @module @llmverify/adapters-openai/manifest
 * Adapter manifest for the OpenAI provider.
 */

import type { AdapterManifest } from "@llmverify/core";

/**
 * Adapter manifest for the OpenAI provider.
 */
export const manifest: AdapterManifest = {
  manifestVersion: "1.0.0",
  id: "openai-provider",
  name: "OpenAI",
  version: "1.0.0",
  description: "OpenAI chat-completions provider adapter (GPT-4o, o-series, embeddings)",
  license: "MIT",
  type: "provider",
  implements: "IProviderAdapter",
  capabilities: {
    streaming: true,
    functionCalling: true,
    vision: true,
    embeddings: true,
    discovery: true,
  },
  configSchema: {
    name: {
      type: "string",
      default: "openai",
      description: "Registry name (reuse for OpenAI-compatible gateways)",
    },
    baseURL: {
      type: "string",
      default: "https://api.openai.com/v1",
      description: "API base URL",
    },
    credential: {
      type: "string",
      description: "API key, or env:VAR reference (e.g. env:OPENAI_API_KEY)",
    },
  },
};
