/**
 * @module @llmverify/adapters-anthropic/manifest
 * Adapter manifest for the Anthropic provider.
 */

import type { AdapterManifest } from "@llmverify/core";

/**
 * Adapter manifest for the Anthropic provider.
 */
export const manifest: AdapterManifest = {
  manifestVersion: "1.0.0",
  id: "anthropic-provider",
  name: "Anthropic",
  version: "0.1.0",
  description: "Anthropic Messages API provider adapter (Claude models)",
  license: "MIT",
  type: "provider",
  implements: "IProviderAdapter",
  capabilities: {
    streaming: true,
    functionCalling: true,
    vision: true,
    embeddings: false,
    discovery: true,
  },
  configSchema: {
    baseURL: {
      type: "string",
      default: "https://api.anthropic.com/v1",
      description: "Messages API base URL",
    },
    credential: {
      type: "string",
      description: "API key, or env:VAR reference (e.g. env:ANTHROPIC_API_KEY)",
    },
    apiVersion: {
      type: "string",
      default: "2023-06-01",
      description: "anthropic-version header",
    },
    timeout: {
      type: "number",
      default: 30000,
      description: "Model-listing timeout in milliseconds",
    },
  },
};
