/**
 * @module @llmverify/adapters-openai/discovery
 * Model discovery through the OpenAI SDK.
 */

import OpenAI from 'openai';
import type { ModelFeatures, ModelInfo, ProbeTarget } from '@llmverify/core';

/**
 * Known OpenAI embedding models and their dimensions.
 */
export const EMBEDDING_MODELS: Readonly<Record<string, number>> = {
  'text-embedding-3-small': 1536,
  'text-embedding-3-large': 3072,
  'text-embedding-ada-002': 1536,
};

const CHAT_MODEL = /^(gpt-|o\d|chatgpt-|deepseek-)/;
const VISION_MODEL = /(gpt-4o|gpt-4\.1|gpt-4-turbo|vision|^o[134])/;
const NO_TOOLS = /(instruct|audio|realtime|search|transcribe|tts|reasoner)/;
const NOT_STREAMING = /(dall-e|whisper|tts|moderation|embedding)/;

/**
 * Infer feature flags from a model id.
 */
export function inferModel(id: string): { features: ModelFeatures; embeddingDimensions?: number } {
  if (id.includes('embedding')) {
    const embeddingDimensions = EMBEDDING_MODELS[id];
    return {
      features: { streaming: false, functionCalling: false, vision: false, embeddings: true },
      ...(embeddingDimensions !== undefined ? { embeddingDimensions } : {}),
    };
  }
  const chat = CHAT_MODEL.test(id);
  return {
    features: {
      streaming: !NOT_STREAMING.test(id),
      functionCalling: chat && !NO_TOOLS.test(id),
      vision: chat && VISION_MODEL.test(id),
      embeddings: false,
    },
  };
}

/**
 * List models of an OpenAI-compatible provider.
 */
export async function discoverOpenAIModels(target: Omit<ProbeTarget, 'model'>): Promise<ModelInfo[]> {
  const client = new OpenAI({
    apiKey: target.credential,
    baseURL: target.provider.baseURL,
  });

  const models: ModelInfo[] = [];
  for await (const model of client.models.list()) {
    models.push({ id: model.id, provider: target.provider.name, ...inferModel(model.id) });
  }
  return models.sort((a, b) => a.id.localeCompare(b.id));
}
