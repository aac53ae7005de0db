/**
 * @module @llmverify/adapters-deepseek/provider
 * DeepSeek implementation of IProviderAdapter.
 *
 * DeepSeek speaks the chat-completions wire format, so request shaping and
 * stream decoding come from the OpenAI adapter's wire helpers. It differs in
 * its defaults, its rate-limit headers and its lower concurrency ceiling.
 */

import {
  classifyHttpError,
  extractNestedError,
  parseDataStream,
  promptMentions,
  readIntHeader,
  type ChatRequest,
  type FeatureCheck,
  type FeatureProbeKind,
  type HttpExchange,
  type IProviderAdapter,
  type ModelInfo,
  type ProbeKind,
  type ProbeTarget,
  type RateLimitInfo,
  type StreamingChunk,
  type TaxonomyError,
} from '@llmverify/core';
import {
  buildOpenAIExchange,
  checkOpenAIFeature,
  decodeChatChunk,
  discoverOpenAIModels,
} from '@llmverify/adapters-openai';
import { manifest } from './manifest.js';

export interface DeepSeekAdapterConfig {
  /** Registry name (defaults to "deepseek") */
  name?: string;
}

export const DEEPSEEK_MAX_TOKENS = 4096;
/** DeepSeek does better with a warmer temperature on creative prompts */
export const DEEPSEEK_CREATIVE_TEMPERATURE = 0.8;

export class DeepSeekProviderAdapter implements IProviderAdapter {
  readonly manifest = manifest;
  private readonly providerName: string;

  constructor(config: DeepSeekAdapterConfig = {}) {
    this.providerName = config.name ?? 'deepseek';
  }

  name(): string {
    return this.providerName;
  }

  optimize(request: ChatRequest): ChatRequest {
    const temperature =
      request.temperature ??
      (promptMentions(request, ['creative', 'write']) ? DEEPSEEK_CREATIVE_TEMPERATURE : undefined);

    return {
      ...request,
      maxTokens: request.maxTokens ?? DEEPSEEK_MAX_TOKENS,
      ...(temperature !== undefined ? { temperature } : {}),
    };
  }

  /**
   * Same payload path as OpenAI. A body that ends without `[DONE]` still
   * gets a terminal chunk.
   */
  parseStream(body: ReadableStream<Uint8Array>): AsyncGenerator<StreamingChunk, void, undefined> {
    return parseDataStream(body, decodeChatChunk, { finishOnEof: true });
  }

  classifyError(status: number, body: string): TaxonomyError {
    return classifyHttpError(status, body, extractNestedError);
  }

  optimalBatchSize(): number {
    return 10;
  }

  rateLimitInfo(headers: Headers): RateLimitInfo {
    const info: RateLimitInfo = {};
    const requestsPerMinute = readIntHeader(headers, 'x-rpm-limit');
    const tokensPerMinute = readIntHeader(headers, 'x-tpm-limit');

    if (requestsPerMinute !== undefined) info.requestsPerMinute = requestsPerMinute;
    if (tokensPerMinute !== undefined) info.tokensPerMinute = tokensPerMinute;
    return info;
  }

  buildExchange(kind: ProbeKind, target: ProbeTarget, request: ChatRequest): HttpExchange | null {
    return buildOpenAIExchange(kind, target, request, { vision: false, embeddings: false });
  }

  checkFeature(kind: FeatureProbeKind, payload: unknown, expectedDimensions?: number): FeatureCheck {
    if (kind !== 'function_calling') {
      return { ok: false, reason: `${kind} is not served by ${this.providerName}` };
    }
    return checkOpenAIFeature(kind, payload, expectedDimensions);
  }

  async discoverModels(target: Omit<ProbeTarget, 'model'>): Promise<ModelInfo[]> {
    return discoverOpenAIModels(target);
  }
}
