/**
 * @module @llmverify/adapters-openai/provider
 * OpenAI implementation of IProviderAdapter.
 */

import {
  classifyHttpError,
  extractNestedError,
  parseDataStream,
  promptMentions,
  readIntHeader,
  withSystemPrompt,
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
import { manifest } from './manifest.js';
import { discoverOpenAIModels } from './discovery.js';
import {
  buildOpenAIExchange,
  checkOpenAIFeature,
  decodeChatChunk,
  parseResetValue,
} from './wire.js';

/**
 * Configuration for the OpenAI provider adapter.
 */
export interface OpenAIAdapterConfig {
  /** Registry name (defaults to "openai"); OpenAI-compatible gateways can reuse the adapter */
  name?: string;
  /** Clock used to resolve duration-style reset headers */
  now?: () => number;
}

/** Default completion ceiling when the caller sets none */
export const OPENAI_MAX_TOKENS = 2048;
/** Temperature applied to code-oriented prompts */
export const OPENAI_CODE_TEMPERATURE = 0.1;

/**
 * OpenAI implementation of IProviderAdapter.
 */
export class OpenAIProviderAdapter implements IProviderAdapter {
  readonly manifest = manifest;
  private readonly providerName: string;
  private readonly now: () => number;

  constructor(config: OpenAIAdapterConfig = {}) {
    this.providerName = config.name ?? 'openai';
    this.now = config.now ?? Date.now;
  }

  name(): string {
    return this.providerName;
  }

  optimize(request: ChatRequest): ChatRequest {
    const temperature =
      request.temperature ?? (promptMentions(request, ['code']) ? OPENAI_CODE_TEMPERATURE : undefined);

    return {
      ...request,
      messages: withSystemPrompt(request.messages),
      maxTokens: request.maxTokens ?? OPENAI_MAX_TOKENS,
      ...(temperature !== undefined ? { temperature } : {}),
    };
  }

  parseStream(body: ReadableStream<Uint8Array>): AsyncGenerator<StreamingChunk, void, undefined> {
    return parseDataStream(body, decodeChatChunk, { finishOnEof: false });
  }

  classifyError(status: number, body: string): TaxonomyError {
    return classifyHttpError(status, body, extractNestedError);
  }

  optimalBatchSize(): number {
    return 20; // the API tolerates more, 20 stays clear of per-key limits
  }

  rateLimitInfo(headers: Headers): RateLimitInfo {
    const info: RateLimitInfo = {};
    const requestsPerMinute = readIntHeader(headers, 'x-ratelimit-limit-requests');
    const tokensPerMinute = readIntHeader(headers, 'x-ratelimit-limit-tokens');
    const resetTime = parseResetValue(headers.get('x-ratelimit-reset-requests'), this.now());

    if (requestsPerMinute !== undefined) info.requestsPerMinute = requestsPerMinute;
    if (tokensPerMinute !== undefined) info.tokensPerMinute = tokensPerMinute;
    if (resetTime !== undefined) info.resetAt = resetTime.toISOString();
    return info;
  }

  buildExchange(kind: ProbeKind, target: ProbeTarget, request: ChatRequest): HttpExchange | null {
    return buildOpenAIExchange(kind, target, request, { vision: true, embeddings: true });
  }

  checkFeature(kind: FeatureProbeKind, payload: unknown, expectedDimensions?: number): FeatureCheck {
    return checkOpenAIFeature(kind, payload, expectedDimensions);
  }

  async discoverModels(target: Omit<ProbeTarget, 'model'>): Promise<ModelInfo[]> {
    return discoverOpenAIModels(target);
  }
}
