/**
 * @module @llmverify/adapters-anthropic/provider
 * Anthropic Messages API implementation of IProviderAdapter.
 */

import { z } from "zod";
import {
  classifyHttpError,
  extractNestedError,
  parseDataStream,
  partsText,
  promptMentions,
  readIntHeader,
  transportError,
  trimBaseURL,
  withSystemPrompt,
  VerifierError,
  type ChatMessage,
  type ChatRequest,
  type DecodedEvent,
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
} from "@llmverify/core";
import { manifest } from "./manifest.js";

/**
 * Configuration for the Anthropic provider adapter.
 */
export interface AnthropicAdapterConfig {
  /** Registry name (defaults to "anthropic") */
  name?: string;
  /** API version header (defaults to 2023-06-01) */
  apiVersion?: string;
  /** Model-listing timeout in ms (defaults to 30000) */
  timeout?: number;
  /** fetch used for model discovery */
  fetchImpl?: typeof fetch;
}

export const ANTHROPIC_MAX_TOKENS = 1024;
export const ANTHROPIC_CODE_TEMPERATURE = 0.2;

/**
 * Messages API request format.
 */
interface AnthropicMessagesRequest {
  model: string;
  max_tokens: number;
  messages: Array<{
    role: "user" | "assistant";
    content:
      | string
      | Array<
          | { type: "text"; text: string }
          | { type: "image"; source: { type: "base64"; media_type: string; data: string } }
        >;
  }>;
  system?: string;
  temperature?: number;
  stream: boolean;
  tools?: Array<{
    name: string;
    description: string;
    input_schema: Record<string, unknown>;
  }>;
  tool_choice?: { type: "auto" } | { type: "any" };
}

const streamEventSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("content_block_delta"),
    delta: z.object({ type: z.string(), text: z.string().optional() }),
  }),
  z.object({ type: z.literal("message_stop") }),
  z.object({
    type: z.literal("error"),
    error: z.object({ type: z.string().optional(), message: z.string().optional() }),
  }),
]);

const KNOWN_EVENT = new Set(["content_block_delta", "message_stop", "error"]);

/**
 * Decode one Messages API stream event.
 * Text arrives in `content_block_delta`; `message_stop` ends the message.
 */
export function decodeMessageEvent(payload: unknown): DecodedEvent {
  const type =
    typeof payload === "object" && payload !== null && "type" in payload ? payload.type : undefined;
  if (typeof type !== "string" || !KNOWN_EVENT.has(type)) {
    // message_start, content_block_start/stop, message_delta, ping
    return { type: "ignore" };
  }

  const parsed = streamEventSchema.safeParse(payload);
  if (!parsed.success) {
    return { type: "error", message: `unexpected ${type} event` };
  }
  const event = parsed.data;
  switch (event.type) {
    case "content_block_delta":
      return { type: "content", content: event.delta.text ?? "" };
    case "message_stop":
      return { type: "finish" };
    case "error":
      return {
        type: "error",
        message: `${event.error.type ?? "error"}: ${event.error.message ?? "stream error"}`,
        terminal: true,
      };
  }
}

const messageResponseSchema = z.object({
  content: z.array(
    z.object({
      type: z.string(),
      text: z.string().optional(),
      name: z.string().optional(),
      input: z.unknown().optional(),
    }),
  ),
});

const modelListSchema = z.object({
  data: z.array(z.object({ id: z.string() })),
});

/**
 * Anthropic implementation of IProviderAdapter.
 */
export class AnthropicProviderAdapter implements IProviderAdapter {
  readonly manifest = manifest;
  private readonly providerName: string;
  private readonly apiVersion: string;
  private readonly timeout: number;
  private readonly fetchImpl: typeof fetch;

  constructor(config: AnthropicAdapterConfig = {}) {
    this.providerName = config.name ?? "anthropic";
    this.apiVersion = config.apiVersion ?? "2023-06-01";
    this.timeout = config.timeout ?? 30000;
    this.fetchImpl = config.fetchImpl ?? fetch;
  }

  name(): string {
    return this.providerName;
  }

  optimize(request: ChatRequest): ChatRequest {
    const temperature =
      request.temperature ??
      (promptMentions(request, ["code"]) ? ANTHROPIC_CODE_TEMPERATURE : undefined);

    return {
      ...request,
      messages: withSystemPrompt(request.messages),
      maxTokens: request.maxTokens ?? ANTHROPIC_MAX_TOKENS,
      ...(temperature !== undefined ? { temperature } : {}),
    };
  }

  parseStream(body: ReadableStream<Uint8Array>): AsyncGenerator<StreamingChunk, void, undefined> {
    return parseDataStream(body, decodeMessageEvent, { finishOnEof: false });
  }

  classifyError(status: number, body: string): TaxonomyError {
    return classifyHttpError(status, body, extractNestedError);
  }

  optimalBatchSize(): number {
    return 10;
  }

  rateLimitInfo(headers: Headers): RateLimitInfo {
    const info: RateLimitInfo = {};
    const requestsPerMinute = readIntHeader(headers, "anthropic-ratelimit-requests-limit");
    const tokensPerMinute = readIntHeader(headers, "anthropic-ratelimit-tokens-limit");
    const reset = headers.get("anthropic-ratelimit-requests-reset");
    const resetMs = reset ? Date.parse(reset) : Number.NaN;

    if (requestsPerMinute !== undefined) info.requestsPerMinute = requestsPerMinute;
    if (tokensPerMinute !== undefined) info.tokensPerMinute = tokensPerMinute;
    if (!Number.isNaN(resetMs)) info.resetAt = new Date(resetMs).toISOString();
    return info;
  }

  buildExchange(kind: ProbeKind, target: ProbeTarget, request: ChatRequest): HttpExchange | null {
    const base = trimBaseURL(target.provider.baseURL);
    const headers = {
      "x-api-key": target.credential,
      "anthropic-version": this.apiVersion,
    };

    switch (kind) {
      case "existence":
        return { method: "GET", url: `${base}/models/${encodeURIComponent(target.model)}`, headers };
      case "transport":
        return { method: "GET", url: `${base}/models`, headers };
      case "embeddings":
        return null;
      case "responsiveness":
      case "streaming":
      case "function_calling":
      case "vision":
        return {
          method: "POST",
          url: `${base}/messages`,
          headers: { ...headers, "Content-Type": "application/json" },
          body: { ...request.extra, ...this.buildMessagesRequest(kind, target.model, request) },
        };
    }
  }

  checkFeature(kind: FeatureProbeKind, payload: unknown): FeatureCheck {
    if (kind === "embeddings") {
      return { ok: false, reason: `embeddings are not served by ${this.providerName}` };
    }
    const parsed = messageResponseSchema.safeParse(payload);
    if (!parsed.success) {
      return { ok: false, reason: "unexpected response shape" };
    }
    const blocks = parsed.data.content;

    if (kind === "function_calling") {
      const call = blocks.find((block) => block.type === "tool_use" && block.name);
      if (!call || typeof call.input !== "object" || call.input === null) {
        return { ok: false, reason: "no tool_use block in response" };
      }
      return { ok: true };
    }

    const text = blocks
      .map((block) => (block.type === "text" ? block.text ?? "" : ""))
      .join("")
      .trim();
    return text ? { ok: true } : { ok: false, reason: "empty vision answer" };
  }

  /**
   * List models through GET /models.
   */
  async discoverModels(target: Omit<ProbeTarget, "model">): Promise<ModelInfo[]> {
    const base = trimBaseURL(target.provider.baseURL);
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    let response: Response;
    try {
      response = await this.fetchImpl(`${base}/models?limit=1000`, {
        headers: { "x-api-key": target.credential, "anthropic-version": this.apiVersion },
        signal: controller.signal,
      });
    } catch (error) {
      throw new VerifierError(
        transportError(error, controller.signal.aborted ? this.timeout : undefined),
      );
    } finally {
      clearTimeout(timeoutId);
    }

    const text = await response.text();
    if (!response.ok) {
      throw new VerifierError(this.classifyError(response.status, text));
    }

    let payload: unknown;
    try {
      payload = JSON.parse(text);
    } catch {
      throw new VerifierError({ kind: "parse", message: "model list is not valid JSON" });
    }
    const parsed = modelListSchema.safeParse(payload);
    if (!parsed.success) {
      throw new VerifierError({ kind: "parse", message: "unexpected model list shape" });
    }

    return parsed.data.data.map((model) => ({
      id: model.id,
      provider: target.provider.name,
      features: {
        streaming: true,
        functionCalling: !/claude-(2|instant)/.test(model.id),
        vision: !/claude-(2|instant)|claude-3-5-haiku/.test(model.id),
        embeddings: false,
      },
    }));
  }

  private buildMessagesRequest(
    kind: ProbeKind,
    model: string,
    request: ChatRequest,
  ): AnthropicMessagesRequest {
    const system = request.messages
      .filter((m) => m.role === "system")
      .map((m) => (typeof m.content === "string" ? m.content : partsText(m.content)))
      .join("\n");

    const body: AnthropicMessagesRequest = {
      model,
      max_tokens: request.maxTokens ?? ANTHROPIC_MAX_TOKENS,
      messages: request.messages.filter(isConversational).map(toAnthropicMessage),
      stream: request.stream ?? (kind === "responsiveness" || kind === "streaming"),
    };

    if (system) {
      body.system = system;
    }
    if (request.temperature !== undefined) {
      body.temperature = request.temperature;
    }
    if (request.tools && request.tools.length > 0) {
      body.tools = request.tools.map((tool) => ({
        name: tool.name,
        description: tool.description,
        input_schema: tool.parameters,
      }));
      body.tool_choice = { type: "auto" };
    }
    return body;
  }
}

function isConversational(
  message: ChatMessage,
): message is ChatMessage & { role: "user" | "assistant" } {
  return message.role !== "system";
}

function toAnthropicMessage(
  message: ChatMessage & { role: "user" | "assistant" },
): AnthropicMessagesRequest["messages"][number] {
  if (typeof message.content === "string") {
    return { role: message.role, content: message.content };
  }
  return {
    role: message.role,
    content: message.content.map((part) =>
      part.type === "text"
        ? { type: "text" as const, text: part.text }
        : {
            type: "image" as const,
            source: { type: "base64" as const, media_type: part.mediaType, data: part.data },
          },
    ),
  };
}
