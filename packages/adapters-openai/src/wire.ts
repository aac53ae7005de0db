/**
 * @module @llmverify/adapters-openai/wire
 * Chat-completions wire format shared by OpenAI-compatible providers.
 */

import { z } from 'zod';
import {
  messageText,
  trimBaseURL,
  type ChatMessage,
  type ChatRequest,
  type DecodedEvent,
  type FeatureCheck,
  type FeatureProbeKind,
  type HttpExchange,
  type ProbeKind,
  type ProbeTarget,
} from '@llmverify/core';

/**
 * Endpoints a given OpenAI-compatible provider actually serves.
 */
export interface OpenAIWireSupport {
  vision: boolean;
  embeddings: boolean;
}

// ═══════════════════════════════════════════════════════════════════════
// Rate-limit headers
// ═══════════════════════════════════════════════════════════════════════

const DURATION = /^(?:\d+(?:\.\d+)?(?:ms|h|m|s))+$/;
const DURATION_PART = /(\d+(?:\.\d+)?)(ms|h|m|s)/g;

function unitMs(unit: string): number {
  switch (unit) {
    case 'h':
      return 3_600_000;
    case 'm':
      return 60_000;
    case 's':
      return 1_000;
    default:
      return 1;
  }
}

/**
 * Parse a reset header given either as unix seconds or as a duration such
 * as `6m0s` / `1.5s` / `20ms`, relative to `now`.
 */
export function parseResetValue(raw: string | null, now: number): Date | undefined {
  const value = raw?.trim();
  if (!value) {
    return undefined;
  }
  if (/^\d+$/.test(value)) {
    return new Date(Number.parseInt(value, 10) * 1000);
  }
  if (!DURATION.test(value)) {
    return undefined;
  }
  let total = 0;
  for (const match of value.matchAll(DURATION_PART)) {
    const amount = match[1];
    const unit = match[2];
    if (amount !== undefined && unit !== undefined) {
      total += Number.parseFloat(amount) * unitMs(unit);
    }
  }
  return new Date(now + total);
}

// ═══════════════════════════════════════════════════════════════════════
// Exchanges
// ═══════════════════════════════════════════════════════════════════════

type OpenAIContentPart =
  | { type: 'text'; text: string }
  | { type: 'image_url'; image_url: { url: string } };

function toOpenAIMessage(message: ChatMessage): { role: string; content: string | OpenAIContentPart[] } {
  if (typeof message.content === 'string') {
    return { role: message.role, content: message.content };
  }
  return {
    role: message.role,
    content: message.content.map((part): OpenAIContentPart =>
      part.type === 'text'
        ? { type: 'text', text: part.text }
        : { type: 'image_url', image_url: { url: `data:${part.mediaType};base64,${part.data}` } },
    ),
  };
}

function isStreamingKind(kind: ProbeKind): boolean {
  return kind === 'responsiveness' || kind === 'streaming';
}

/**
 * Chat-completions body in the canonical shape:
 * `{ model, messages, max_tokens, temperature, stream, tools? }`.
 */
export function chatCompletionBody(
  kind: ProbeKind,
  target: ProbeTarget,
  request: ChatRequest,
): Record<string, unknown> {
  const tools = request.tools ?? [];
  return {
    ...request.extra,
    model: target.model,
    messages: request.messages.map(toOpenAIMessage),
    ...(request.maxTokens !== undefined ? { max_tokens: request.maxTokens } : {}),
    ...(request.temperature !== undefined ? { temperature: request.temperature } : {}),
    ...(tools.length > 0
      ? {
          tools: tools.map((tool) => ({
            type: 'function',
            function: { name: tool.name, description: tool.description, parameters: tool.parameters },
          })),
          tool_choice: 'auto',
        }
      : {}),
    stream: request.stream ?? isStreamingKind(kind),
  };
}

/**
 * Shape the HTTP exchange for a probe kind against an OpenAI-compatible API.
 */
export function buildOpenAIExchange(
  kind: ProbeKind,
  target: ProbeTarget,
  request: ChatRequest,
  support: OpenAIWireSupport,
): HttpExchange | null {
  const base = trimBaseURL(target.provider.baseURL);
  const auth = { Authorization: `Bearer ${target.credential}` };
  const json = { ...auth, 'Content-Type': 'application/json' };

  switch (kind) {
    case 'existence':
      return { method: 'GET', url: `${base}/models/${encodeURIComponent(target.model)}`, headers: auth };
    case 'transport':
      return { method: 'GET', url: `${base}/models`, headers: auth };
    case 'embeddings': {
      if (!support.embeddings) {
        return null;
      }
      const input = request.messages.map(messageText).join('\n');
      return { method: 'POST', url: `${base}/embeddings`, headers: json, body: { model: target.model, input } };
    }
    case 'vision':
      if (!support.vision) {
        return null;
      }
      return { method: 'POST', url: `${base}/chat/completions`, headers: json, body: chatCompletionBody(kind, target, request) };
    case 'responsiveness':
    case 'streaming':
    case 'function_calling':
      return { method: 'POST', url: `${base}/chat/completions`, headers: json, body: chatCompletionBody(kind, target, request) };
  }
}

// ═══════════════════════════════════════════════════════════════════════
// Responses
// ═══════════════════════════════════════════════════════════════════════

const streamChunkSchema = z.object({
  choices: z
    .array(
      z.object({
        delta: z.object({ content: z.string().nullish() }).nullish(),
        finish_reason: z.string().nullish(),
      }),
    )
    .default([]),
  error: z.object({ message: z.string().optional(), type: z.string().optional() }).optional(),
});

/**
 * Decode one chat-completions stream payload.
 * A non-empty `finish_reason` terminates the stream.
 */
export function decodeChatChunk(payload: unknown): DecodedEvent {
  const parsed = streamChunkSchema.safeParse(payload);
  if (!parsed.success) {
    return { type: 'error', message: `unexpected chunk shape: ${parsed.error.issues[0]?.message ?? 'invalid'}` };
  }
  const { choices, error } = parsed.data;
  if (error) {
    return { type: 'error', message: error.message ?? error.type ?? 'stream error', terminal: true };
  }
  const choice = choices[0];
  if (!choice) {
    return { type: 'ignore' };
  }
  const content = choice.delta?.content ?? '';
  if (choice.finish_reason) {
    return { type: 'finish', content };
  }
  return { type: 'content', content };
}

const toolCallResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          tool_calls: z
            .array(z.object({ function: z.object({ name: z.string().min(1), arguments: z.string() }) }))
            .min(1),
        }),
      }),
    )
    .min(1),
});

const chatAnswerSchema = z.object({
  choices: z.array(z.object({ message: z.object({ content: z.string().nullish() }) })).min(1),
});

const embeddingResponseSchema = z.object({
  data: z.array(z.object({ embedding: z.array(z.number()) })).min(1),
});

function isJsonObject(text: string): boolean {
  try {
    const value: unknown = JSON.parse(text);
    return typeof value === 'object' && value !== null;
  } catch {
    return false;
  }
}

/**
 * Check an embedding vector against the expected dimensionality.
 */
export function checkEmbedding(vector: readonly number[], expectedDimensions?: number): FeatureCheck {
  if (vector.length === 0) {
    return { ok: false, reason: 'empty embedding vector' };
  }
  if (expectedDimensions !== undefined && vector.length !== expectedDimensions) {
    return { ok: false, reason: `expected ${expectedDimensions} dimensions, got ${vector.length}` };
  }
  return { ok: true };
}

/**
 * Validate a non-streaming feature response from an OpenAI-compatible API.
 */
export function checkOpenAIFeature(
  kind: FeatureProbeKind,
  payload: unknown,
  expectedDimensions?: number,
): FeatureCheck {
  switch (kind) {
    case 'function_calling': {
      const parsed = toolCallResponseSchema.safeParse(payload);
      if (!parsed.success) {
        return { ok: false, reason: 'no tool call in response' };
      }
      const call = parsed.data.choices[0]?.message.tool_calls[0];
      if (!call || !isJsonObject(call.function.arguments)) {
        return { ok: false, reason: 'tool call arguments are not a JSON object' };
      }
      return { ok: true };
    }
    case 'vision': {
      const parsed = chatAnswerSchema.safeParse(payload);
      const answer = parsed.success ? parsed.data.choices[0]?.message.content?.trim() : undefined;
      return answer ? { ok: true } : { ok: false, reason: 'empty vision answer' };
    }
    case 'embeddings': {
      const parsed = embeddingResponseSchema.safeParse(payload);
      const vector = parsed.success ? parsed.data.data[0]?.embedding : undefined;
      if (!vector) {
        return { ok: false, reason: 'no embedding vector in response' };
      }
      return checkEmbedding(vector, expectedDimensions);
    }
  }
}
