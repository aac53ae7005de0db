import { describe, it, expect, vi } from "vitest";
import {
  DEFAULT_SYSTEM_PROMPT,
  textStream,
  VerifierError,
  type ProbeTarget,
  type StreamingChunk,
} from "@llmverify/core";
import { createAdapter } from "./index.js";

const target: ProbeTarget = {
  provider: { name: "anthropic", baseURL: "https://api.anthropic.com/v1" },
  model: "claude-sonnet-4-20250514",
  credential: "test-secret",
};

async function collect(stream: AsyncIterable<StreamingChunk>): Promise<StreamingChunk[]> {
  const chunks: StreamingChunk[] = [];
  for await (const chunk of stream) {
    chunks.push(chunk);
  }
  return chunks;
}

function sse(event: string, data: unknown): string {
  return `event: ${event}\ndata: ${JSON.stringify(data)}\n\n`;
}

describe("AnthropicProviderAdapter", () => {
  const adapter = createAdapter();

  it("optimizes code prompts and moves the system prompt to the system field", () => {
    const optimized = adapter.optimize({ messages: [{ role: "user", content: "Review this code" }] });
    const exchange = adapter.buildExchange("streaming", target, optimized);

    expect(optimized.temperature).toBe(0.2);
    expect(optimized.maxTokens).toBe(1024);
    expect(exchange).toEqual({
      method: "POST",
      url: "https://api.anthropic.com/v1/messages",
      headers: {
        "x-api-key": "test-secret",
        "anthropic-version": "2023-06-01",
        "Content-Type": "application/json",
      },
      body: {
        model: "claude-sonnet-4-20250514",
        max_tokens: 1024,
        messages: [{ role: "user", content: "Review this code" }],
        system: DEFAULT_SYSTEM_PROMPT,
        temperature: 0.2,
        stream: true,
      },
    });
  });

  it("keeps explicit temperature and max tokens", () => {
    const optimized = adapter.optimize({
      messages: [{ role: "user", content: "code" }],
      temperature: 1,
      maxTokens: 10,
    });

    expect(optimized.temperature).toBe(1);
    expect(optimized.maxTokens).toBe(10);
  });

  it("reads text deltas until message_stop", async () => {
    const body = textStream([
      sse("message_start", { type: "message_start", message: { id: "msg_1" } }),
      sse("content_block_delta", { type: "content_block_delta", index: 0, delta: { type: "text_delta", text: "Hel" } }),
      sse("ping", { type: "ping" }),
      sse("content_block_delta", { type: "content_block_delta", index: 0, delta: { type: "text_delta", text: "lo" } }),
      sse("message_stop", { type: "message_stop" }),
      sse("content_block_delta", { type: "content_block_delta", index: 0, delta: { type: "text_delta", text: "late" } }),
    ]);

    expect(await collect(adapter.parseStream(body))).toEqual([
      { content: "Hel", finish: false },
      { content: "lo", finish: false },
      { content: "", finish: true },
    ]);
  });

  it("turns an error event into a terminal error chunk", async () => {
    const body = textStream([
      sse("error", { type: "error", error: { type: "overloaded_error", message: "Overloaded" } }),
      sse("message_stop", { type: "message_stop" }),
    ]);

    expect(await collect(adapter.parseStream(body))).toEqual([
      { content: "", finish: false, error: "overloaded_error: Overloaded" },
    ]);
  });

  it("classifies nested error bodies", () => {
    const body = JSON.stringify({ type: "error", error: { type: "rate_limit_error", message: "slow down" } });
    const error = adapter.classifyError(429, body);

    expect(error.kind).toBe("rate_limited");
    expect(error.providerType).toBe("rate_limit_error");
    expect(error.message).toBe("rate limit exceeded: slow down");
  });

  it("reads anthropic rate-limit headers with an RFC 3339 reset", () => {
    const info = adapter.rateLimitInfo(
      new Headers({
        "anthropic-ratelimit-requests-limit": "50",
        "anthropic-ratelimit-tokens-limit": "40000",
        "anthropic-ratelimit-requests-reset": "2024-05-01T12:00:00Z",
      }),
    );

    expect(info).toEqual({
      requestsPerMinute: 50,
      tokensPerMinute: 40000,
      resetAt: "2024-05-01T12:00:00.000Z",
    });
    expect(adapter.rateLimitInfo(new Headers({ "anthropic-ratelimit-requests-reset": "later" }))).toEqual({});
  });

  it("maps tools and images onto the Messages format", () => {
    const exchange = adapter.buildExchange("function_calling", target, {
      messages: [
        {
          role: "user",
          content: [
            { type: "text", text: "look" },
            { type: "image", mediaType: "image/png", data: "AAAA" },
          ],
        },
      ],
      tools: [{ name: "lookup", description: "Lookup", parameters: { type: "object" } }],
    });

    expect(exchange?.body).toEqual({
      model: "claude-sonnet-4-20250514",
      max_tokens: 1024,
      messages: [
        {
          role: "user",
          content: [
            { type: "text", text: "look" },
            { type: "image", source: { type: "base64", media_type: "image/png", data: "AAAA" } },
          ],
        },
      ],
      tools: [{ name: "lookup", description: "Lookup", input_schema: { type: "object" } }],
      tool_choice: { type: "auto" },
      stream: false,
    });
    expect(adapter.buildExchange("embeddings", target, { messages: [] })).toBeNull();
  });

  it("checks tool_use blocks and vision answers", () => {
    expect(
      adapter.checkFeature("function_calling", {
        content: [{ type: "tool_use", id: "t1", name: "lookup", input: { q: "x" } }],
      }),
    ).toEqual({ ok: true });
    expect(adapter.checkFeature("function_calling", { content: [{ type: "text", text: "no" }] })).toEqual({
      ok: false,
      reason: "no tool_use block in response",
    });
    expect(adapter.checkFeature("vision", { content: [{ type: "text", text: "A red square" }] })).toEqual({
      ok: true,
    });
    expect(adapter.checkFeature("embeddings", {})).toEqual({
      ok: false,
      reason: "embeddings are not served by anthropic",
    });
  });

  describe("discoverModels", () => {
    it("lists models through GET /models", async () => {
      const fetchImpl = vi.fn(async () =>
        new Response(
          JSON.stringify({ data: [{ id: "claude-3-5-haiku-20241022" }, { id: "claude-sonnet-4-20250514" }] }),
          { status: 200 },
        ),
      );
      const models = await createAdapter({ fetchImpl }).discoverModels({
        provider: target.provider,
        credential: "test-secret",
      });

      expect(fetchImpl).toHaveBeenCalledTimes(1);
      expect(models).toEqual([
        {
          id: "claude-3-5-haiku-20241022",
          provider: "anthropic",
          features: { streaming: true, functionCalling: true, vision: false, embeddings: false },
        },
        {
          id: "claude-sonnet-4-20250514",
          provider: "anthropic",
          features: { streaming: true, functionCalling: true, vision: true, embeddings: false },
        },
      ]);
    });

    it("rejects with a classified error on failure", async () => {
      const fetchImpl = vi.fn(async () => new Response('{"error":{"message":"bad key"}}', { status: 401 }));
      const discovery = createAdapter({ fetchImpl }).discoverModels({
        provider: target.provider,
        credential: "test-secret",
      });

      await expect(discovery).rejects.toBeInstanceOf(VerifierError);
      await expect(discovery).rejects.toMatchObject({ taxonomy: { kind: "unauthorized" } });
    });
  });
});
