import { vi } from 'vitest';
import { createAdapter as createOpenAIAdapter } from '@llmverify/adapters-openai';
import type { IProviderAdapter, ProviderConfig } from '@llmverify/core';
import { AdapterRegistry } from '../registry.js';

export const BASE_URL = 'https://synthetic.test/v1';

export const synthetic: ProviderConfig = {
  name: 'synthetic',
  baseURL: BASE_URL,
  credential: 'test-secret',
};

export interface RecordedRequest {
  method: string;
  url: string;
  headers: Record<string, string>;
  body: unknown;
}

export type Route = (request: RecordedRequest) => Response | Promise<Response>;

function urlOf(input: string | URL | Request): string {
  if (typeof input === 'string') return input;
  return input instanceof URL ? input.href : input.url;
}

function headersOf(init: RequestInit | undefined): Record<string, string> {
  const headers = new Headers(init?.headers);
  return Object.fromEntries(headers.entries());
}

/**
 * fetch stand-in answering every request through `route`.
 */
export function fakeFetch(route: Route) {
  return vi.fn(async (input: string | URL | Request, init?: RequestInit) =>
    route({
      method: init?.method ?? 'GET',
      url: urlOf(input),
      headers: headersOf(init),
      body: typeof init?.body === 'string' ? JSON.parse(init.body) : undefined,
    }),
  );
}

export function jsonResponse(body: unknown, init: ResponseInit = {}): Response {
  const headers = new Headers(init.headers);
  headers.set('content-type', 'application/json');
  return new Response(JSON.stringify(body), { ...init, headers });
}

/**
 * An event-stream response carrying one `data:` line per payload.
 */
export function sseResponse(payloads: string[], init: ResponseInit = {}): Response {
  const headers = new Headers(init.headers);
  headers.set('content-type', 'text/event-stream');
  return new Response(payloads.map((payload) => `data: ${payload}\n\n`).join(''), { ...init, headers });
}

export const contentChunk = (content: string): string => JSON.stringify({ choices: [{ delta: { content } }] });

export const TOOL_CALL_ANSWER = {
  choices: [{ message: { tool_calls: [{ function: { name: 'get_weather', arguments: '{"city":"Paris"}' } }] } }],
};

function isStreamRequest(body: unknown): boolean {
  return typeof body === 'object' && body !== null && 'stream' in body && body.stream === true;
}

/**
 * Routes of a provider whose model `m1` answers every probe successfully.
 */
export function healthyProvider(overrides: Partial<Record<'existence' | 'transport' | 'chat' | 'stream', Route>> = {}): Route {
  return (request) => {
    if (request.method === 'GET' && request.url === `${BASE_URL}/models/m1`) {
      return overrides.existence?.(request) ?? jsonResponse({ id: 'm1', object: 'model' });
    }
    if (request.method === 'GET' && request.url === `${BASE_URL}/models`) {
      return overrides.transport?.(request) ?? jsonResponse({ data: [] }, { headers: { 'content-encoding': 'br' } });
    }
    if (request.method === 'POST' && request.url === `${BASE_URL}/chat/completions`) {
      if (isStreamRequest(request.body)) {
        return overrides.stream?.(request) ?? sseResponse([contentChunk('pong'), '[DONE]']);
      }
      return overrides.chat?.(request) ?? jsonResponse(TOOL_CALL_ANSWER);
    }
    return jsonResponse({ error: { message: `no route for ${request.method} ${request.url}` } }, { status: 404 });
  };
}

/**
 * Clock returning `values` in order, then repeating the last one.
 */
export function sequenceClock(values: number[]): () => number {
  let index = 0;
  return () => {
    const value = values[Math.min(index, values.length - 1)] ?? 0;
    index += 1;
    return value;
  };
}

export function syntheticRegistry(): AdapterRegistry {
  const registry = new AdapterRegistry();
  registry.register(createOpenAIAdapter({ name: 'synthetic' }));
  return registry;
}

/**
 * Adapter answering like the OpenAI adapter under the name "synthetic", with
 * selected members replaced. Discovery is absent unless given.
 */
export function syntheticAdapter(overrides: Partial<IProviderAdapter> = {}): IProviderAdapter {
  const base = createOpenAIAdapter({ name: 'synthetic' });
  return {
    manifest: base.manifest,
    name: () => base.name(),
    optimize: (request) => base.optimize(request),
    parseStream: (body) => base.parseStream(body),
    classifyError: (status, body) => base.classifyError(status, body),
    optimalBatchSize: () => base.optimalBatchSize(),
    rateLimitInfo: (headers) => base.rateLimitInfo(headers),
    buildExchange: (kind, target, request) => base.buildExchange(kind, target, request),
    checkFeature: (kind, payload, expectedDimensions) => base.checkFeature(kind, payload, expectedDimensions),
    ...overrides,
  };
}
