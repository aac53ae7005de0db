/**
 * @module @llmverify/verifier/probe-client
 * Issues single probes against provider endpoints and measures them.
 *
 * @example
 * ```typescript
 * const client = new ProbeClient({}, { registry, logger });
 * const result = await client.probe({
 *   provider: { name: 'openai', baseURL: 'https://api.openai.com/v1' },
 *   model: 'gpt-4o',
 *   credential: process.env.OPENAI_API_KEY ?? '',
 *   kind: 'existence',
 *   timeoutMs: 30000,
 * });
 * ```
 */

import { performance } from 'node:perf_hooks';
import { NoopLogger, transportError, truncate } from '@llmverify/core';
import type {
  FeatureProbeKind,
  HttpExchange,
  ILogger,
  IProviderAdapter,
  ProbeRequest,
  ProbeResult,
  RateLimitInfo,
  TaxonomyError,
} from '@llmverify/core';
import type { AdapterRegistry } from './registry.js';
import { defaultPayload } from './probe-payloads.js';

export interface ProbeClientConfig {
  /** Responsiveness fails when the first content chunk takes longer (default: 10000) */
  ttftCeilingMs?: number;
  /** Responsiveness fails when the whole answer takes longer (default: 60000) */
  totalCeilingMs?: number;
  /** Encodings that make the transport probe pass (default: ['br']) */
  transportEncodings?: string[];
  fetchImpl?: typeof fetch;
  /** Monotonic clock used for latency and TTFT */
  now?: () => number;
  /** Wall clock used for `completedAt` */
  wallClock?: () => number;
}

export interface ProbeClientDeps {
  registry: AdapterRegistry;
  logger?: ILogger;
}

/** Sent with the transport probe */
export const PROBE_ACCEPT_ENCODING = 'br, gzip';

type Outcome = Omit<ProbeResult, 'kind' | 'provider' | 'model' | 'completedAt'>;

/**
 * Runs one probe per call and resolves with its ProbeResult. Every failure,
 * from an unknown adapter to a dropped connection, becomes a failed result;
 * `probe` never rejects.
 */
export class ProbeClient {
  private readonly registry: AdapterRegistry;
  private readonly logger: ILogger;
  private readonly ttftCeilingMs: number;
  private readonly totalCeilingMs: number;
  private readonly transportEncodings: ReadonlySet<string>;
  private readonly fetchImpl: typeof fetch;
  private readonly now: () => number;
  private readonly wallClock: () => number;
  private readonly inFlight = new Map<string, Promise<ProbeResult>>();

  constructor(config: ProbeClientConfig, deps: ProbeClientDeps) {
    this.registry = deps.registry;
    this.logger = (deps.logger ?? new NoopLogger()).child({ component: 'probe-client' });
    this.ttftCeilingMs = config.ttftCeilingMs ?? 10_000;
    this.totalCeilingMs = config.totalCeilingMs ?? 60_000;
    this.transportEncodings = new Set((config.transportEncodings ?? ['br']).map((e) => e.trim().toLowerCase()));
    this.fetchImpl = config.fetchImpl ?? fetch;
    this.now = config.now ?? (() => performance.now());
    this.wallClock = config.wallClock ?? (() => Date.now());
  }

  /**
   * Probe one (provider, model, kind). Identical probes already running are
   * joined rather than repeated.
   */
  probe(request: ProbeRequest): Promise<ProbeResult> {
    const key = `${request.provider.name.toLowerCase()}:${request.model}:${request.kind}`;
    const running = this.inFlight.get(key);
    if (running) {
      return running;
    }

    const task = this.run(request).finally(() => {
      this.inFlight.delete(key);
    });
    this.inFlight.set(key, task);
    return task;
  }

  /** Probes currently running, for testing/debugging */
  get inFlightCount(): number {
    return this.inFlight.size;
  }

  private async run(request: ProbeRequest): Promise<ProbeResult> {
    const adapterName = request.provider.adapter ?? request.provider.name;
    const lookup = this.registry.resolve(adapterName);
    if (!lookup.found) {
      return this.finish(request, {
        passed: false,
        error: { kind: 'unclassified', message: `no adapter registered for "${lookup.name}"` },
      });
    }

    const adapter = lookup.adapter;
    const payload = adapter.optimize(request.payload ?? defaultPayload(request.kind));
    const exchange = adapter.buildExchange(request.kind, request, payload);
    if (!exchange) {
      return this.finish(request, {
        passed: false,
        error: { kind: 'unclassified', message: `${adapter.name()} has no ${request.kind} endpoint` },
      });
    }
    const shaped: HttpExchange =
      request.kind === 'transport'
        ? { ...exchange, headers: { ...exchange.headers, 'Accept-Encoding': PROBE_ACCEPT_ENCODING } }
        : exchange;

    const logger = this.logger.child({ provider: request.provider.name, model: request.model, kind: request.kind });
    const outcome = await this.exchange(request, adapter, shaped);
    logger.debug('Probe finished', {
      passed: outcome.passed,
      status: outcome.status,
      latencyMs: outcome.latencyMs,
      error: outcome.error?.kind,
    });
    return this.finish(request, outcome);
  }

  private async exchange(request: ProbeRequest, adapter: IProviderAdapter, exchange: HttpExchange): Promise<Outcome> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), request.timeoutMs);
    const startedAt = this.now();

    try {
      const response = await this.fetchImpl(exchange.url, {
        method: exchange.method,
        headers: exchange.headers,
        ...(exchange.body !== undefined ? { body: JSON.stringify(exchange.body) } : {}),
        signal: controller.signal,
      });
      const rateLimit = adapter.rateLimitInfo(response.headers);

      if (!response.ok) {
        const body = await response.text();
        return {
          passed: false,
          status: response.status,
          latencyMs: this.now() - startedAt,
          error: adapter.classifyError(response.status, body),
          evidence: truncate(body),
          rateLimit,
        };
      }

      switch (request.kind) {
        case 'existence':
          await response.body?.cancel();
          return {
            passed: response.status === 200,
            status: response.status,
            latencyMs: this.now() - startedAt,
            rateLimit,
          };
        case 'transport':
          await response.body?.cancel();
          return { ...this.checkTransport(response.headers), status: response.status, latencyMs: this.now() - startedAt, rateLimit };
        case 'responsiveness':
        case 'streaming':
          return { ...(await this.measureStream(request, adapter, response, startedAt)), status: response.status, rateLimit };
        case 'function_calling':
        case 'vision':
        case 'embeddings':
          return {
            ...(await this.checkFeature(request, request.kind, adapter, response)),
            status: response.status,
            latencyMs: this.now() - startedAt,
            rateLimit,
          };
      }
    } catch (error) {
      return {
        passed: false,
        latencyMs: this.now() - startedAt,
        error: transportError(error, controller.signal.aborted ? request.timeoutMs : undefined),
      };
    } finally {
      clearTimeout(timeout);
    }
  }

  /**
   * Read a chat answer. TTFT runs from dispatch to the first chunk with
   * content; a plain JSON answer counts as a single chunk, so TTFT equals the
   * total.
   */
  private async measureStream(
    request: ProbeRequest,
    adapter: IProviderAdapter,
    response: Response,
    startedAt: number,
  ): Promise<Outcome> {
    const contentType = response.headers.get('content-type') ?? '';

    if (!response.body || !contentType.includes('text/event-stream')) {
      const text = await response.text();
      const latencyMs = this.now() - startedAt;
      const parsed = parseJson(text);
      if (!parsed.ok) {
        return { passed: false, latencyMs, error: parsed.error, evidence: truncate(text) };
      }
      if (request.kind === 'streaming') {
        return { passed: false, latencyMs, evidence: `expected an event stream, got "${contentType}"` };
      }
      return this.judgeTimings(latencyMs, latencyMs);
    }

    let firstContentAt: number | undefined;
    let finished = false;
    let streamError: string | undefined;
    let content = '';

    for await (const chunk of adapter.parseStream(response.body)) {
      if (chunk.error !== undefined) {
        streamError ??= chunk.error;
      }
      if (chunk.content.length > 0) {
        firstContentAt ??= this.now();
        content += chunk.content;
      }
      if (chunk.finish) {
        finished = true;
        break;
      }
    }
    const latencyMs = this.now() - startedAt;

    if (firstContentAt === undefined) {
      return {
        passed: false,
        latencyMs,
        error: streamError !== undefined ? streamErrorOf(streamError) : undefined,
        evidence: streamError === undefined ? 'stream carried no content' : undefined,
      };
    }

    const ttftMs = firstContentAt - startedAt;
    if (request.kind === 'streaming') {
      return {
        passed: finished,
        latencyMs,
        ttftMs,
        evidence: truncate(finished ? content : 'stream ended without a terminal chunk'),
      };
    }
    const judged = this.judgeTimings(ttftMs, latencyMs);
    return judged.passed ? { ...judged, evidence: truncate(content) } : judged;
  }

  private judgeTimings(ttftMs: number, latencyMs: number): Outcome {
    if (ttftMs > this.ttftCeilingMs) {
      return { passed: false, ttftMs, latencyMs, evidence: `first chunk after ${ttftMs}ms exceeds ${this.ttftCeilingMs}ms` };
    }
    if (latencyMs > this.totalCeilingMs) {
      return { passed: false, ttftMs, latencyMs, evidence: `answer took ${latencyMs}ms, over ${this.totalCeilingMs}ms` };
    }
    return { passed: true, ttftMs, latencyMs };
  }

  private async checkFeature(
    request: ProbeRequest,
    kind: FeatureProbeKind,
    adapter: IProviderAdapter,
    response: Response,
  ): Promise<Outcome> {
    const text = await response.text();
    const parsed = parseJson(text);
    if (!parsed.ok) {
      return { passed: false, error: parsed.error, evidence: truncate(text) };
    }
    const check = adapter.checkFeature(kind, parsed.value, request.embeddingDimensions);
    return check.ok ? { passed: true, evidence: truncate(text) } : { passed: false, evidence: check.reason };
  }

  private checkTransport(headers: Headers): Outcome {
    for (const name of ['content-encoding', 'accept-encoding']) {
      const advertised = (headers.get(name) ?? '')
        .split(',')
        .map((value) => value.trim().toLowerCase())
        .filter((value) => value.length > 0);
      const match = advertised.find((value) => this.transportEncodings.has(value));
      if (match !== undefined) {
        return { passed: true, evidence: `${name}: ${match}` };
      }
    }
    return { passed: false, evidence: `no ${[...this.transportEncodings].join('/')} encoding advertised` };
  }

  private finish(request: ProbeRequest, outcome: Outcome): ProbeResult {
    const result: ProbeResult = {
      kind: request.kind,
      provider: request.provider.name,
      model: request.model,
      passed: outcome.passed,
      ...(outcome.status !== undefined ? { status: outcome.status } : {}),
      ...(outcome.latencyMs !== undefined ? { latencyMs: outcome.latencyMs } : {}),
      ...(outcome.ttftMs !== undefined ? { ttftMs: outcome.ttftMs } : {}),
      ...(outcome.error !== undefined ? { error: Object.freeze({ ...outcome.error }) } : {}),
      ...(outcome.evidence !== undefined ? { evidence: truncate(outcome.evidence) } : {}),
      ...(outcome.rateLimit !== undefined ? { rateLimit: freezeRateLimit(outcome.rateLimit) } : {}),
      completedAt: new Date(this.wallClock()).toISOString(),
    };
    return Object.freeze(result);
  }
}

// ═══════════════════════════════════════════════════════════════════════
// Helpers
// ═══════════════════════════════════════════════════════════════════════

type JsonParse = { ok: true; value: unknown } | { ok: false; error: TaxonomyError };

function parseJson(text: string): JsonParse {
  try {
    const value: unknown = JSON.parse(text);
    return { ok: true, value };
  } catch (error) {
    return {
      ok: false,
      error: { kind: 'parse', message: `invalid JSON response: ${error instanceof Error ? error.message : String(error)}` },
    };
  }
}

function streamErrorOf(message: string): TaxonomyError {
  return { kind: message.startsWith('malformed chunk') ? 'parse' : 'unclassified', message };
}

function freezeRateLimit(info: RateLimitInfo): Readonly<RateLimitInfo> {
  return Object.freeze({ ...info });
}
