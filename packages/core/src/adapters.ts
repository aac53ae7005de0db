/**
 * @module @llmverify/core/adapters
 * Contracts implemented by adapter packages and consumed by the engine.
 */

import type { TaxonomyError } from './errors.js';
import type {
  ChatRequest,
  FeatureProbeKind,
  ModelInfo,
  ProbeKind,
  ProbeTarget,
  RateLimitInfo,
  StreamingChunk,
  VerificationResult,
  VerifierEvent,
  VerifierEventType,
} from './types.js';

// ═══════════════════════════════════════════════════════════════════════
// Manifests
// ═══════════════════════════════════════════════════════════════════════

export interface ConfigFieldSchema {
  type: 'string' | 'number' | 'boolean' | 'array' | 'object';
  default?: unknown;
  enum?: readonly string[];
  description: string;
}

/**
 * Static description of an adapter package.
 */
export interface AdapterManifest {
  manifestVersion: '1.0.0';
  id: string;
  name: string;
  version: string;
  description: string;
  license?: string;
  type: 'provider' | 'core';
  implements: 'IProviderAdapter' | 'ILogger' | 'ICacheTier' | 'IEventBus';
  capabilities?: {
    streaming?: boolean;
    functionCalling?: boolean;
    vision?: boolean;
    embeddings?: boolean;
    discovery?: boolean;
    custom?: Record<string, boolean>;
  };
  configSchema?: Record<string, ConfigFieldSchema>;
}

// ═══════════════════════════════════════════════════════════════════════
// Provider adapter
// ═══════════════════════════════════════════════════════════════════════

/**
 * One HTTP exchange as shaped by an adapter.
 */
export interface HttpExchange {
  method: 'GET' | 'HEAD' | 'POST';
  url: string;
  headers: Record<string, string>;
  /** JSON body; omitted for GET/HEAD */
  body?: unknown;
}

export type FeatureCheck = { ok: true } | { ok: false; reason: string };

/**
 * Provider-specific strategy object. New providers register an
 * implementation with the registry; nothing subclasses a shared base.
 */
export interface IProviderAdapter {
  readonly manifest: AdapterManifest;

  name(): string;

  /** Provider-tuned defaults. Never drops fields, never overrides explicit values. */
  optimize(request: ChatRequest): ChatRequest;

  /**
   * Lazy, single-use chunk sequence over a server-sent-event body.
   * Returning early from the iteration cancels the body.
   */
  parseStream(body: ReadableStream<Uint8Array>): AsyncGenerator<StreamingChunk, void, undefined>;

  classifyError(status: number, body: string): TaxonomyError;

  /** Safe concurrency ceiling for this provider */
  optimalBatchSize(): number;

  rateLimitInfo(headers: Headers): RateLimitInfo;

  /**
   * Shape the HTTP exchange for a probe kind.
   * Returns null when the provider has no endpoint for it.
   */
  buildExchange(kind: ProbeKind, target: ProbeTarget, request: ChatRequest): HttpExchange | null;

  /** Validate a feature probe's parsed JSON response */
  checkFeature(kind: FeatureProbeKind, payload: unknown, expectedDimensions?: number): FeatureCheck;

  /** List the provider's models, when the provider exposes a listing */
  discoverModels?(target: Omit<ProbeTarget, 'model'>): Promise<ModelInfo[]>;
}

// ═══════════════════════════════════════════════════════════════════════
// Logger
// ═══════════════════════════════════════════════════════════════════════

export interface ILogger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, error?: Error, meta?: Record<string, unknown>): void;
  child(bindings: Record<string, unknown>): ILogger;
}

// ═══════════════════════════════════════════════════════════════════════
// Cache tier
// ═══════════════════════════════════════════════════════════════════════

/**
 * One level of the multi-level cache. TTLs are in milliseconds.
 */
export interface ICacheTier {
  get<T>(key: string): Promise<T | null>;
  set<T>(key: string, value: T, ttlMs: number): Promise<void>;
  delete(key: string): Promise<void>;
  clear(pattern?: string): Promise<void>;
  disconnect(): Promise<void>;
}

// ═══════════════════════════════════════════════════════════════════════
// Event bus
// ═══════════════════════════════════════════════════════════════════════

export type EventHandler = (event: VerifierEvent) => Promise<void> | void;
export type Unsubscribe = () => void;

export interface IEventBus {
  publish(event: VerifierEvent): Promise<void>;
  /** Subscribe to the given types, or to every type when omitted */
  subscribe(handler: EventHandler, types?: readonly VerifierEventType[]): Unsubscribe;
  disconnect(): void;
}

// ═══════════════════════════════════════════════════════════════════════
// Result store
// ═══════════════════════════════════════════════════════════════════════

export interface ResultFilter {
  provider?: string;
  model?: string;
  minScore?: number;
}

/**
 * Durable sink for verification history. The engine writes to it and never
 * reads from it while probing.
 */
export interface IResultStore {
  save(result: VerificationResult): Promise<void>;
  list(filter?: ResultFilter, limit?: number, offset?: number): Promise<VerificationResult[]>;
}
