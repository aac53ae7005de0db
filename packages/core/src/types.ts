/**
 * @module @llmverify/core/types
 * Domain types shared by adapters, the probe client and the orchestrator.
 */

import type { TaxonomyError } from './errors.js';

/**
 * A provider as configured at startup.
 */
export interface ProviderConfig {
  /** Provider name, matched case-insensitively */
  name: string;
  /** API base URL, e.g. https://api.openai.com/v1 */
  baseURL: string;
  /** API key, or an `env:VAR_NAME` reference resolved by the configuration layer */
  credential?: string;
  /** Adapter to bind (defaults to the provider name) */
  adapter?: string;
}

export interface ModelFeatures {
  streaming: boolean;
  functionCalling: boolean;
  vision: boolean;
  embeddings: boolean;
}

/**
 * A model exposed by a provider. Read-only to the engine.
 */
export interface ModelInfo {
  id: string;
  provider: string;
  features: ModelFeatures;
  /** Expected embedding vector length, when known */
  embeddingDimensions?: number;
}

export type FeatureProbeKind = 'function_calling' | 'vision' | 'embeddings';

export type ProbeKind =
  | 'existence'
  | 'responsiveness'
  | 'streaming'
  | 'transport'
  | FeatureProbeKind;

export const FEATURE_PROBE_KINDS: readonly FeatureProbeKind[] = [
  'function_calling',
  'vision',
  'embeddings',
];

export type ChatRole = 'system' | 'user' | 'assistant';

export type ChatContentPart =
  | { type: 'text'; text: string }
  | { type: 'image'; mediaType: string; data: string };

export interface ChatMessage {
  role: ChatRole;
  content: string | ChatContentPart[];
}

export interface ToolSpec {
  name: string;
  description: string;
  parameters: Record<string, unknown>;
}

/**
 * Canonical chat request before provider-specific shaping.
 */
export interface ChatRequest {
  messages: ChatMessage[];
  maxTokens?: number;
  temperature?: number;
  stream?: boolean;
  tools?: ToolSpec[];
  /** Provider-specific fields passed through untouched */
  extra?: Record<string, unknown>;
}

/**
 * Everything an adapter needs to address one model.
 */
export interface ProbeTarget {
  provider: ProviderConfig;
  model: string;
  credential: string;
}

export interface ProbeRequest extends ProbeTarget {
  kind: ProbeKind;
  /** Prompt payload; the probe client supplies a minimal one when omitted */
  payload?: ChatRequest;
  /** Hard deadline for the whole exchange */
  timeoutMs: number;
  /** Expected embedding dimensions for the embeddings probe */
  embeddingDimensions?: number;
}

/**
 * Rate-limit metadata read from response headers. Absent headers stay absent.
 */
export interface RateLimitInfo {
  requestsPerMinute?: number;
  tokensPerMinute?: number;
  /** ISO 8601; kept a string so results stay plain JSON across cache tiers */
  resetAt?: string;
}

export interface StreamingChunk {
  content: string;
  finish: boolean;
  error?: string;
}

export interface ProbeResult {
  readonly kind: ProbeKind;
  readonly provider: string;
  readonly model: string;
  readonly passed: boolean;
  readonly status?: number;
  readonly latencyMs?: number;
  readonly ttftMs?: number;
  readonly error?: TaxonomyError;
  readonly evidence?: string;
  readonly rateLimit?: RateLimitInfo;
  readonly completedAt: string;
}

export type CapabilityCategory =
  | 'fully capable'
  | 'capable with tooling'
  | 'chat with tooling'
  | 'chat only';

export interface ScoreBreakdown {
  existence: number;
  responsiveness: number;
  features: number;
  latency: number;
  transport: number;
}

export interface VerificationResult {
  readonly provider: string;
  readonly model: string;
  readonly probes: readonly ProbeResult[];
  readonly score: number;
  readonly category: CapabilityCategory;
  readonly breakdown: Readonly<ScoreBreakdown>;
  readonly verifiedAt: string;
  readonly durationMs: number;
}

export type EventSeverity = 'info' | 'warning' | 'error' | 'critical';

export type VerifierEventType =
  | 'verification.started'
  | 'verification.completed'
  | 'verification.failed'
  | 'score.changed';

export interface VerifierEvent {
  id: string;
  type: VerifierEventType;
  severity: EventSeverity;
  source: string;
  /** ms since epoch */
  timestamp: number;
  payload: Record<string, unknown>;
}
