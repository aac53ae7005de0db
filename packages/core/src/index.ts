/**
 * @module @llmverify/core
 * Shared contracts for the verification engine.
 *
 * Adapter packages implement the interfaces exported here; the verifier,
 * cache and notification packages consume them.
 *
 * @example
 * ```typescript
 * import type { IProviderAdapter, ProbeResult } from '@llmverify/core';
 * import { classifyHttpError, extractNestedError, NoopLogger } from '@llmverify/core';
 * ```
 */

export type {
  ProviderConfig,
  ModelFeatures,
  ModelInfo,
  FeatureProbeKind,
  ProbeKind,
  ChatRole,
  ChatContentPart,
  ChatMessage,
  ToolSpec,
  ChatRequest,
  ProbeTarget,
  ProbeRequest,
  RateLimitInfo,
  StreamingChunk,
  ProbeResult,
  CapabilityCategory,
  ScoreBreakdown,
  VerificationResult,
  EventSeverity,
  VerifierEventType,
  VerifierEvent,
} from './types.js';
export { FEATURE_PROBE_KINDS } from './types.js';

export type { ErrorKind, TaxonomyError, ProviderErrorBody } from './errors.js';
export {
  truncate,
  classifyHttpError,
  extractNestedError,
  transportError,
  VerifierError,
} from './errors.js';

export type {
  ConfigFieldSchema,
  AdapterManifest,
  HttpExchange,
  FeatureCheck,
  IProviderAdapter,
  ILogger,
  ICacheTier,
  EventHandler,
  Unsubscribe,
  IEventBus,
  ResultFilter,
  IResultStore,
} from './adapters.js';

export type { SseEvent, DecodedEvent, EventDecoder, ParseDataStreamOptions } from './sse.js';
export { readSseEvents, parseDataStream, textStream } from './sse.js';

export {
  DEFAULT_SYSTEM_PROMPT,
  partsText,
  messageText,
  promptMentions,
  withSystemPrompt,
  trimBaseURL,
  readIntHeader,
} from './request.js';

export { NoopLogger, NoopCacheTier, MemoryResultStore } from './noop.js';
export { deepFreeze } from './freeze.js';
