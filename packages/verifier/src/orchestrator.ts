/**
 * @module @llmverify/verifier/orchestrator
 * Runs the probe set for a model, scores it, caches and publishes the result.
 *
 * @example
 * ```typescript
 * const orchestrator = new VerificationOrchestrator(
 *   { cacheTtlMs: 3600000, probeTimeoutMs: 30000 },
 *   { registry, probeClient, cache, eventBus, resultStore, providers, logger },
 * );
 *
 * const result = await orchestrator.verify({ provider: 'openai', model: 'gpt-4o' });
 * console.log(result.score, result.category);
 * ```
 */

import { randomUUID } from 'node:crypto';
import { performance } from 'node:perf_hooks';
import { NoopLogger, VerifierError } from '@llmverify/core';
import type {
  EventSeverity,
  IEventBus,
  ILogger,
  IProviderAdapter,
  IResultStore,
  ModelFeatures,
  ModelInfo,
  ProbeKind,
  ProbeResult,
  ProviderConfig,
  VerificationResult,
  VerifierEventType,
} from '@llmverify/core';
import type { CacheLookup, MultiLevelCache } from '@llmverify/cache';
import type { AdapterRegistry } from './registry.js';
import type { ProbeClient } from './probe-client.js';
import { calculateScore } from './scoring.js';
import { Semaphore } from './semaphore.js';

export interface VerifyInput {
  provider: string;
  model: string;
  /** Declared features; a feature probe runs only when the model declares it */
  features?: Partial<ModelFeatures>;
  embeddingDimensions?: number;
}

export interface VerifyOptions {
  /** Skip the cache lookup and probe again */
  forceRefresh?: boolean;
}

export type VerificationState = 'idle' | 'probing' | 'scoring' | 'done';

export interface OrchestratorConfig {
  /** TTL of cached results (default: 3600000) */
  cacheTtlMs?: number;
  /** Deadline of each probe (default: 30000) */
  probeTimeoutMs?: number;
  /** The responsiveness probe gets at least this deadline (default: 60000) */
  totalCeilingMs?: number;
  now?: () => number;
  wallClock?: () => number;
}

export interface OrchestratorDeps {
  registry: AdapterRegistry;
  probeClient: ProbeClient;
  cache: MultiLevelCache<VerificationResult>;
  eventBus: IEventBus;
  resultStore: IResultStore;
  providers: readonly ProviderConfig[];
  logger?: ILogger;
}

/** Probes every verification runs */
export const BASE_PROBES: readonly ProbeKind[] = ['existence', 'responsiveness', 'streaming', 'transport'];

const FEATURE_PROBES: ReadonlyArray<{ kind: ProbeKind; feature: Exclude<keyof ModelFeatures, 'streaming'> }> = [
  { kind: 'function_calling', feature: 'functionCalling' },
  { kind: 'vision', feature: 'vision' },
  { kind: 'embeddings', feature: 'embeddings' },
];

const SOURCE = 'orchestrator';

export function cacheKeyFor(provider: string, model: string): string {
  return `verification:${provider.toLowerCase()}:${model}`;
}

/**
 * Verification orchestrator.
 *
 * One verification per (provider, model) runs at a time; callers arriving
 * while it runs share its result. Each provider's verifications are bounded
 * by a semaphore sized from the adapter's `optimalBatchSize()`.
 */
export class VerificationOrchestrator {
  private readonly registry: AdapterRegistry;
  private readonly probeClient: ProbeClient;
  private readonly cache: MultiLevelCache<VerificationResult>;
  private readonly eventBus: IEventBus;
  private readonly resultStore: IResultStore;
  private readonly providers = new Map<string, ProviderConfig>();
  private readonly logger: ILogger;
  private readonly cacheTtlMs: number;
  private readonly probeTimeoutMs: number;
  private readonly totalCeilingMs: number;
  private readonly now: () => number;
  private readonly wallClock: () => number;
  private readonly inFlight = new Map<string, Promise<VerificationResult>>();
  private readonly states = new Map<string, VerificationState>();
  private readonly semaphores = new Map<string, Semaphore>();

  constructor(config: OrchestratorConfig, deps: OrchestratorDeps) {
    this.registry = deps.registry;
    this.probeClient = deps.probeClient;
    this.cache = deps.cache;
    this.eventBus = deps.eventBus;
    this.resultStore = deps.resultStore;
    for (const provider of deps.providers) {
      this.providers.set(provider.name.toLowerCase(), provider);
    }
    this.logger = (deps.logger ?? new NoopLogger()).child({ component: 'orchestrator' });
    this.cacheTtlMs = config.cacheTtlMs ?? 3_600_000;
    this.probeTimeoutMs = config.probeTimeoutMs ?? 30_000;
    this.totalCeilingMs = config.totalCeilingMs ?? 60_000;
    this.now = config.now ?? (() => performance.now());
    this.wallClock = config.wallClock ?? (() => Date.now());
  }

  /**
   * Verify one model. Always resolves with a result: an unknown provider
   * yields score 0 with every probe failed.
   */
  async verify(input: VerifyInput, options: VerifyOptions = {}): Promise<VerificationResult> {
    const key = cacheKeyFor(input.provider, input.model);

    const running = this.inFlight.get(key);
    if (running) return running;

    // A forced run still needs the cached score to report changes, without
    // counting a lookup
    const previous = options.forceRefresh ? await this.cache.peek(key) : await this.cache.get(key);
    if (previous.hit && !options.forceRefresh) {
      this.logger.debug('Verification served from cache', { key });
      return previous.value;
    }

    // Another caller may have started while the cache was consulted
    const started = this.inFlight.get(key);
    if (started) return started;

    const task = this.run(input, key, previous).finally(() => {
      this.inFlight.delete(key);
      this.states.delete(key);
    });
    this.inFlight.set(key, task);
    return task;
  }

  /** Verify several models in parallel */
  verifyMany(inputs: readonly VerifyInput[], options: VerifyOptions = {}): Promise<VerificationResult[]> {
    return Promise.all(inputs.map((input) => this.verify(input, options)));
  }

  /**
   * List the provider's models through its adapter.
   * @throws VerifierError when the provider is unknown or cannot list models
   */
  async discoverModels(provider: string): Promise<ModelInfo[]> {
    const binding = this.bind(provider);
    if (!binding) {
      throw new VerifierError({ kind: 'not_found', message: `unknown provider "${provider}"` });
    }
    const { adapter, config } = binding;
    if (!adapter.discoverModels) {
      throw new VerifierError({ kind: 'unclassified', message: `${adapter.name()} does not support model discovery` });
    }
    return adapter.discoverModels({ provider: config, credential: config.credential ?? '' });
  }

  /** Discover every model of a provider and verify each */
  async verifyProvider(provider: string, options: VerifyOptions = {}): Promise<VerificationResult[]> {
    const models = await this.discoverModels(provider);
    return this.verifyMany(
      models.map((model) => ({
        provider,
        model: model.id,
        features: model.features,
        ...(model.embeddingDimensions !== undefined ? { embeddingDimensions: model.embeddingDimensions } : {}),
      })),
      options,
    );
  }

  stateOf(provider: string, model: string): VerificationState {
    return this.states.get(cacheKeyFor(provider, model)) ?? 'idle';
  }

  private bind(provider: string): { adapter: IProviderAdapter; config: ProviderConfig } | undefined {
    const config = this.providers.get(provider.toLowerCase());
    if (!config) return undefined;
    const lookup = this.registry.resolve(config.adapter ?? config.name);
    return lookup.found ? { adapter: lookup.adapter, config } : undefined;
  }

  private async run(
    input: VerifyInput,
    key: string,
    previous: CacheLookup<VerificationResult>,
  ): Promise<VerificationResult> {
    const startedAt = this.now();
    const logger = this.logger.child({ provider: input.provider, model: input.model });
    this.states.set(key, 'probing');

    const binding = this.bind(input.provider);
    if (!binding) {
      return this.unknownProvider(input, key, startedAt, logger);
    }

    const { adapter, config } = binding;
    const kinds = this.probeKinds(input, adapter);
    const probes = await this.semaphoreFor(config.name, adapter).use(async () => {
      await this.publish('verification.started', 'info', { provider: config.name, model: input.model, probes: kinds });
      return Promise.all(
        kinds.map((kind) =>
          this.probeClient.probe({
            provider: config,
            model: input.model,
            credential: config.credential ?? '',
            kind,
            timeoutMs: kind === 'responsiveness' ? Math.max(this.probeTimeoutMs, this.totalCeilingMs) : this.probeTimeoutMs,
            ...(input.embeddingDimensions !== undefined ? { embeddingDimensions: input.embeddingDimensions } : {}),
          }),
        ),
      );
    });

    this.states.set(key, 'scoring');
    const result = this.assemble(config.name, input.model, probes, startedAt);

    await this.cache.set(key, result, this.cacheTtlMs);
    try {
      await this.resultStore.save(result);
    } catch (error) {
      logger.error('Result store write failed', error instanceof Error ? error : new Error(String(error)));
    }
    this.states.set(key, 'done');

    const summary = { provider: result.provider, model: result.model, score: result.score, category: result.category };
    if (probes.every((probe) => !probe.passed)) {
      await this.publish('verification.failed', 'error', { ...summary, reason: 'every probe failed' });
    } else {
      await this.publish('verification.completed', 'info', { ...summary, durationMs: result.durationMs });
    }
    if (previous.hit && previous.value.score !== result.score) {
      const dropped = result.score < previous.value.score;
      await this.publish('score.changed', dropped ? 'warning' : 'info', {
        ...summary,
        previousScore: previous.value.score,
      });
    }

    logger.info('Verification finished', { score: result.score, category: result.category });
    return result;
  }

  private async unknownProvider(
    input: VerifyInput,
    key: string,
    startedAt: number,
    logger: ILogger,
  ): Promise<VerificationResult> {
    const completedAt = new Date(this.wallClock()).toISOString();
    const probes = BASE_PROBES.map(
      (kind): ProbeResult =>
        Object.freeze({
          kind,
          provider: input.provider,
          model: input.model,
          passed: false,
          error: Object.freeze({ kind: 'unclassified' as const, message: `unknown provider "${input.provider}"` }),
          completedAt,
        }),
    );

    this.states.set(key, 'scoring');
    const result = this.assemble(input.provider, input.model, probes, startedAt);
    this.states.set(key, 'done');

    logger.warn('Verification requested for an unknown provider');
    await this.publish('verification.failed', 'error', {
      provider: input.provider,
      model: input.model,
      score: result.score,
      category: result.category,
      reason: `unknown provider "${input.provider}"`,
    });
    return result;
  }

  private probeKinds(input: VerifyInput, adapter: IProviderAdapter): ProbeKind[] {
    const supported = adapter.manifest.capabilities;
    const features = FEATURE_PROBES.filter(
      ({ feature }) => input.features?.[feature] === true && supported?.[feature] === true,
    );
    return [...BASE_PROBES, ...features.map(({ kind }) => kind)];
  }

  private semaphoreFor(provider: string, adapter: IProviderAdapter): Semaphore {
    const key = provider.toLowerCase();
    let semaphore = this.semaphores.get(key);
    if (!semaphore) {
      semaphore = new Semaphore(adapter.optimalBatchSize());
      this.semaphores.set(key, semaphore);
    }
    return semaphore;
  }

  private assemble(
    provider: string,
    model: string,
    probes: readonly ProbeResult[],
    startedAt: number,
  ): VerificationResult {
    const { score, category, breakdown } = calculateScore(probes);
    return Object.freeze({
      provider,
      model,
      probes: Object.freeze([...probes]),
      score,
      category,
      breakdown: Object.freeze(breakdown),
      verifiedAt: new Date(this.wallClock()).toISOString(),
      durationMs: this.now() - startedAt,
    });
  }

  private async publish(type: VerifierEventType, severity: EventSeverity, payload: Record<string, unknown>): Promise<void> {
    try {
      await this.eventBus.publish({
        id: randomUUID(),
        type,
        severity,
        source: SOURCE,
        timestamp: this.wallClock(),
        payload,
      });
    } catch (error) {
      this.logger.error('Event publish failed', error instanceof Error ? error : new Error(String(error)), { type });
    }
  }
}
