/**
 * @module @llmverify/verifier/engine
 * Single initialization point of the verification engine.
 *
 * @example
 * ```typescript
 * import { createVerificationEngine, loadConfig } from '@llmverify/verifier';
 *
 * const engine = createVerificationEngine(loadConfig());
 * const result = await engine.orchestrator.verify({ provider: 'openai', model: 'gpt-4o' });
 * await engine.close();
 * ```
 */

import { MemoryResultStore } from '@llmverify/core';
import type {
  AdapterManifest,
  ICacheTier,
  IEventBus,
  ILogger,
  IProviderAdapter,
  IResultStore,
  VerificationResult,
} from '@llmverify/core';
import { createAdapter as createOpenAIAdapter } from '@llmverify/adapters-openai';
import { createAdapter as createDeepSeekAdapter } from '@llmverify/adapters-deepseek';
import { createAdapter as createAnthropicAdapter } from '@llmverify/adapters-anthropic';
import { createAdapter as createPinoLogger, manifest as pinoManifest } from '@llmverify/adapters-pino';
import { createAdapter as createRedisTier, manifest as redisManifest } from '@llmverify/adapters-redis';
import { createAdapter as createEventBus, manifest as eventBusManifest } from '@llmverify/adapters-eventbus-memory';
import { MultiLevelCache } from '@llmverify/cache';
import {
  EmailChannel,
  MatrixChannel,
  NotificationDispatcher,
  SlackChannel,
  TelegramChannel,
  WhatsAppChannel,
} from '@llmverify/notifications';
import type { INotificationChannel } from '@llmverify/notifications';
import type { NotificationSettings, VerifierConfig } from './config.js';
import { ProbeClient } from './probe-client.js';
import { reviveResult } from './result-schema.js';
import { AdapterRegistry } from './registry.js';
import { VerificationOrchestrator } from './orchestrator.js';

/**
 * Collaborators to use instead of the ones built from configuration.
 */
export interface EngineOverrides {
  logger?: ILogger;
  fetchImpl?: typeof fetch;
  /** Registered after the built-in adapters, so a same-named adapter wins */
  adapters?: IProviderAdapter[];
  cacheTier?: ICacheTier;
  eventBus?: IEventBus;
  resultStore?: IResultStore;
  channels?: INotificationChannel[];
  /** Monotonic clock for latency measurement */
  now?: () => number;
  /** Wall clock for timestamps */
  wallClock?: () => number;
}

export interface VerificationEngine {
  readonly config: VerifierConfig;
  /** Manifests of the infrastructure adapters built from configuration */
  readonly components: readonly AdapterManifest[];
  readonly logger: ILogger;
  readonly registry: AdapterRegistry;
  readonly cache: MultiLevelCache<VerificationResult>;
  readonly eventBus: IEventBus;
  readonly resultStore: IResultStore;
  readonly dispatcher: NotificationDispatcher;
  readonly probeClient: ProbeClient;
  readonly orchestrator: VerificationOrchestrator;
  /** Tear down in reverse order of construction. Idempotent. */
  close(): Promise<void>;
}

/**
 * Build every component from one configuration snapshot.
 */
export function createVerificationEngine(config: VerifierConfig, overrides: EngineOverrides = {}): VerificationEngine {
  const components: AdapterManifest[] = [];
  const built = <T>(manifest: AdapterManifest, component: T): T => {
    components.push(manifest);
    return component;
  };
  const logger =
    overrides.logger ??
    built(pinoManifest, createPinoLogger({ level: config.logging.level, pretty: config.logging.pretty }));
  const fetchImpl = overrides.fetchImpl ?? fetch;

  const registry = new AdapterRegistry();
  registry.register(createOpenAIAdapter());
  registry.register(createDeepSeekAdapter());
  registry.register(createAnthropicAdapter({ fetchImpl }));
  for (const adapter of overrides.adapters ?? []) {
    registry.register(adapter);
  }

  const tier =
    overrides.cacheTier ??
    (config.cache.redisUrl !== undefined
      ? built(redisManifest, createRedisTier({ url: config.cache.redisUrl, keyPrefix: config.cache.keyPrefix }))
      : undefined);
  const cache = new MultiLevelCache<VerificationResult>(
    {
      defaultTtlMs: config.cache.ttlMs,
      sweepIntervalMs: config.cache.sweepIntervalMs,
      maxItems: config.cache.maxItems,
      tierTimeoutMs: config.cache.tierTimeoutMs,
      revive: reviveResult,
      ...(overrides.wallClock ? { now: overrides.wallClock } : {}),
    },
    { ...(tier ? { tier } : {}), logger },
  );

  const eventBus = overrides.eventBus ?? built(eventBusManifest, createEventBus({}, { logger }));
  const resultStore = overrides.resultStore ?? new MemoryResultStore();

  const channels = overrides.channels ?? channelsFromConfig(config.notifications, fetchImpl);
  const dispatcher = new NotificationDispatcher(config.notifications, { channels, logger });
  dispatcher.start();
  if (channels.length > 0) {
    dispatcher.attach(eventBus);
  }

  const clocks = {
    ...(overrides.now ? { now: overrides.now } : {}),
    ...(overrides.wallClock ? { wallClock: overrides.wallClock } : {}),
  };
  const probeClient = new ProbeClient(
    {
      ttftCeilingMs: config.probe.ttftCeilingMs,
      totalCeilingMs: config.probe.totalCeilingMs,
      transportEncodings: config.probe.transportEncodings,
      fetchImpl,
      ...clocks,
    },
    { registry, logger },
  );
  const orchestrator = new VerificationOrchestrator(
    {
      cacheTtlMs: config.cache.ttlMs,
      probeTimeoutMs: config.probe.timeoutMs,
      totalCeilingMs: config.probe.totalCeilingMs,
      ...clocks,
    },
    { registry, probeClient, cache, eventBus, resultStore, providers: config.providers, logger },
  );

  logger.info('Verification engine ready', {
    components: components.map((manifest) => manifest.id),
    adapters: registry.list().map((entry) => entry.name),
    providers: config.providers.map((provider) => provider.name),
    channels: channels.map((channel) => channel.id),
    distributedCache: tier !== undefined,
  });

  let closing: Promise<void> | null = null;
  const shutdown = async (): Promise<void> => {
    await dispatcher.close(config.notifications.graceMs);
    eventBus.disconnect();
    await cache.close();
    logger.info('Verification engine closed');
  };

  return {
    config,
    components,
    logger,
    registry,
    cache,
    eventBus,
    resultStore,
    dispatcher,
    probeClient,
    orchestrator,
    close() {
      closing ??= shutdown();
      return closing;
    },
  };
}

/**
 * Channels for every notification target the configuration names.
 */
export function channelsFromConfig(settings: NotificationSettings, fetchImpl: typeof fetch = fetch): INotificationChannel[] {
  const channels: INotificationChannel[] = [];
  if (settings.slack) {
    channels.push(new SlackChannel({ ...settings.slack, fetchImpl }));
  }
  if (settings.telegram) {
    channels.push(new TelegramChannel({ ...settings.telegram, fetchImpl }));
  }
  if (settings.matrix) {
    channels.push(new MatrixChannel({ ...settings.matrix, fetchImpl }));
  }
  if (settings.whatsapp) {
    channels.push(new WhatsAppChannel({ ...settings.whatsapp, fetchImpl }));
  }
  if (settings.email) {
    channels.push(new EmailChannel({ from: settings.email.from, to: settings.email.to, smtp: settings.email.smtp }));
  }
  return channels;
}
