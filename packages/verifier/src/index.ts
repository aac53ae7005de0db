/**
 * @module @llmverify/verifier
 * Verification engine: adapter registry, probe client, score calculator,
 * orchestrator, configuration and bootstrap.
 *
 * @example
 * ```typescript
 * import { createVerificationEngine, loadConfig, addScoreSuffix } from '@llmverify/verifier';
 *
 * const engine = createVerificationEngine(loadConfig());
 * const results = await engine.orchestrator.verifyProvider('openai');
 * for (const result of results) {
 *   console.log(addScoreSuffix(result.model, result.score), result.category);
 * }
 * await engine.close();
 * ```
 */

export { AdapterRegistry } from './registry.js';
export type { AdapterLookup, RegisteredAdapter } from './registry.js';
export { Semaphore } from './semaphore.js';
export type { SemaphoreSnapshot } from './semaphore.js';
export { ProbeClient, PROBE_ACCEPT_ENCODING } from './probe-client.js';
export type { ProbeClientConfig, ProbeClientDeps } from './probe-client.js';
export { defaultPayload, WEATHER_TOOL, PROBE_IMAGE_PNG } from './probe-payloads.js';
export {
  calculateScore,
  categoryFor,
  latencyComponent,
  responsivenessComponent,
  SCORE_WEIGHTS,
} from './scoring.js';
export type { Score } from './scoring.js';
export { addScoreSuffix, removeScoreSuffix, hasScoreSuffix, extractScoreFromName } from './naming.js';
export { VerificationOrchestrator, BASE_PROBES, cacheKeyFor } from './orchestrator.js';
export type {
  VerifyInput,
  VerifyOptions,
  VerificationState,
  OrchestratorConfig,
  OrchestratorDeps,
} from './orchestrator.js';
export {
  loadConfig,
  ConfigStore,
  ConfigValidationError,
  DEFAULT_BASE_URLS,
  verifierConfigSchema,
  probeSchema,
  cacheSchema,
  notificationsSchema,
  providerSchema,
} from './config.js';
export type {
  VerifierConfig,
  ConfigOverrides,
  ProbeSettings,
  CacheSettings,
  NotificationSettings,
  LoggingSettings,
  Env,
} from './config.js';
export { reviveResult, verificationResultSchema } from './result-schema.js';
export { createVerificationEngine, channelsFromConfig } from './engine.js';
export type { EngineOverrides, VerificationEngine } from './engine.js';
