/**
 * @module @llmverify/adapters-eventbus-memory/types
 * Type definitions for the in-process EventBus adapter.
 */

import type { EventHandler, ILogger, VerifierEventType } from '@llmverify/core';

/**
 * Optional dependencies for the in-process EventBus adapter.
 */
export interface MemoryEventBusDeps {
  logger?: ILogger;
}

/**
 * Configuration for the in-process EventBus adapter.
 */
export interface MemoryEventBusConfig {
  /** Source tag added to log records (default: "eventbus") */
  name?: string;
}

/**
 * Internal subscription tracking.
 */
export interface Subscription {
  /** Unique subscriber ID */
  subscriberId: string;
  /** Event handler function */
  handler: EventHandler;
  /** Types this subscriber receives; null means every type */
  types: ReadonlySet<VerifierEventType> | null;
}
