/**
 * @module @llmverify/adapters-eventbus-memory
 * EventBus adapter delivering events to in-process subscribers.
 *
 * @example
 * ```typescript
 * import { createAdapter } from '@llmverify/adapters-eventbus-memory';
 *
 * const eventBus = createAdapter({}, { logger });
 *
 * // Subscribe to selected event types
 * const unsubscribe = eventBus.subscribe(async (event) => {
 *   console.log('Score changed:', event.payload);
 * }, ['score.changed']);
 *
 * await eventBus.publish(event);
 *
 * // Cleanup
 * unsubscribe();
 * eventBus.disconnect();
 * ```
 */

import { randomUUID } from 'node:crypto';
import { NoopLogger } from '@llmverify/core';
import type { IEventBus, ILogger, EventHandler, Unsubscribe, VerifierEvent, VerifierEventType } from '@llmverify/core';
import type { MemoryEventBusConfig, MemoryEventBusDeps, Subscription } from './types.js';

// Re-export manifest and types
export { manifest } from './manifest.js';
export type { MemoryEventBusConfig, MemoryEventBusDeps } from './types.js';

/**
 * EventBus implementation that calls subscribers directly.
 *
 * Features:
 * - Optional per-subscriber event type filter
 * - Handlers run concurrently; `publish` settles once all have finished
 * - A failing handler is logged and never affects other subscribers or the publisher
 */
export class MemoryEventBusAdapter implements IEventBus {
  private readonly logger: ILogger;
  private readonly subscriptions = new Map<string, Subscription>();
  private closed = false;

  constructor(config: MemoryEventBusConfig = {}, logger: ILogger = new NoopLogger()) {
    this.logger = logger.child({ component: config.name ?? 'eventbus' });
  }

  /**
   * Deliver an event to every matching subscriber.
   * Subscriptions added or removed during delivery take effect for the next event.
   */
  async publish(event: VerifierEvent): Promise<void> {
    if (this.closed) {
      this.logger.debug('Event dropped after disconnect', { type: event.type, id: event.id });
      return;
    }

    const targets = [...this.subscriptions.values()].filter(
      (sub) => sub.types === null || sub.types.has(event.type),
    );

    await Promise.all(targets.map((sub) => this.deliver(sub, event)));
  }

  /**
   * Subscribe to the given event types, or to every type when omitted.
   */
  subscribe(handler: EventHandler, types?: readonly VerifierEventType[]): Unsubscribe {
    const subscriberId = randomUUID();
    this.subscriptions.set(subscriberId, {
      subscriberId,
      handler,
      types: types === undefined ? null : new Set(types),
    });

    // Return unsubscribe function
    return () => {
      this.subscriptions.delete(subscriberId);
    };
  }

  private async deliver(sub: Subscription, event: VerifierEvent): Promise<void> {
    try {
      await sub.handler(event);
    } catch (err) {
      this.logger.error(
        `Handler error for event "${event.type}"`,
        err instanceof Error ? err : new Error(String(err)),
        { subscriberId: sub.subscriberId, eventId: event.id },
      );
    }
  }

  /**
   * Drop all subscriptions. Later publishes are ignored.
   */
  disconnect(): void {
    this.closed = true;
    this.subscriptions.clear();
  }

  /**
   * Get the number of active subscriptions (for testing/debugging).
   */
  get subscriptionCount(): number {
    return this.subscriptions.size;
  }
}

/**
 * Factory function for adapter loading.
 * Called by the engine bootstrap.
 */
export function createAdapter(
  config: MemoryEventBusConfig = {},
  deps: MemoryEventBusDeps = {},
): MemoryEventBusAdapter {
  return new MemoryEventBusAdapter(config, deps.logger);
}

// Default export for direct import
export default createAdapter;
