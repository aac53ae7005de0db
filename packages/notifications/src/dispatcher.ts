/**
 * @module @llmverify/notifications/dispatcher
 * Worker-pool notification dispatcher with severity-based routing.
 */

import { NoopLogger } from '@llmverify/core';
import type {
  EventSeverity,
  IEventBus,
  ILogger,
  Unsubscribe,
  VerifierEvent,
  VerifierEventType,
} from '@llmverify/core';
import { DispatcherClosedError } from './errors.js';
import { BoundedQueue } from './queue.js';
import { priorityFor, renderBody, renderTitle } from './render.js';
import { TIER_RANK } from './types.js';
import type { DeliveryOutcome, INotificationChannel, Notification } from './types.js';

export interface DispatcherConfig {
  /** Worker loops started by `start()` (default: 4) */
  workers?: number;
  /** Queue capacity (default: 100) */
  queueCapacity?: number;
  /** How long `send` waits for a free slot before QueueFullError (default: 5000) */
  sendTimeoutMs?: number;
  /** Deadline of one channel delivery (default: 10000) */
  deliveryTimeoutMs?: number;
  /** Default grace period of `close()` (default: 5000) */
  graceMs?: number;
  now?: () => number;
}

export interface DispatcherDeps {
  channels: INotificationChannel[];
  logger?: ILogger;
}

/** Event types forwarded by `attach()` unless told otherwise */
export const DEFAULT_ATTACHED_TYPES: readonly VerifierEventType[] = [
  'verification.completed',
  'verification.failed',
  'score.changed',
];

interface Job {
  notification: Notification;
  readonly settled: boolean;
  finish(outcome: DeliveryOutcome): void;
}

interface InFlight {
  controller: AbortController;
  startedAt: number;
}

const ABORTED_AT_SHUTDOWN = 'delivery aborted at shutdown';
const CLOSED_BEFORE_DELIVERY = 'dispatcher closed before delivery';

/**
 * Fans verification events out to notification channels.
 *
 * `send` enqueues one notification and resolves with its delivery outcome; a
 * failed delivery resolves with `ok: false` and is never retried. Workers keep
 * serving the queue whatever a channel does.
 */
export class NotificationDispatcher {
  private readonly channels = new Map<string, INotificationChannel>();
  private readonly queue: BoundedQueue<Job>;
  private readonly logger: ILogger;
  private readonly workerCount: number;
  private readonly sendTimeoutMs: number;
  private readonly deliveryTimeoutMs: number;
  private readonly graceMs: number;
  private readonly now: () => number;
  private readonly workers: Array<Promise<void>> = [];
  private readonly inFlight = new Map<Job, InFlight>();
  private readonly pending = new Set<Promise<void>>();
  private readonly subscriptions: Unsubscribe[] = [];
  private closing: Promise<void> | null = null;

  constructor(config: DispatcherConfig, deps: DispatcherDeps) {
    for (const channel of deps.channels) {
      this.channels.set(channel.id, channel);
    }
    this.queue = new BoundedQueue<Job>(config.queueCapacity ?? 100);
    this.logger = (deps.logger ?? new NoopLogger()).child({ component: 'notifications' });
    this.workerCount = config.workers ?? 4;
    this.sendTimeoutMs = config.sendTimeoutMs ?? 5000;
    this.deliveryTimeoutMs = config.deliveryTimeoutMs ?? 10_000;
    this.graceMs = config.graceMs ?? 5000;
    this.now = config.now ?? (() => Date.now());
  }

  get closed(): boolean {
    return this.closing !== null;
  }

  /**
   * Start the worker loops. Calling it again is a no-op.
   */
  start(): void {
    if (this.closed) {
      throw new DispatcherClosedError();
    }
    if (this.workers.length > 0) return;

    for (let i = 0; i < this.workerCount; i++) {
      this.workers.push(this.runWorker(i));
    }
    this.logger.info('Notification dispatcher started', {
      workers: this.workerCount,
      channels: [...this.channels.keys()],
    });
  }

  /**
   * Enqueue a notification and wait for its single delivery attempt.
   * @throws QueueFullError when no slot frees up within the send timeout
   * @throws DispatcherClosedError after `close()`
   */
  async send(notification: Notification): Promise<DeliveryOutcome> {
    if (this.closed) {
      throw new DispatcherClosedError();
    }
    if (!this.channels.has(notification.channel)) {
      return {
        notificationId: notification.id,
        channel: notification.channel,
        ok: false,
        error: `unknown channel "${notification.channel}"`,
        durationMs: 0,
      };
    }

    const { job, outcome } = createJob(notification);
    await this.queue.offer(job, this.sendTimeoutMs);
    return outcome;
  }

  /**
   * Notify every channel the event's severity routes to. Never rejects:
   * enqueue failures come back as failed outcomes.
   */
  async sendEvent(event: VerifierEvent): Promise<DeliveryOutcome[]> {
    const title = renderTitle(event);
    const body = renderBody(event);
    const priority = priorityFor(event.severity);

    return Promise.all(
      this.route(event.severity).map((channel) => {
        const notification: Notification = {
          id: `${event.id}:${channel.id}`,
          channel: channel.id,
          recipient: channel.recipient,
          title,
          body,
          priority,
          event,
        };
        return this.send(notification).catch(
          (error: unknown): DeliveryOutcome => ({
            notificationId: notification.id,
            channel: channel.id,
            ok: false,
            error: errorMessage(error),
            durationMs: 0,
          }),
        );
      }),
    );
  }

  /**
   * Channels an event of `severity` goes to: every channel for critical and
   * error, light and standard tiers for warning, the lightest channel for info.
   */
  route(severity: EventSeverity): INotificationChannel[] {
    const all = [...this.channels.values()];
    switch (severity) {
      case 'critical':
      case 'error':
        return all;
      case 'warning':
        return all.filter((channel) => channel.tier !== 'heavy');
      case 'info': {
        const lightest = all.reduce<INotificationChannel | undefined>(
          (best, channel) => (best === undefined || TIER_RANK[channel.tier] < TIER_RANK[best.tier] ? channel : best),
          undefined,
        );
        return lightest ? [lightest] : [];
      }
    }
  }

  /**
   * Forward events from the bus. The bus handler returns at once; deliveries
   * are tracked and awaited by `close()`.
   */
  attach(bus: IEventBus, types: readonly VerifierEventType[] = DEFAULT_ATTACHED_TYPES): Unsubscribe {
    const unsubscribe = bus.subscribe((event) => {
      this.track(event);
    }, types);
    this.subscriptions.push(unsubscribe);
    return unsubscribe;
  }

  /**
   * Stop accepting notifications, let in-flight and queued deliveries run for
   * up to `graceMs`, then abort what is still running.
   */
  close(graceMs: number = this.graceMs): Promise<void> {
    if (!this.closing) {
      this.closing = this.shutdown(graceMs);
    }
    return this.closing;
  }

  private async shutdown(graceMs: number): Promise<void> {
    for (const unsubscribe of this.subscriptions.splice(0)) {
      unsubscribe();
    }
    this.queue.close();

    let timer: ReturnType<typeof setTimeout> | undefined;
    const graceElapsed = new Promise<'timeout'>((resolve) => {
      timer = setTimeout(() => resolve('timeout'), graceMs);
    });
    const workersDone = Promise.all(this.workers).then(() => 'done' as const);
    const result = await Promise.race([workersDone, graceElapsed]);
    clearTimeout(timer);

    if (result === 'timeout') {
      const now = this.now();
      for (const [job, running] of this.inFlight) {
        running.controller.abort(new Error(ABORTED_AT_SHUTDOWN));
        job.finish({
          notificationId: job.notification.id,
          channel: job.notification.channel,
          ok: false,
          error: ABORTED_AT_SHUTDOWN,
          durationMs: now - running.startedAt,
        });
      }
    }

    const leftover = this.queue.drain();
    for (const job of leftover) {
      job.finish({
        notificationId: job.notification.id,
        channel: job.notification.channel,
        ok: false,
        error: CLOSED_BEFORE_DELIVERY,
        durationMs: 0,
      });
    }

    await Promise.all(this.pending);
    for (const channel of this.channels.values()) {
      await channel.close?.();
    }

    this.logger.info('Notification dispatcher closed', {
      aborted: result === 'timeout',
      undelivered: leftover.length,
    });
  }

  private track(event: VerifierEvent): void {
    if (this.closed) return;

    const task = this.sendEvent(event).then((outcomes) => {
      const failed = outcomes.filter((outcome) => !outcome.ok);
      if (failed.length > 0) {
        this.logger.warn('Event notifications failed', {
          eventId: event.id,
          type: event.type,
          failed: failed.map((outcome) => `${outcome.channel}: ${outcome.error ?? 'unknown error'}`),
        });
      }
    });
    this.pending.add(task);
    void task.finally(() => this.pending.delete(task));
  }

  private async runWorker(index: number): Promise<void> {
    const logger = this.logger.child({ worker: index });
    for (;;) {
      // eslint-disable-next-line no-await-in-loop -- one delivery at a time per worker
      const job = await this.queue.take();
      if (job === undefined) return;
      // eslint-disable-next-line no-await-in-loop
      await this.deliver(job, logger);
    }
  }

  private async deliver(job: Job, logger: ILogger): Promise<void> {
    const { notification } = job;
    const channel = this.channels.get(notification.channel);
    if (!channel) {
      job.finish({
        notificationId: notification.id,
        channel: notification.channel,
        ok: false,
        error: `unknown channel "${notification.channel}"`,
        durationMs: 0,
      });
      return;
    }

    const controller = new AbortController();
    const timeout = setTimeout(
      () => controller.abort(new Error(`delivery timed out after ${this.deliveryTimeoutMs}ms`)),
      this.deliveryTimeoutMs,
    );
    const startedAt = this.now();
    this.inFlight.set(job, { controller, startedAt });

    // Channels that ignore the signal still lose the race against it
    const delivery = channel.deliver(notification, controller.signal);
    delivery.catch((error: unknown) => {
      if (controller.signal.aborted) {
        logger.debug('Delivery settled after its deadline', { id: notification.id, error: errorMessage(error) });
      }
    });
    const deadline = untilAborted(controller.signal);

    try {
      await Promise.race([delivery, deadline.promise]);
      job.finish({
        notificationId: notification.id,
        channel: channel.id,
        ok: true,
        durationMs: this.now() - startedAt,
      });
      logger.debug('Notification delivered', { id: notification.id, channel: channel.id });
    } catch (error) {
      if (!job.settled) {
        logger.error('Notification delivery failed', error instanceof Error ? error : new Error(String(error)), {
          id: notification.id,
          channel: channel.id,
        });
      }
      job.finish({
        notificationId: notification.id,
        channel: channel.id,
        ok: false,
        error: errorMessage(error),
        durationMs: this.now() - startedAt,
      });
    } finally {
      clearTimeout(timeout);
      deadline.dispose();
      this.inFlight.delete(job);
    }
  }
}

function createJob(notification: Notification): { job: Job; outcome: Promise<DeliveryOutcome> } {
  let resolveOutcome: (outcome: DeliveryOutcome) => void = () => {};
  const outcome = new Promise<DeliveryOutcome>((resolve) => {
    resolveOutcome = resolve;
  });

  let settled = false;
  const job: Job = {
    notification,
    get settled() {
      return settled;
    },
    finish(result) {
      if (settled) return;
      settled = true;
      resolveOutcome(result);
    },
  };
  return { job, outcome };
}

function untilAborted(signal: AbortSignal): { promise: Promise<never>; dispose(): void } {
  let dispose = (): void => {};
  const promise = new Promise<never>((_resolve, reject) => {
    const onAbort = (): void => reject(signal.reason);
    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener('abort', onAbort, { once: true });
    dispose = () => signal.removeEventListener('abort', onAbort);
  });
  return { promise, dispose };
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
