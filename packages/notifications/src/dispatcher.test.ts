import { describe, it, expect, afterEach, vi } from 'vitest';
import type { EventHandler, IEventBus, Unsubscribe, VerifierEvent, VerifierEventType } from '@llmverify/core';
import { DEFAULT_ATTACHED_TYPES, NotificationDispatcher } from './dispatcher.js';
import type { DispatcherConfig } from './dispatcher.js';
import { DispatcherClosedError, QueueFullError } from './errors.js';
import type { ChannelTier, INotificationChannel, Notification } from './types.js';

type Behavior = 'ok' | 'fail' | 'hang' | 'stuck';

class RecordingChannel implements INotificationChannel {
  readonly recipient: string;
  readonly delivered: Notification[] = [];
  closeCalls = 0;

  constructor(
    readonly id: string,
    readonly tier: ChannelTier,
    private readonly behavior: Behavior = 'ok',
  ) {
    this.recipient = `${id}-recipient`;
  }

  async deliver(notification: Notification, signal: AbortSignal): Promise<void> {
    if (this.behavior === 'fail') {
      throw new Error(`${this.id} unavailable`);
    }
    if (this.behavior === 'stuck') {
      // never settles and never looks at the signal
      await new Promise<void>(() => {});
    }
    if (this.behavior === 'hang') {
      await new Promise<void>((_resolve, reject) => {
        signal.addEventListener('abort', () => reject(new Error('aborted')));
      });
    }
    this.delivered.push(notification);
  }

  close(): void {
    this.closeCalls += 1;
  }
}

class FakeBus implements IEventBus {
  readonly subscriptions = new Map<number, { handler: EventHandler; types?: readonly VerifierEventType[] }>();
  private nextId = 0;

  async publish(event: VerifierEvent): Promise<void> {
    for (const { handler, types } of [...this.subscriptions.values()]) {
      if (types === undefined || types.includes(event.type)) {
        await handler(event);
      }
    }
  }

  subscribe(handler: EventHandler, types?: readonly VerifierEventType[]): Unsubscribe {
    const id = this.nextId++;
    this.subscriptions.set(id, { handler, types });
    return () => {
      this.subscriptions.delete(id);
    };
  }

  disconnect(): void {
    this.subscriptions.clear();
  }
}

function notification(id: string, channel: string): Notification {
  return { id, channel, recipient: 'ops', title: 'Test', body: 'body', priority: 'normal' };
}

function event(severity: VerifierEvent['severity'], type: VerifierEventType = 'verification.failed'): VerifierEvent {
  return {
    id: 'evt-1',
    type,
    severity,
    source: 'orchestrator',
    timestamp: 1700000000000,
    payload: { provider: 'openai', model: 'gpt-4o' },
  };
}

describe('NotificationDispatcher', () => {
  const dispatchers: NotificationDispatcher[] = [];

  function build(channels: INotificationChannel[], config: DispatcherConfig = {}): NotificationDispatcher {
    const dispatcher = new NotificationDispatcher(config, { channels });
    dispatchers.push(dispatcher);
    return dispatcher;
  }

  afterEach(async () => {
    await Promise.all(dispatchers.splice(0).map((d) => d.close(0)));
    vi.useRealTimers();
  });

  describe('send', () => {
    it('resolves with the outcome of the delivery', async () => {
      const slack = new RecordingChannel('slack', 'light');
      const dispatcher = build([slack]);
      dispatcher.start();

      const outcome = await dispatcher.send(notification('n1', 'slack'));

      expect(outcome).toMatchObject({ notificationId: 'n1', channel: 'slack', ok: true });
      expect(slack.delivered.map((n) => n.id)).toEqual(['n1']);
    });

    it('reports channel failures and keeps the worker serving', async () => {
      const telegram = new RecordingChannel('telegram', 'standard', 'fail');
      const slack = new RecordingChannel('slack', 'light');
      const dispatcher = build([telegram, slack], { workers: 1 });
      dispatcher.start();

      const failed = await dispatcher.send(notification('n1', 'telegram'));
      const delivered = await dispatcher.send(notification('n2', 'slack'));

      expect(failed).toMatchObject({ ok: false, error: 'telegram unavailable' });
      expect(delivered.ok).toBe(true);
    });

    it('gives up on a channel that ignores the delivery deadline', async () => {
      const email = new RecordingChannel('email', 'heavy', 'stuck');
      const slack = new RecordingChannel('slack', 'light');
      const dispatcher = build([email, slack], { workers: 1, deliveryTimeoutMs: 50 });
      dispatcher.start();

      const stuck = await dispatcher.send(notification('n1', 'email'));
      const next = await dispatcher.send(notification('n2', 'slack'));

      expect(stuck).toMatchObject({ notificationId: 'n1', ok: false, error: 'delivery timed out after 50ms' });
      expect(email.delivered).toEqual([]);
      expect(next.ok).toBe(true);
    });

    it('fails notifications for unknown channels without queueing them', async () => {
      const dispatcher = build([new RecordingChannel('slack', 'light')]);

      const outcome = await dispatcher.send(notification('n1', 'pager'));

      expect(outcome).toEqual({
        notificationId: 'n1',
        channel: 'pager',
        ok: false,
        error: 'unknown channel "pager"',
        durationMs: 0,
      });
    });

    it('rejects with QueueFullError when the queue stays full for the send timeout', async () => {
      vi.useFakeTimers();
      const dispatcher = build([new RecordingChannel('slack', 'light')], { queueCapacity: 2 });

      const queued = [dispatcher.send(notification('n1', 'slack')), dispatcher.send(notification('n2', 'slack'))];
      const overflow = dispatcher.send(notification('n3', 'slack'));
      let settled = false;
      void overflow.then(
        () => {
          settled = true;
        },
        () => {
          settled = true;
        },
      );

      await vi.advanceTimersByTimeAsync(4999);
      expect(settled).toBe(false);

      await vi.advanceTimersByTimeAsync(1);
      await expect(overflow).rejects.toBeInstanceOf(QueueFullError);

      await dispatcher.close(0);
      const outcomes = await Promise.all(queued);
      expect(outcomes.map((o) => o.error)).toEqual([
        'dispatcher closed before delivery',
        'dispatcher closed before delivery',
      ]);
    });
  });

  describe('routing', () => {
    const channels = (): RecordingChannel[] => [
      new RecordingChannel('slack', 'light'),
      new RecordingChannel('telegram', 'standard'),
      new RecordingChannel('email', 'heavy'),
    ];

    it.each([
      ['critical', ['slack', 'telegram', 'email']],
      ['error', ['slack', 'telegram', 'email']],
      ['warning', ['slack', 'telegram']],
      ['info', ['slack']],
    ] as const)('routes %s events to %j', async (severity, expected) => {
      const dispatcher = build(channels());
      dispatcher.start();

      const outcomes = await dispatcher.sendEvent(event(severity));

      expect(outcomes.map((o) => o.channel)).toEqual(expected);
      expect(outcomes.every((o) => o.ok)).toBe(true);
    });

    it('sends info events to the lightest configured channel', () => {
      const dispatcher = build([new RecordingChannel('email', 'heavy'), new RecordingChannel('telegram', 'standard')]);

      expect(dispatcher.route('info').map((c) => c.id)).toEqual(['telegram']);
      expect(build([]).route('info')).toEqual([]);
    });

    it('renders the event into each notification', async () => {
      const slack = new RecordingChannel('slack', 'light');
      const dispatcher = build([slack]);
      dispatcher.start();

      await dispatcher.sendEvent(event('error'));

      expect(slack.delivered[0]).toMatchObject({
        id: 'evt-1:slack',
        channel: 'slack',
        recipient: 'slack-recipient',
        title: 'Verification failed: openai/gpt-4o',
        priority: 'high',
      });
    });

    it('returns failed outcomes once closed', async () => {
      const dispatcher = build(channels());
      await dispatcher.close(0);

      const outcomes = await dispatcher.sendEvent(event('error'));

      expect(outcomes.map((o) => o.error)).toEqual([
        'notification dispatcher is closed',
        'notification dispatcher is closed',
        'notification dispatcher is closed',
      ]);
    });
  });

  describe('attach', () => {
    it('delivers bus events and detaches on close', async () => {
      const slack = new RecordingChannel('slack', 'light');
      const bus = new FakeBus();
      const dispatcher = build([slack]);
      dispatcher.start();
      dispatcher.attach(bus);

      expect([...bus.subscriptions.values()][0]?.types).toEqual(DEFAULT_ATTACHED_TYPES);

      await bus.publish(event('info', 'verification.started'));
      await bus.publish(event('info', 'verification.completed'));
      await dispatcher.close(1000);

      expect(slack.delivered.map((n) => n.title)).toEqual(['Verification completed: openai/gpt-4o']);
      expect(bus.subscriptions.size).toBe(0);
      expect(slack.closeCalls).toBe(1);
    });
  });

  describe('close', () => {
    it('aborts deliveries still running after the grace period', async () => {
      const dispatcher = build([new RecordingChannel('pager', 'heavy', 'hang')]);
      dispatcher.start();

      const outcome = dispatcher.send(notification('n1', 'pager'));
      await dispatcher.close(20);

      await expect(outcome).resolves.toMatchObject({ ok: false, error: 'delivery aborted at shutdown' });
    });

    it('refuses new work once closed', async () => {
      const dispatcher = build([new RecordingChannel('slack', 'light')]);
      await dispatcher.close(0);
      await dispatcher.close(0);

      await expect(dispatcher.send(notification('n1', 'slack'))).rejects.toBeInstanceOf(DispatcherClosedError);
      expect(() => dispatcher.start()).toThrow(DispatcherClosedError);
      expect(dispatcher.closed).toBe(true);
    });
  });
});
