/**
 * @module @llmverify/notifications/queue
 * Fixed-capacity async queue with bounded producer waits.
 */

import { DispatcherClosedError, QueueFullError } from './errors.js';

interface PendingOffer<T> {
  item: T;
  resolve: () => void;
  reject: (error: Error) => void;
  timer: ReturnType<typeof setTimeout>;
}

/**
 * FIFO queue shared by producers calling `offer` and consumers calling `take`.
 *
 * A producer that finds the queue full waits up to `waitMs` for a consumer to
 * free a slot, then fails with QueueFullError. After `close()` consumers drain
 * what is left and then receive `undefined`.
 */
export class BoundedQueue<T> {
  private readonly items: T[] = [];
  private readonly takers: Array<(item: T | undefined) => void> = [];
  private readonly offers: Array<PendingOffer<T>> = [];
  private isClosed = false;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.items.length;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  offer(item: T, waitMs: number): Promise<void> {
    if (this.isClosed) {
      return Promise.reject(new DispatcherClosedError('notification queue is closed'));
    }

    const taker = this.takers.shift();
    if (taker) {
      taker(item);
      return Promise.resolve();
    }

    if (this.items.length < this.capacity) {
      this.items.push(item);
      return Promise.resolve();
    }

    if (waitMs <= 0) {
      return Promise.reject(new QueueFullError(this.capacity, waitMs));
    }

    return new Promise<void>((resolve, reject) => {
      const pending: PendingOffer<T> = {
        item,
        resolve,
        reject,
        timer: setTimeout(() => {
          const index = this.offers.indexOf(pending);
          if (index !== -1) this.offers.splice(index, 1);
          reject(new QueueFullError(this.capacity, waitMs));
        }, waitMs),
      };
      this.offers.push(pending);
    });
  }

  take(): Promise<T | undefined> {
    if (this.items.length > 0) {
      const item = this.items.shift();
      this.admitWaitingOffer();
      return Promise.resolve(item);
    }
    if (this.isClosed) {
      return Promise.resolve(undefined);
    }
    return new Promise((resolve) => {
      this.takers.push(resolve);
    });
  }

  /**
   * Stop accepting items. Waiting consumers get `undefined`; waiting producers
   * are rejected. Queued items stay available to `take` and `drain`.
   */
  close(): void {
    if (this.isClosed) return;
    this.isClosed = true;

    for (const taker of this.takers.splice(0)) {
      taker(undefined);
    }
    for (const pending of this.offers.splice(0)) {
      clearTimeout(pending.timer);
      pending.reject(new DispatcherClosedError('notification queue is closed'));
    }
  }

  /**
   * Remove and return every queued item.
   */
  drain(): T[] {
    return this.items.splice(0);
  }

  private admitWaitingOffer(): void {
    const pending = this.offers.shift();
    if (!pending) return;
    clearTimeout(pending.timer);
    this.items.push(pending.item);
    pending.resolve();
  }
}
