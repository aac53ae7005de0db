/**
 * @module @llmverify/verifier/semaphore
 * Counting semaphore bounding concurrent verifications per provider.
 */

export interface SemaphoreSnapshot {
  limit: number;
  active: number;
  queued: number;
}

export class Semaphore {
  private active = 0;
  private readonly queue: Array<() => void> = [];
  private readonly limit: number;

  constructor(limit: number) {
    this.limit = Math.max(1, Math.floor(limit));
  }

  snapshot(): SemaphoreSnapshot {
    return {
      limit: this.limit,
      active: this.active,
      queued: this.queue.length,
    };
  }

  /**
   * Run `task` once a slot is free. Waiters are served in arrival order.
   */
  async use<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }

  private async acquire(): Promise<void> {
    if (this.active < this.limit) {
      this.active += 1;
      return;
    }

    await new Promise<void>((resolve) => {
      this.queue.push(() => {
        this.active += 1;
        resolve();
      });
    });
  }

  private release(): void {
    this.active = Math.max(0, this.active - 1);
    this.drain();
  }

  private drain(): void {
    while (this.active < this.limit) {
      const next = this.queue.shift();
      if (!next) return;
      next();
    }
  }
}
