/**
 * @module @llmverify/notifications/errors
 */

import { VerifierError } from '@llmverify/core';

/**
 * The queue stayed full for the whole bounded wait.
 */
export class QueueFullError extends VerifierError {
  constructor(
    public readonly capacity: number,
    public readonly waitMs: number,
  ) {
    super({ kind: 'queue_full', message: `notification queue full (capacity ${capacity}) after waiting ${waitMs}ms` });
    this.name = 'QueueFullError';
  }
}

/**
 * The dispatcher (or its queue) no longer accepts notifications.
 */
export class DispatcherClosedError extends Error {
  constructor(message = 'notification dispatcher is closed') {
    super(message);
    this.name = 'DispatcherClosedError';
  }
}
