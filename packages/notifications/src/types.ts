/**
 * @module @llmverify/notifications/types
 * Notification and channel contracts.
 */

import type { VerifierEvent } from '@llmverify/core';

export type NotificationPriority = 'low' | 'normal' | 'high' | 'critical';

/**
 * Delivery cost class of a channel. Routing picks cheaper tiers for less
 * severe events.
 */
export type ChannelTier = 'light' | 'standard' | 'heavy';

export const TIER_RANK: Record<ChannelTier, number> = {
  light: 0,
  standard: 1,
  heavy: 2,
};

/**
 * One message for one channel. Delivered at most once; the dispatcher never retries.
 */
export interface Notification {
  id: string;
  /** Channel id the notification is routed to */
  channel: string;
  recipient: string;
  title: string;
  body: string;
  priority: NotificationPriority;
  event?: VerifierEvent;
}

export interface DeliveryOutcome {
  notificationId: string;
  channel: string;
  ok: boolean;
  error?: string;
  durationMs: number;
}

export interface INotificationChannel {
  readonly id: string;
  readonly tier: ChannelTier;
  /** Human-readable destination (room, chat id, address list) */
  readonly recipient: string;
  /** Deliver once; rejects on failure. Must stop when `signal` aborts. */
  deliver(notification: Notification, signal: AbortSignal): Promise<void>;
  /** Release connections; called once when the dispatcher closes */
  close?(): void | Promise<void>;
}
