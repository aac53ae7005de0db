/**
 * @module @llmverify/notifications
 * Notification dispatch for verification events.
 *
 * @example
 * ```typescript
 * import { NotificationDispatcher, SlackChannel, EmailChannel } from '@llmverify/notifications';
 *
 * const dispatcher = new NotificationDispatcher(
 *   { workers: 2 },
 *   {
 *     channels: [
 *       new SlackChannel({ webhookUrl: process.env.SLACK_WEBHOOK_URL ?? '' }),
 *       new EmailChannel({ from: 'verifier@example.com', to: ['ops@example.com'], smtp: { host: 'smtp.example.com', port: 587 } }),
 *     ],
 *     logger,
 *   },
 * );
 *
 * dispatcher.start();
 * dispatcher.attach(eventBus);
 * // ...
 * await dispatcher.close(5000);
 * ```
 */

export { NotificationDispatcher, DEFAULT_ATTACHED_TYPES } from './dispatcher.js';
export type { DispatcherConfig, DispatcherDeps } from './dispatcher.js';
export { BoundedQueue } from './queue.js';
export { QueueFullError, DispatcherClosedError } from './errors.js';
export { renderTitle, renderBody, priorityFor, TIMESTAMP_FORMAT } from './render.js';
export { TIER_RANK } from './types.js';
export type {
  NotificationPriority,
  ChannelTier,
  Notification,
  DeliveryOutcome,
  INotificationChannel,
} from './types.js';

export { SlackChannel } from './channels/slack.js';
export type { SlackChannelOptions } from './channels/slack.js';
export { TelegramChannel } from './channels/telegram.js';
export type { TelegramChannelOptions } from './channels/telegram.js';
export { MatrixChannel } from './channels/matrix.js';
export type { MatrixChannelOptions } from './channels/matrix.js';
export { WhatsAppChannel } from './channels/whatsapp.js';
export type { WhatsAppChannelOptions } from './channels/whatsapp.js';
export { EmailChannel } from './channels/email.js';
export type { EmailChannelOptions, SmtpSettings } from './channels/email.js';
