/**
 * @module @llmverify/notifications/channels/slack
 * Slack incoming-webhook channel.
 */

import type { ChannelTier, INotificationChannel, Notification } from '../types.js';

export interface SlackChannelOptions {
  webhookUrl: string;
  /** Channel override sent with the payload, e.g. "#llm-alerts" */
  channel?: string;
  username?: string;
  id?: string;
  fetchImpl?: typeof fetch;
}

export class SlackChannel implements INotificationChannel {
  readonly id: string;
  readonly tier: ChannelTier = 'light';
  readonly recipient: string;
  private readonly webhookUrl: string;
  private readonly channel?: string;
  private readonly username: string;
  private readonly fetchImpl: typeof fetch;

  constructor(options: SlackChannelOptions) {
    this.id = options.id ?? 'slack';
    this.webhookUrl = options.webhookUrl;
    this.channel = options.channel;
    this.username = options.username ?? 'LLM Verifier';
    this.recipient = options.channel ?? 'webhook';
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async deliver(notification: Notification, signal: AbortSignal): Promise<void> {
    const response = await this.fetchImpl(this.webhookUrl, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
      },
      body: JSON.stringify({
        text: `*${notification.title}*\n${notification.body}`,
        username: this.username,
        ...(this.channel !== undefined && { channel: this.channel }),
      }),
      signal,
    });

    if (!response.ok) {
      const text = await response.text();
      throw new Error(`Slack webhook call failed: status=${response.status} body=${text}`);
    }
  }
}
