/**
 * @module @llmverify/notifications/channels/whatsapp
 * WhatsApp messages through Twilio's Messages API, one request per recipient.
 */

import type { ChannelTier, INotificationChannel, Notification } from '../types.js';

export interface WhatsAppChannelOptions {
  accountSid: string;
  authToken: string;
  /** Sender, e.g. whatsapp:+14155550100 */
  from: string;
  to: string[];
  /** API base (default: https://api.twilio.com) */
  apiBase?: string;
  id?: string;
  fetchImpl?: typeof fetch;
}

export class WhatsAppChannel implements INotificationChannel {
  readonly id: string;
  readonly tier: ChannelTier = 'heavy';
  readonly recipient: string;
  private readonly url: string;
  private readonly authorization: string;
  private readonly from: string;
  private readonly to: string[];
  private readonly fetchImpl: typeof fetch;

  constructor(options: WhatsAppChannelOptions) {
    if (options.to.length === 0) {
      throw new Error('WhatsApp channel requires at least one recipient');
    }
    this.id = options.id ?? 'whatsapp';
    this.from = withPrefix(options.from);
    this.to = options.to.map(withPrefix);
    this.recipient = this.to.join(', ');
    const base = (options.apiBase ?? 'https://api.twilio.com').replace(/\/+$/, '');
    this.url = `${base}/2010-04-01/Accounts/${encodeURIComponent(options.accountSid)}/Messages.json`;
    this.authorization = `Basic ${Buffer.from(`${options.accountSid}:${options.authToken}`).toString('base64')}`;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async deliver(notification: Notification, signal: AbortSignal): Promise<void> {
    const failures: string[] = [];
    for (const to of this.to) {
      // eslint-disable-next-line no-await-in-loop -- recipients are messaged one at a time
      const response = await this.fetchImpl(this.url, {
        method: 'POST',
        headers: {
          Authorization: this.authorization,
          'Content-Type': 'application/x-www-form-urlencoded',
        },
        body: new URLSearchParams({
          From: this.from,
          To: to,
          Body: `${notification.title}\n\n${notification.body}`,
        }).toString(),
        signal,
      });
      if (!response.ok) {
        // eslint-disable-next-line no-await-in-loop
        failures.push(`${to}: status=${response.status} ${await response.text()}`);
      }
    }

    if (failures.length > 0) {
      throw new Error(`WhatsApp send failed for ${failures.join('; ')}`);
    }
  }
}

function withPrefix(number: string): string {
  return number.startsWith('whatsapp:') ? number : `whatsapp:${number}`;
}
