/**
 * @module @llmverify/notifications/channels/telegram
 * Telegram Bot API channel (sendMessage).
 */

import type { ChannelTier, INotificationChannel, Notification } from '../types.js';

export interface TelegramChannelOptions {
  botToken: string;
  chatId: string;
  /** Bot API base (default: https://api.telegram.org) */
  apiBase?: string;
  id?: string;
  fetchImpl?: typeof fetch;
}

export class TelegramChannel implements INotificationChannel {
  readonly id: string;
  readonly tier: ChannelTier = 'standard';
  readonly recipient: string;
  private readonly url: string;
  private readonly fetchImpl: typeof fetch;

  constructor(options: TelegramChannelOptions) {
    this.id = options.id ?? 'telegram';
    this.recipient = options.chatId;
    this.url = `${(options.apiBase ?? 'https://api.telegram.org').replace(/\/+$/, '')}/bot${options.botToken}/sendMessage`;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async deliver(notification: Notification, signal: AbortSignal): Promise<void> {
    const response = await this.fetchImpl(this.url, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
      },
      body: JSON.stringify({
        chat_id: this.recipient,
        text: `${notification.title}\n\n${notification.body}`,
        disable_web_page_preview: true,
      }),
      signal,
    });

    const text = await response.text();
    const description = apiDescription(text);
    if (!response.ok || description.ok === false) {
      throw new Error(`Telegram sendMessage failed: ${description.text ?? `status=${response.status}`}`);
    }
  }
}

// Bot API answers {"ok": bool, "description"?: string}
function apiDescription(body: string): { ok?: boolean; text?: string } {
  try {
    const parsed: unknown = JSON.parse(body);
    if (typeof parsed !== 'object' || parsed === null) return {};
    return {
      ...('ok' in parsed && typeof parsed.ok === 'boolean' && { ok: parsed.ok }),
      ...('description' in parsed && typeof parsed.description === 'string' && { text: parsed.description }),
    };
  } catch {
    return body.length > 0 ? { text: body } : {};
  }
}
