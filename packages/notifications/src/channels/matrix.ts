/**
 * @module @llmverify/notifications/channels/matrix
 * Matrix client-server API channel (m.room.message).
 */

import type { ChannelTier, INotificationChannel, Notification } from '../types.js';

export interface MatrixChannelOptions {
  /** e.g. https://matrix.example.org */
  homeserverUrl: string;
  accessToken: string;
  /** Room id such as !abc123:example.org */
  roomId: string;
  id?: string;
  fetchImpl?: typeof fetch;
}

export class MatrixChannel implements INotificationChannel {
  readonly id: string;
  readonly tier: ChannelTier = 'standard';
  readonly recipient: string;
  private readonly roomUrl: string;
  private readonly accessToken: string;
  private readonly fetchImpl: typeof fetch;

  constructor(options: MatrixChannelOptions) {
    this.id = options.id ?? 'matrix';
    this.recipient = options.roomId;
    this.accessToken = options.accessToken;
    const base = options.homeserverUrl.replace(/\/+$/, '');
    this.roomUrl = `${base}/_matrix/client/v3/rooms/${encodeURIComponent(options.roomId)}/send/m.room.message`;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async deliver(notification: Notification, signal: AbortSignal): Promise<void> {
    // The notification id doubles as transaction id, so a resend cannot post twice
    const response = await this.fetchImpl(`${this.roomUrl}/${encodeURIComponent(notification.id)}`, {
      method: 'PUT',
      headers: {
        Authorization: `Bearer ${this.accessToken}`,
        'Content-Type': 'application/json',
      },
      body: JSON.stringify({
        msgtype: 'm.text',
        body: `${notification.title}\n\n${notification.body}`,
      }),
      signal,
    });

    if (!response.ok) {
      const detail = matrixError(await response.text());
      throw new Error(`Matrix send failed: status=${response.status} ${detail}`);
    }
  }
}

// Error bodies look like {"errcode": "M_FORBIDDEN", "error": "..."}
function matrixError(body: string): string {
  try {
    const parsed: unknown = JSON.parse(body);
    if (typeof parsed === 'object' && parsed !== null && 'errcode' in parsed && typeof parsed.errcode === 'string') {
      const message = 'error' in parsed && typeof parsed.error === 'string' ? `: ${parsed.error}` : '';
      return `${parsed.errcode}${message}`;
    }
  } catch {
    // not JSON; fall through to the raw body
  }
  return body;
}
