/**
 * @module @llmverify/notifications/channels/email
 * Email channel over SMTP via nodemailer.
 */

import nodemailer from 'nodemailer';
import type { Transporter } from 'nodemailer';
import type { ChannelTier, INotificationChannel, Notification } from '../types.js';

export interface SmtpSettings {
  host: string;
  port: number;
  secure?: boolean;
  user?: string;
  pass?: string;
}

export interface EmailChannelOptions {
  from: string;
  to: string[];
  /** SMTP server, or a ready transporter (tests pass a JSON transport) */
  smtp?: SmtpSettings;
  transport?: Transporter;
  id?: string;
}

export class EmailChannel implements INotificationChannel {
  readonly id: string;
  readonly tier: ChannelTier = 'heavy';
  readonly recipient: string;
  private readonly from: string;
  private readonly to: string[];
  private readonly transport: Transporter;

  constructor(options: EmailChannelOptions) {
    if (options.to.length === 0) {
      throw new Error('Email channel requires at least one recipient');
    }
    this.id = options.id ?? 'email';
    this.from = options.from;
    this.to = options.to;
    this.recipient = options.to.join(', ');
    this.transport = options.transport ?? createSmtpTransport(options.smtp);
  }

  async deliver(notification: Notification, signal: AbortSignal): Promise<void> {
    signal.throwIfAborted();
    await this.transport.sendMail({
      from: this.from,
      to: this.to.join(', '),
      subject: `[${notification.priority}] ${notification.title}`,
      text: notification.body,
    });
  }

  close(): void {
    this.transport.close();
  }
}

function createSmtpTransport(smtp: SmtpSettings | undefined): Transporter {
  if (!smtp) {
    throw new Error('Email channel requires SMTP settings or a transport');
  }
  const port = smtp.port;
  return nodemailer.createTransport({
    host: smtp.host,
    port,
    secure: smtp.secure ?? port === 465,
    auth: smtp.user && smtp.pass ? { user: smtp.user, pass: smtp.pass } : undefined,
  });
}
