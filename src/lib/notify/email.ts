import nodemailer, { type Transporter } from 'nodemailer';
import type { EmailConfig } from '../config';
import { NotifyError, errorMessage } from '../errors';
import { logger } from '../logger';
import type { Notification, Notifier } from './types';

const escapeHtml = (text: string) =>
  text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;').replace(/"/g, '&quot;');

export function formatAlertHtml(notification: Notification): string {
  return `<div style="font-family: sans-serif; padding: 20px; border: 1px solid #eee; border-radius: 5px;">
    <h2 style="color: #e53e3e;">${escapeHtml(notification.title)}</h2>
    <p style="font-size: 16px; line-height: 1.5;">${escapeHtml(notification.body).replace(/\n/g, '<br>')}</p>
    <hr style="border: 0; border-top: 1px solid #eee; margin: 20px 0;">
    <p style="color: #718096; font-size: 12px;">Sent by unitscope-watch</p>
  </div>`;
}

export class EmailNotifier implements Notifier {
  private readonly transporter: Transporter;

  constructor(private readonly config: EmailConfig) {
    this.transporter = nodemailer.createTransport({
      host: config.host,
      port: config.port,
      secure: config.secure,
      auth: config.user ? { user: config.user, pass: config.pass } : undefined,
    });
  }

  async notify(notification: Notification): Promise<void> {
    try {
      await this.transporter.sendMail({
        from: this.config.from,
        to: this.config.to.join(', '),
        subject: `[unitscope] ${notification.title}`,
        text: notification.body,
        html: formatAlertHtml(notification),
      });
      logger.info('Email', `Sent alert to ${this.config.to.join(', ')}`);
    } catch (error) {
      throw new NotifyError('email', `Failed to send alert: ${errorMessage(error)}`, { cause: error });
    }
  }
}
