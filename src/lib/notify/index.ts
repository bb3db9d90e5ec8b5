import type { AppConfig } from '../config';
import { NotifyError, errorMessage } from '../errors';
import type { Executor } from '../executor';
import { logger } from '../logger';
import { DesktopNotifier } from './desktop';
import { EmailNotifier } from './email';
import type { Notification, Notifier } from './types';

export type { Notification, Notifier, Urgency } from './types';
export { DesktopNotifier } from './desktop';
export { EmailNotifier } from './email';

export interface NamedNotifier {
  channel: string;
  notifier: Notifier;
}

/** Tries every channel, then rejects if any of them failed. */
export class CompositeNotifier implements Notifier {
  constructor(private readonly channels: readonly NamedNotifier[]) {}

  get channelNames(): string[] {
    return this.channels.map(({ channel }) => channel);
  }

  async notify(notification: Notification): Promise<void> {
    const results = await Promise.allSettled(this.channels.map(({ notifier }) => notifier.notify(notification)));

    const failed: string[] = [];
    const reasons: string[] = [];
    results.forEach((result, index) => {
      if (result.status === 'rejected') {
        failed.push(this.channels[index].channel);
        reasons.push(result.reason instanceof NotifyError ? result.reason.detail : errorMessage(result.reason));
      }
    });

    if (failed.length > 0) {
      throw new NotifyError(failed.join(','), reasons.join('; '));
    }
  }
}

export function createNotifier(config: AppConfig, executor?: Executor): CompositeNotifier {
  const channels: NamedNotifier[] = [];
  const { desktop, email } = config.notifications;

  if (desktop.enabled) {
    channels.push({ channel: 'desktop', notifier: new DesktopNotifier(desktop, executor, config.watcher.notifyTimeoutMs) });
  }
  if (email?.enabled) {
    channels.push({ channel: 'email', notifier: new EmailNotifier(email) });
  }
  if (channels.length === 0) {
    logger.warn('Notify', 'All notification channels are disabled');
  }
  return new CompositeNotifier(channels);
}
