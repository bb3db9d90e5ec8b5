import type { DesktopConfig } from '../config';
import { NotifyError, errorMessage } from '../errors';
import { getExecutor, type Executor } from '../executor';
import { logger } from '../logger';
import type { Notification, Notifier } from './types';

export const NOTIFY_SEND = 'notify-send';
export const DEFAULT_NOTIFY_SEND_TIMEOUT_MS = 5_000;

export function notifySendArgs(config: DesktopConfig, notification: Notification, replaceId?: string): string[] {
  const args = [
    `--app-name=${config.appName}`,
    `--urgency=${notification.urgency}`,
    `--icon=${config.icon}`,
  ];
  if (config.expireMs !== undefined) {
    args.push(`--expire-time=${config.expireMs}`);
  }
  if (config.replace && notification.key !== undefined) {
    args.push('--print-id');
    if (replaceId) args.push(`--replace-id=${replaceId}`);
  }
  args.push(notification.title, notification.body);
  return args;
}

/** Desktop notifications through libnotify's `notify-send`. */
export class DesktopNotifier implements Notifier {
  // notification id by key, as printed by notify-send
  private readonly ids = new Map<string, string>();

  constructor(
    private readonly config: DesktopConfig,
    private readonly executor: Executor = getExecutor(),
    private readonly timeoutMs: number = DEFAULT_NOTIFY_SEND_TIMEOUT_MS,
  ) {}

  async notify(notification: Notification): Promise<void> {
    const { key } = notification;
    const replaceId = key === undefined ? undefined : this.ids.get(key);
    try {
      const { stdout } = await this.executor.exec(NOTIFY_SEND, notifySendArgs(this.config, notification, replaceId), {
        timeoutMs: this.timeoutMs,
      });
      const id = stdout.trim();
      if (this.config.replace && key !== undefined && /^\d+$/.test(id)) {
        this.ids.set(key, id);
      }
      logger.debug('Notify', `Desktop notification sent: ${notification.title}`);
    } catch (error) {
      throw new NotifyError('desktop', `${NOTIFY_SEND} failed: ${errorMessage(error)}`, { cause: error });
    }
  }
}
