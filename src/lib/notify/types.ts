export type Urgency = 'low' | 'normal' | 'critical';

export interface Notification {
  title: string;
  body: string;
  urgency: Urgency;
  /** Notifications with the same key replace each other where the channel supports it. */
  key?: string;
}

export interface Notifier {
  /** Rejects with a NotifyError when the notification could not be delivered. */
  notify(notification: Notification): Promise<void>;
}
