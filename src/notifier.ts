import type { NotificationEvent } from './types.js';

/** Delivery transport for notification events. Delivery is fire-and-forget. */
export interface Notifier {
  notify(event: NotificationEvent): Promise<void>;
}

/** Keeps every event in memory. Used when no transport is configured. */
export class OutboxNotifier implements Notifier {
  readonly sent: NotificationEvent[] = [];

  async notify(event: NotificationEvent): Promise<void> {
    this.sent.push(event);
  }

  clear(): void {
    this.sent.length = 0;
  }
}

let _notifier: Notifier = new OutboxNotifier();

export function set_notifier(notifier: Notifier): void {
  _notifier = notifier;
}

export function get_notifier(): Notifier {
  return _notifier;
}

/** Sends events after the state change has committed. Failures are logged, never thrown. */
export function emit(...events: NotificationEvent[]): void {
  for (const event of events) {
    _notifier.notify(event).catch((err: unknown) => {
      console.error(`[notifier] Failed to deliver ${event.type} to ${event.user_id}:`, err);
    });
  }
}
