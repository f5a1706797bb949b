import { get_user_lang } from './db.js';
import { resolve_lang, t } from './i18n/index.js';
import type { Notifier } from './notifier.js';
import type { NotificationEvent } from './types.js';

/** The slice of grammy's `Api` the notifier needs. */
export interface MessageSender {
  sendMessage(chat_id: string, text: string): Promise<unknown>;
}

export function render_notification(event: NotificationEvent, lng: string): string {
  const title = t(`notify.${event.type}.title`, lng);
  const body = t(`notify.${event.type}.body`, lng, event.data);
  return `${title}\n${body}`;
}

/**
 * Delivers events as Telegram messages. User ids are Telegram user ids, which
 * double as private chat ids.
 */
export class TelegramNotifier implements Notifier {
  constructor(private readonly api: MessageSender) {}

  async notify(event: NotificationEvent): Promise<void> {
    const lng = resolve_lang(get_user_lang(event.user_id));
    await this.api.sendMessage(event.user_id, render_notification(event, lng));
  }
}
