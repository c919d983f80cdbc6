import { ItemNotifier, type ItemNotifierOptions } from './item-notifier.js';
import { buildMailMessage } from '../format/messages.js';
import type { MailItem } from '../types/notifier.js';

export interface MailNotifierOptions extends ItemNotifierOptions {
  timeZone: string;
  keywords: readonly string[];
  mentionText: string;
}

/**
 * Forwards every new unread mail once, flagging the ones that match a keyword.
 */
export class MailNotifier extends ItemNotifier<MailItem> {
  private readonly timeZone: string;
  private readonly keywords: readonly string[];
  private readonly mentionText: string;

  constructor(options: MailNotifierOptions) {
    super('mail', 'mail', options);
    this.timeZone = options.timeZone;
    this.keywords = options.keywords;
    this.mentionText = options.mentionText;
  }

  protected collect(): MailItem[] {
    return this.store.unnotifiedMail();
  }

  protected format(item: MailItem): string {
    const { text, mentioned } = buildMailMessage(item, {
      timeZone: this.timeZone,
      keywords: this.keywords,
      mentionText: this.mentionText,
    });
    if (mentioned) {
      this.logger.info('Mail matched a keyword', { id: item.id });
    }
    return text;
  }
}
