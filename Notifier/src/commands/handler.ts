/**
 * Chat commands served from the cache. Read-only: nothing here touches
 * `notified` flags or the provider.
 */

import type { CacheStore } from '../cache/store.js';
import { buildCheckList, buildOverlapList, buildTodayList, escapeHtml } from '../format/messages.js';
import { systemClock, type Clock } from '../types/notifier.js';
import { formatLocal } from '../utils/time.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';

export type CommandName = 'today' | 'check' | 'overlaps' | 'status';

export interface CommandHandlerOptions {
  store: CacheStore;
  timeZone: string;
  allowedChatIds: readonly string[];
  adminChatId: string;
  /** Reports the refresh driver state for /status */
  refreshState?: () => string;
  clock?: Clock;
  logger?: Logger;
}

const COMMAND_RE = /^\/([a-z]+)(?:@\w+)?(?:\s|$)/i;

export function parseCommand(text: string): CommandName | null {
  const match = COMMAND_RE.exec(text.trim());
  if (!match) return null;
  const name = match[1].toLowerCase();
  switch (name) {
    case 'today':
    case 'check':
    case 'overlaps':
    case 'status':
      return name;
    default:
      return null;
  }
}

export class CommandHandler {
  private readonly store: CacheStore;
  private readonly timeZone: string;
  private readonly allowed: ReadonlySet<string>;
  private readonly adminChatId: string;
  private readonly refreshState: () => string;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(options: CommandHandlerOptions) {
    this.store = options.store;
    this.timeZone = options.timeZone;
    this.allowed = new Set(options.allowedChatIds);
    this.adminChatId = options.adminChatId;
    this.refreshState = options.refreshState ?? (() => 'unknown');
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? rootLogger.child('commands');
  }

  /**
   * Reply text for a chat message, or null when the message is not a known
   * command or the chat may not use it.
   */
  handle(chatId: string, text: string): string | null {
    const command = parseCommand(text);
    if (!command) return null;

    if (command === 'status') {
      if (chatId !== this.adminChatId) {
        this.logger.debug('Ignoring /status from non-admin chat', { chatId });
        return null;
      }
      return this.status();
    }

    if (!this.allowed.has(chatId)) {
      this.logger.debug('Ignoring command from unauthorized chat', { chatId, command });
      return null;
    }

    this.logger.info('Handling command', { chatId, command });
    switch (command) {
      case 'today':
        return this.today();
      case 'check':
        return this.check();
      case 'overlaps':
        return buildOverlapList(this.store.listAppointments(), this.timeZone);
    }
  }

  today(): string {
    return buildTodayList(this.store.listAppointments(), this.timeZone, this.clock());
  }

  check(): string {
    return buildCheckList(this.store.listMail(), this.timeZone);
  }

  /** Messages the agenda sends, in order */
  digest(): string[] {
    return [this.today(), this.check()];
  }

  status(): string {
    const status = this.store.getStatus();
    const refreshed = status.fetchedAt ? formatLocal(status.fetchedAt, this.timeZone) : 'never';
    return [
      '<b>Status</b>',
      `Ready: ${status.ready ? 'yes' : 'no'}`,
      `Refresh: ${escapeHtml(this.refreshState())}`,
      `Last refresh: ${refreshed}`,
      `Appointments: ${status.appointments} (${status.pendingAppointments} pending)`,
      `Unread mail: ${status.mails} (${status.pendingMails} pending)`,
    ].join('\n');
  }
}
