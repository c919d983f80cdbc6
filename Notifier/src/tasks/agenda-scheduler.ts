/**
 * AgendaScheduler - sends the day's agenda and the unread-mail list once per
 * weekday, at or after the configured local time.
 *
 * Checked every minute by a croner job in the local time zone. The fired
 * date is recorded before delivery starts, so a second check during a slow
 * delivery does nothing.
 */

import { Cron } from 'croner';
import { deliverWithRetry, type Sleep } from './delivery.js';
import type { CacheStore } from '../cache/store.js';
import { systemClock, type Clock, type MessageGateway } from '../types/notifier.js';
import { isAtOrAfter, isWeekday, localDateKey, type ClockTime } from '../utils/time.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';

export const AGENDA_MAX_ATTEMPTS = 10;
export const AGENDA_RETRY_DELAY_MS = 60_000;

export interface AgendaSchedulerOptions {
  store: CacheStore;
  gateway: MessageGateway;
  chatIds: readonly string[];
  agendaTime: ClockTime;
  timeZone: string;
  /** Builds the messages to send, in order */
  buildMessages: () => string[];
  clock?: Clock;
  sleep?: Sleep;
  maxAttempts?: number;
  retryDelayMs?: number;
  logger?: Logger;
}

export interface ChatAgendaResult {
  chatId: string;
  delivered: number;
  attempts: number;
}

export class AgendaScheduler {
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly maxAttempts: number;
  private readonly retryDelayMs: number;
  private job: Cron | null = null;
  private controller = new AbortController();
  private current: Promise<ChatAgendaResult[]> | null = null;
  private lastFiredDate: string | null = null;

  constructor(private readonly options: AgendaSchedulerOptions) {
    this.logger = options.logger ?? rootLogger.child('agenda');
    this.clock = options.clock ?? systemClock;
    this.maxAttempts = options.maxAttempts ?? AGENDA_MAX_ATTEMPTS;
    this.retryDelayMs = options.retryDelayMs ?? AGENDA_RETRY_DELAY_MS;
  }

  start(): void {
    if (this.job) {
      this.logger.warn('Already started');
      return;
    }
    if (this.controller.signal.aborted) {
      this.controller = new AbortController();
    }

    const { hour, minute } = this.options.agendaTime;
    this.logger.info('Starting', { time: `${hour}:${String(minute).padStart(2, '0')}`, timeZone: this.options.timeZone });

    this.job = new Cron('* * * * *', { timezone: this.options.timeZone, protect: true }, () => {
      this.runOnce().catch((error: unknown) => {
        this.logger.error('Agenda check failed', { error });
      });
    });
  }

  stop(): void {
    this.job?.stop();
    this.job = null;
    this.controller.abort();
  }

  isRunning(): boolean {
    return this.job !== null;
  }

  getLastFiredDate(): string | null {
    return this.lastFiredDate;
  }

  shouldFire(now: Date): boolean {
    const { store, timeZone, agendaTime } = this.options;
    return (
      store.isReady() &&
      isWeekday(now, timeZone) &&
      isAtOrAfter(now, timeZone, agendaTime) &&
      this.lastFiredDate !== localDateKey(now, timeZone)
    );
  }

  /**
   * One scheduler check.
   * @returns per-chat results when the agenda fired, null otherwise
   */
  async runOnce(): Promise<ChatAgendaResult[] | null> {
    if (this.current) return null;

    const now = this.clock();
    if (!this.shouldFire(now)) return null;

    this.lastFiredDate = localDateKey(now, this.options.timeZone);
    this.logger.info('Sending agenda', { date: this.lastFiredDate });

    this.current = this.deliver(this.options.buildMessages());
    try {
      return await this.current;
    } finally {
      this.current = null;
    }
  }

  async drain(): Promise<void> {
    if (this.current) {
      // Failures are already reported to whoever called runOnce()
      await this.current.catch(() => undefined);
    }
  }

  private async deliver(messages: readonly string[]): Promise<ChatAgendaResult[]> {
    const results = await Promise.all(
      this.options.chatIds.map((chatId) => this.deliverToChat(chatId, messages)),
    );
    const delivered = results.reduce((sum, result) => sum + result.delivered, 0);
    this.logger.info('Agenda finished', { delivered, expected: messages.length * results.length });
    return results;
  }

  private async deliverToChat(chatId: string, messages: readonly string[]): Promise<ChatAgendaResult> {
    const { gateway, sleep } = this.options;
    const result: ChatAgendaResult = { chatId, delivered: 0, attempts: 0 };

    for (const text of messages) {
      const outcome = await deliverWithRetry(() => gateway.sendOnce(chatId, text), {
        maxAttempts: this.maxAttempts,
        delayMs: this.retryDelayMs,
        sleep,
        signal: this.controller.signal,
        onFailure: (attempt, error) => {
          this.logger.warn('Agenda delivery attempt failed', { chatId, attempt, error });
        },
      });
      result.attempts += outcome.attempts;

      if (outcome.delivered) {
        result.delivered++;
      } else if (outcome.aborted) {
        this.logger.info('Agenda delivery aborted by shutdown', { chatId });
        break;
      } else {
        this.logger.error('Giving up on agenda message for today', { chatId, attempts: outcome.attempts });
      }
    }
    return result;
  }
}
