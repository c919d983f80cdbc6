/**
 * RefreshDriver - pulls today's appointments and unread mail from the
 * provider and swaps them into the cache.
 *
 * idle → fetching → idle on success or a transient failure.
 * idle → fetching → halted on an authorization failure; halted is final.
 */

import { PeriodicTask } from './periodic-task.js';
import type { CacheStore } from '../cache/store.js';
import { systemClock, type Clock, type MailboxProvider } from '../types/notifier.js';
import { ProviderAuthError } from '../utils/errors.js';
import { minutesUntil } from '../utils/time.js';
import type { Logger } from '../utils/logger.js';

export type RefreshState = 'idle' | 'fetching' | 'halted';

export interface RefreshDriverOptions {
  store: CacheStore;
  provider: MailboxProvider;
  intervalSeconds: number;
  clock?: Clock;
  logger?: Logger;
}

export class RefreshDriver extends PeriodicTask {
  private readonly store: CacheStore;
  private readonly provider: MailboxProvider;
  private readonly clock: Clock;
  private state: RefreshState = 'idle';
  private haltReason: string | null = null;

  constructor(options: RefreshDriverOptions) {
    super('refresh', options.intervalSeconds * 1000, options.logger);
    this.store = options.store;
    this.provider = options.provider;
    this.clock = options.clock ?? systemClock;
  }

  getState(): RefreshState {
    return this.state;
  }

  getHaltReason(): string | null {
    return this.haltReason;
  }

  override start(): void {
    if (this.state === 'halted') {
      this.logger.warn('Refresh is halted, not starting', { reason: this.haltReason });
      return;
    }
    super.start();
  }

  protected async tick(): Promise<void> {
    if (this.state === 'halted') return;

    this.state = 'fetching';
    this.logger.info('Refreshing from provider');

    try {
      const snapshot = await this.provider.fetchSnapshot(this.clock());
      const now = this.clock();
      const result = this.store.replaceSnapshot(snapshot.appointments, snapshot.mails, now);

      const upcoming = snapshot.appointments.filter((item) => item.startTime.getTime() > now.getTime());
      const nearest = upcoming.reduce<Date | null>(
        (min, item) => (min === null || item.startTime < min ? item.startTime : min),
        null,
      );

      this.state = 'idle';
      this.logger.info('Refresh completed', {
        appointments: result.appointments,
        upcoming: upcoming.length,
        minutesToNext: nearest ? minutesUntil(now, nearest) : null,
        unreadMail: result.mails,
        newMail: result.newMails,
      });
    } catch (error) {
      if (error instanceof ProviderAuthError) {
        this.state = 'halted';
        this.haltReason = error.message;
        this.stop();
        this.logger.error('Provider rejected credentials - refresh halted until restart', { error });
        return;
      }

      this.state = 'idle';
      this.logger.warn('Refresh failed, keeping previous snapshot', { error });
    }
  }
}
