/**
 * NotifierApp - owns the cache and every task that reads or writes it.
 * Collaborators are passed in so the whole service runs against fakes in tests.
 */

import { CacheStore } from './cache/store.js';
import { CommandHandler } from './commands/handler.js';
import type { Config } from './config/index.js';
import { AgendaScheduler } from './tasks/agenda-scheduler.js';
import { AppointmentNotifier } from './tasks/appointment-notifier.js';
import type { Sleep } from './tasks/delivery.js';
import { MailNotifier } from './tasks/mail-notifier.js';
import { RefreshDriver } from './tasks/refresh-driver.js';
import { systemClock, type Clock, type MailboxProvider, type MessageGateway } from './types/notifier.js';
import { parseClockTime } from './utils/time.js';
import { logger as rootLogger, type Logger } from './utils/logger.js';

export interface NotifierAppDeps {
  config: Readonly<Config>;
  provider: MailboxProvider;
  appointmentGateway: MessageGateway;
  mailGateway: MessageGateway;
  clock?: Clock;
  sleep?: Sleep;
  logger?: Logger;
}

export class NotifierApp {
  readonly store = new CacheStore();
  readonly refresh: RefreshDriver;
  readonly appointments: AppointmentNotifier;
  readonly mail: MailNotifier;
  readonly commands: CommandHandler;
  readonly agenda: AgendaScheduler | null;
  private readonly logger: Logger;

  constructor(deps: NotifierAppDeps) {
    const { config } = deps;
    const clock = deps.clock ?? systemClock;
    this.logger = deps.logger ?? rootLogger;

    this.refresh = new RefreshDriver({
      store: this.store,
      provider: deps.provider,
      intervalSeconds: config.intervals.updateSeconds,
      clock,
      logger: this.logger.child('refresh'),
    });

    this.appointments = new AppointmentNotifier({
      store: this.store,
      gateway: deps.appointmentGateway,
      chatIds: config.allowedChatIds,
      intervalSeconds: config.intervals.appointmentRefreshSeconds,
      notifyLeadSeconds: config.intervals.appointmentNotifySeconds,
      timeZone: config.localTimezone,
      clock,
      logger: this.logger.child('appointments'),
    });

    this.mail = new MailNotifier({
      store: this.store,
      gateway: deps.mailGateway,
      chatIds: config.allowedChatIds,
      intervalSeconds: config.intervals.mailRefreshSeconds,
      timeZone: config.localTimezone,
      keywords: config.keywords,
      mentionText: config.mentionText,
      clock,
      logger: this.logger.child('mail'),
    });

    this.commands = new CommandHandler({
      store: this.store,
      timeZone: config.localTimezone,
      allowedChatIds: config.allowedChatIds,
      adminChatId: config.adminChatId,
      refreshState: () => this.refresh.getState(),
      clock,
      logger: this.logger.child('commands'),
    });

    const agendaTime = config.agendaTime ? parseClockTime(config.agendaTime) : null;
    this.agenda = agendaTime
      ? new AgendaScheduler({
          store: this.store,
          gateway: deps.appointmentGateway,
          chatIds: config.allowedChatIds,
          agendaTime,
          timeZone: config.localTimezone,
          buildMessages: () => this.commands.digest(),
          clock,
          sleep: deps.sleep,
          logger: this.logger.child('agenda'),
        })
      : null;
  }

  start(): void {
    this.logger.info('Starting notifier', { agenda: this.agenda !== null });
    this.refresh.start();
    this.appointments.start();
    this.mail.start();
    this.agenda?.start();
  }

  /** Stop every timer, abort agenda retries and wait for in-flight work */
  async stop(): Promise<void> {
    this.refresh.stop();
    this.appointments.stop();
    this.mail.stop();
    this.agenda?.stop();

    await Promise.all([
      this.refresh.drain(),
      this.appointments.drain(),
      this.mail.drain(),
      this.agenda?.drain(),
    ]);
    this.logger.info('Notifier stopped');
  }
}
