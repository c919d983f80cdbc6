/**
 * Fakes and builders for the notifier unit tests.
 */

import { ConfigSchema, type Config } from '../../src/config/schema.js';
import type {
  AppointmentData,
  MailData,
  MailboxProvider,
  MessageGateway,
  ProviderSnapshot,
} from '../../src/types/notifier.js';
import { DeliveryError } from '../../src/utils/errors.js';

export interface SentMessage {
  chatId: string;
  text: string;
}

/** Records every send attempt; fails for the chats (or everything) it is told to */
export class FakeGateway implements MessageGateway {
  readonly attempts: SentMessage[] = [];
  readonly sent: SentMessage[] = [];
  readonly failingChats = new Set<string>();
  failAll = false;

  constructor(readonly name = 'fake') {}

  async send(chatId: string, text: string): Promise<void> {
    await this.sendOnce(chatId, text);
  }

  async sendOnce(chatId: string, text: string): Promise<void> {
    this.attempts.push({ chatId, text });
    if (this.failAll || this.failingChats.has(chatId)) {
      throw new DeliveryError(`chat ${chatId} unreachable`, chatId);
    }
    this.sent.push({ chatId, text });
  }
}

type ProviderStep = ProviderSnapshot | Error;

/** Returns queued snapshots or throws queued errors; repeats the last step */
export class FakeProvider implements MailboxProvider {
  calls = 0;
  private readonly steps: ProviderStep[];

  constructor(...steps: ProviderStep[]) {
    this.steps = steps.length > 0 ? steps : [{ appointments: [], mails: [] }];
  }

  async fetchSnapshot(): Promise<ProviderSnapshot> {
    const step = this.steps[Math.min(this.calls, this.steps.length - 1)];
    this.calls++;
    if (step instanceof Error) throw step;
    return step;
  }
}

export function appointment(
  id: string,
  start: string,
  durationMinutes = 30,
  extra: Partial<AppointmentData> = {},
): AppointmentData {
  const startTime = new Date(start);
  return {
    id,
    subject: `Meeting ${id}`,
    startTime,
    endTime: new Date(startTime.getTime() + durationMinutes * 60_000),
    location: '',
    organizer: 'Alice',
    ...extra,
  };
}

export function mail(id: string, received: string, extra: Partial<MailData> = {}): MailData {
  return {
    id,
    subject: `Subject ${id}`,
    sender: 'Bob',
    receivedTime: new Date(received),
    preview: '',
    ...extra,
  };
}

export interface TestClock {
  clock: () => Date;
  set(iso: string): void;
  advance(ms: number): void;
}

export function testClock(iso: string): TestClock {
  let now = new Date(iso).getTime();
  return {
    clock: () => new Date(now),
    set: (next) => {
      now = new Date(next).getTime();
    },
    advance: (ms) => {
      now += ms;
    },
  };
}

export const TEST_ENV: Record<string, string> = {
  OUTLOOK_CLIENT_ID: 'test-client',
  OUTLOOK_TENANT_ID: 'test-tenant',
  OUTLOOK_USERNAME: 'user@example.com',
  OUTLOOK_PASSWORD: 'test-password',
  TELEGRAM_API_ID: '12345',
  TELEGRAM_API_HASH: 'test-hash',
  APPOINTMENT_BOT_TOKEN: 'test-token-a',
  MAIL_BOT_TOKEN: 'test-token-m',
  UPDATE_INTERVAL: '60',
  APPOINTMENT_REFRESH_INTERVAL: '30',
  APPOINTMENT_NOTIFY_INTERVAL: '600',
  MAIL_REFRESH_INTERVAL: '30',
  ALLOWED_CHAT_IDS: '111,-222',
  ADMIN_CHAT_ID: '111',
  LOCAL_TIMEZONE: 'UTC',
};

export function testConfig(overrides: Partial<Config> = {}): Config {
  const base = ConfigSchema.parse({
    outlook: {
      clientId: 'test-client',
      tenantId: 'test-tenant',
      username: 'user@example.com',
      password: 'test-password',
    },
    telegram: {
      apiId: 12345,
      apiHash: 'test-hash',
      appointmentBotToken: 'test-token-a',
      mailBotToken: 'test-token-m',
    },
    intervals: {
      updateSeconds: 60,
      appointmentRefreshSeconds: 30,
      appointmentNotifySeconds: 600,
      mailRefreshSeconds: 30,
    },
    allowedChatIds: ['111', '-222'],
    adminChatId: '111',
    localTimezone: 'UTC',
  });
  return { ...base, ...overrides };
}
