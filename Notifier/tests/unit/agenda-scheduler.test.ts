import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';
import { createSilentLogger } from '@notifier/shared/Testing/index.js';
import { CacheStore } from '../../src/cache/store.js';
import { AgendaScheduler } from '../../src/tasks/agenda-scheduler.js';
import type { Sleep } from '../../src/tasks/delivery.js';
import { TelegramBot } from '../../src/telegram/bot.js';
import type { BotTransport } from '../../src/telegram/transport.js';
import { FakeGateway, testClock, type TestClock } from './helpers.js';

/** Transport whose every send times out */
class TimingOutTransport implements BotTransport {
  sends = 0;

  async start(): Promise<void> {}

  async sendHtml(): Promise<void> {
    this.sends++;
    throw new Error('connect ETIMEDOUT');
  }

  onText(): void {}

  isConnected(): boolean {
    return true;
  }

  async disconnect(): Promise<void> {}
}

describe('AgendaScheduler', () => {
  let store: CacheStore;
  let gateway: FakeGateway;
  let time: TestClock;
  let sleep: Mock<Sleep>;
  let scheduler: AgendaScheduler;

  function createScheduler(messages: string[] = ['today', 'check'], chatIds = ['111']): AgendaScheduler {
    return new AgendaScheduler({
      store,
      gateway,
      chatIds,
      agendaTime: { hour: 9, minute: 0 },
      timeZone: 'UTC',
      buildMessages: () => messages,
      clock: time.clock,
      sleep,
      logger: createSilentLogger(),
    });
  }

  beforeEach(() => {
    store = new CacheStore();
    store.replaceSnapshot([], []);
    gateway = new FakeGateway('appointments');
    // Monday
    time = testClock('2026-10-19T09:00:30Z');
    sleep = vi.fn<Sleep>(async () => {});
    scheduler = createScheduler();
  });

  afterEach(() => {
    scheduler.stop();
  });

  it('should send today and check in order to each chat', async () => {
    const results = await scheduler.runOnce();

    expect(results).toEqual([{ chatId: '111', delivered: 2, attempts: 2 }]);
    expect(gateway.sent.map((entry) => entry.text)).toEqual(['today', 'check']);
    expect(scheduler.getLastFiredDate()).toBe('2026-10-19');
  });

  it('should fire at most once per weekday', async () => {
    await scheduler.runOnce();
    time.advance(60_000);
    expect(await scheduler.runOnce()).toBeNull();
    time.set('2026-10-19T17:00:00Z');
    expect(await scheduler.runOnce()).toBeNull();

    time.set('2026-10-20T09:05:00Z');
    expect(await scheduler.runOnce()).not.toBeNull();

    expect(gateway.sent).toHaveLength(4);
  });

  it('should not fire before the agenda time', async () => {
    time.set('2026-10-19T08:59:59Z');

    expect(scheduler.shouldFire(time.clock())).toBe(false);
    expect(await scheduler.runOnce()).toBeNull();
  });

  it('should never fire on Saturday or Sunday', async () => {
    time.set('2026-10-24T09:00:00Z');
    expect(await scheduler.runOnce()).toBeNull();
    time.set('2026-10-25T12:00:00Z');
    expect(await scheduler.runOnce()).toBeNull();

    expect(gateway.attempts).toEqual([]);
  });

  it('should wait for the cache before firing', async () => {
    store = new CacheStore();
    scheduler = createScheduler();

    expect(await scheduler.runOnce()).toBeNull();
    expect(scheduler.getLastFiredDate()).toBeNull();

    store.replaceSnapshot([], []);
    expect(await scheduler.runOnce()).not.toBeNull();
  });

  it('should make exactly 10 attempts one minute apart when delivery keeps failing', async () => {
    scheduler = createScheduler(['today']);
    gateway.failAll = true;

    const results = await scheduler.runOnce();

    expect(results).toEqual([{ chatId: '111', delivered: 0, attempts: 10 }]);
    expect(gateway.attempts).toHaveLength(10);
    expect(sleep).toHaveBeenCalledTimes(9);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual(Array(9).fill(60_000));

    time.advance(60_000);
    expect(await scheduler.runOnce()).toBeNull();
    expect(gateway.attempts).toHaveLength(10);
  });

  it('should not stack the bot retries on top of its own attempts', async () => {
    const transport = new TimingOutTransport();
    const bot = new TelegramBot({ name: 'appointments', transport, sleep, logger: createSilentLogger() });
    scheduler = new AgendaScheduler({
      store,
      gateway: bot,
      chatIds: ['111'],
      agendaTime: { hour: 9, minute: 0 },
      timeZone: 'UTC',
      buildMessages: () => ['today'],
      clock: time.clock,
      sleep,
      logger: createSilentLogger(),
    });

    const results = await scheduler.runOnce();

    expect(results).toEqual([{ chatId: '111', delivered: 0, attempts: 10 }]);
    expect(transport.sends).toBe(10);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual(Array(9).fill(60_000));
  });

  it('should retry one chat without holding back the others', async () => {
    scheduler = createScheduler(['today'], ['111', '-222']);
    gateway.failingChats.add('-222');

    const results = await scheduler.runOnce();

    expect(results).toEqual([
      { chatId: '111', delivered: 1, attempts: 1 },
      { chatId: '-222', delivered: 0, attempts: 10 },
    ]);
  });

  it('should ignore checks while a delivery is in progress', async () => {
    let release: () => void = () => {};
    sleep = vi.fn<Sleep>(
      () =>
        new Promise<void>((resolve) => {
          release = resolve;
        }),
    );
    scheduler = createScheduler(['today'], ['111']);
    gateway.failAll = true;

    const first = scheduler.runOnce();
    await vi.waitFor(() => expect(sleep).toHaveBeenCalledTimes(1));
    expect(await scheduler.runOnce()).toBeNull();

    gateway.failAll = false;
    release();
    expect(await first).toEqual([{ chatId: '111', delivered: 1, attempts: 2 }]);
  });

  it('should abort pending retry waits on stop', async () => {
    sleep = vi.fn<Sleep>(
      (_ms, signal) =>
        new Promise<void>((_resolve, reject) => {
          signal?.addEventListener('abort', () => reject(new Error('aborted')));
        }),
    );
    scheduler = createScheduler(['today', 'check']);
    gateway.failAll = true;

    const pending = scheduler.runOnce();
    await vi.waitFor(() => expect(sleep).toHaveBeenCalledTimes(1));
    scheduler.stop();

    expect(await pending).toEqual([{ chatId: '111', delivered: 0, attempts: 1 }]);
    expect(gateway.attempts).toHaveLength(1);
  });

  it('should schedule a per-minute check until stopped', () => {
    scheduler.start();
    expect(scheduler.isRunning()).toBe(true);

    scheduler.stop();
    expect(scheduler.isRunning()).toBe(false);
  });
});
