import { describe, it, expect, vi } from 'vitest';
import { createSilentLogger } from '@notifier/shared/Testing/index.js';
import { deliverWithRetry, sendToChats } from '../../src/tasks/delivery.js';
import { FakeGateway } from './helpers.js';

describe('sendToChats', () => {
  it('should report delivered and failed chats separately', async () => {
    const gateway = new FakeGateway();
    gateway.failingChats.add('2');

    const result = await sendToChats(gateway, ['1', '2', '3'], 'hello', createSilentLogger());

    expect(result.delivered).toEqual(['1', '3']);
    expect(result.failed.map((entry) => entry.chatId)).toEqual(['2']);
    expect(gateway.attempts).toHaveLength(3);
  });
});

describe('deliverWithRetry', () => {
  it('should stop at the first success', async () => {
    const sleep = vi.fn(async () => {});
    const attempt = vi
      .fn<() => Promise<void>>()
      .mockRejectedValueOnce(new Error('down'))
      .mockResolvedValueOnce(undefined);

    const result = await deliverWithRetry(attempt, { maxAttempts: 10, delayMs: 60_000, sleep });

    expect(result).toEqual({ delivered: true, attempts: 2, aborted: false });
    expect(sleep).toHaveBeenCalledTimes(1);
  });

  it('should make exactly maxAttempts attempts with a wait between each', async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const attempt = vi.fn(async () => {
      throw new Error('down');
    });
    const failures: number[] = [];

    const result = await deliverWithRetry(attempt, {
      maxAttempts: 10,
      delayMs: 60_000,
      sleep,
      onFailure: (n) => failures.push(n),
    });

    expect(result).toEqual({ delivered: false, attempts: 10, aborted: false });
    expect(attempt).toHaveBeenCalledTimes(10);
    expect(sleep).toHaveBeenCalledTimes(9);
    expect(sleep.mock.calls.every(([ms]) => ms === 60_000)).toBe(true);
    expect(failures).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10]);
  });

  it('should end early when the signal aborts during a wait', async () => {
    const controller = new AbortController();
    const sleep = vi.fn(async () => {
      controller.abort();
      throw new Error('aborted');
    });
    const attempt = vi.fn(async () => {
      throw new Error('down');
    });

    const result = await deliverWithRetry(attempt, {
      maxAttempts: 10,
      delayMs: 60_000,
      sleep,
      signal: controller.signal,
    });

    expect(result).toEqual({ delivered: false, attempts: 1, aborted: true });
  });

  it('should abort waits through the default timer sleep', async () => {
    const controller = new AbortController();
    const attempt = vi.fn(async () => {
      throw new Error('down');
    });

    const pending = deliverWithRetry(attempt, { maxAttempts: 3, delayMs: 60_000, signal: controller.signal });
    controller.abort();

    await expect(pending).resolves.toEqual({ delivered: false, attempts: 1, aborted: true });
  });
});
