import { setTimeout as sleepTimer } from 'node:timers/promises';
import type { MessageGateway } from '../types/notifier.js';
import type { Logger } from '../utils/logger.js';

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export const defaultSleep: Sleep = async (ms, signal) => {
  await sleepTimer(ms, undefined, { signal });
};

export interface ChatDeliveryResult {
  delivered: string[];
  failed: Array<{ chatId: string; error: unknown }>;
}

/**
 * Send one text to every chat. Failures are collected, not thrown.
 */
export async function sendToChats(
  gateway: MessageGateway,
  chatIds: readonly string[],
  text: string,
  logger: Logger,
): Promise<ChatDeliveryResult> {
  const result: ChatDeliveryResult = { delivered: [], failed: [] };
  for (const chatId of chatIds) {
    try {
      await gateway.send(chatId, text);
      result.delivered.push(chatId);
    } catch (error) {
      logger.warn(`Failed to deliver via ${gateway.name}`, { chatId, error });
      result.failed.push({ chatId, error });
    }
  }
  return result;
}

export interface RetryOptions {
  maxAttempts: number;
  delayMs: number;
  sleep?: Sleep;
  signal?: AbortSignal;
  onFailure?: (attempt: number, error: unknown) => void;
}

export interface RetryResult {
  delivered: boolean;
  attempts: number;
  aborted: boolean;
}

/**
 * Call `attempt` until it resolves, at most `maxAttempts` times with a fixed
 * delay between calls. Aborting the signal ends the loop at the next wait.
 */
export async function deliverWithRetry(
  attempt: () => Promise<void>,
  options: RetryOptions,
): Promise<RetryResult> {
  const sleep = options.sleep ?? defaultSleep;
  let attempts = 0;

  while (attempts < options.maxAttempts) {
    if (options.signal?.aborted) {
      return { delivered: false, attempts, aborted: true };
    }

    attempts++;
    try {
      await attempt();
      return { delivered: true, attempts, aborted: false };
    } catch (error) {
      options.onFailure?.(attempts, error);
    }

    if (attempts >= options.maxAttempts) break;

    try {
      await sleep(options.delayMs, options.signal);
    } catch (error) {
      if (options.signal?.aborted) {
        return { delivered: false, attempts, aborted: true };
      }
      throw error;
    }
  }

  return { delivered: false, attempts, aborted: false };
}
