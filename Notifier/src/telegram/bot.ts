/**
 * TelegramBot - MessageGateway over a bot transport.
 *
 * Network hiccups are retried a few times with exponential backoff before a
 * send is reported as failed; anything else fails at once. `sendOnce` skips
 * the retries for callers that pace their own attempts.
 */

import { errorMessage } from '@notifier/shared/Types/errors.js';
import { defaultSleep, type Sleep } from '../tasks/delivery.js';
import type { MessageGateway } from '../types/notifier.js';
import { DeliveryError } from '../utils/errors.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';
import type { BotTransport } from './transport.js';

export const SEND_MAX_ATTEMPTS = 3;
export const SEND_BASE_DELAY_MS = 1000;

const RETRYABLE_RE = /timeout|timed out|ECONNRESET|ETIMEDOUT|ECONNREFUSED|EPIPE|not connected|disconnected/i;

export function isRetryableSendError(error: unknown): boolean {
  return RETRYABLE_RE.test(errorMessage(error));
}

export type CommandReplier = (chatId: string, text: string) => string | null;

export interface TelegramBotOptions {
  name: string;
  transport: BotTransport;
  sleep?: Sleep;
  logger?: Logger;
}

export class TelegramBot implements MessageGateway {
  readonly name: string;
  private readonly transport: BotTransport;
  private readonly sleep: Sleep;
  private readonly logger: Logger;

  constructor(options: TelegramBotOptions) {
    this.name = options.name;
    this.transport = options.transport;
    this.sleep = options.sleep ?? defaultSleep;
    this.logger = options.logger ?? rootLogger.child(`bot:${options.name}`);
  }

  async connect(): Promise<void> {
    await this.transport.start();
    this.logger.info('Bot connected');
  }

  async send(chatId: string, text: string): Promise<void> {
    let lastError: unknown;
    for (let attempt = 1; attempt <= SEND_MAX_ATTEMPTS; attempt++) {
      try {
        await this.transport.sendHtml(chatId, text);
        return;
      } catch (error) {
        lastError = error;
        if (!isRetryableSendError(error) || attempt === SEND_MAX_ATTEMPTS) break;

        const delayMs = SEND_BASE_DELAY_MS * 2 ** (attempt - 1);
        this.logger.debug('Send failed, retrying', { chatId, attempt, delayMs, error });
        await this.sleep(delayMs);
      }
    }

    throw this.deliveryError(chatId, lastError);
  }

  async sendOnce(chatId: string, text: string): Promise<void> {
    try {
      await this.transport.sendHtml(chatId, text);
    } catch (error) {
      throw this.deliveryError(chatId, error);
    }
  }

  private deliveryError(chatId: string, cause: unknown): DeliveryError {
    return new DeliveryError(`Telegram send to ${chatId} failed: ${errorMessage(cause)}`, chatId, { bot: this.name });
  }

  /**
   * Answer chat messages with whatever `replier` returns. Null means stay silent.
   */
  onCommand(replier: CommandReplier): void {
    this.transport.onText(async ({ chatId, text, reply }) => {
      const answer = replier(chatId, text);
      if (answer === null) return;
      try {
        await reply(answer);
      } catch (error) {
        this.logger.warn('Failed to reply to command', { chatId, error });
      }
    });
  }

  isConnected(): boolean {
    return this.transport.isConnected();
  }

  async disconnect(): Promise<void> {
    await this.transport.disconnect();
    this.logger.info('Bot disconnected');
  }
}
