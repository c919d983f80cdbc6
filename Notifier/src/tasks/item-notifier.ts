/**
 * Shared scan → claim → send → mark loop for the appointment and mail notifiers.
 */

import { PeriodicTask } from './periodic-task.js';
import { sendToChats } from './delivery.js';
import type { CacheStore } from '../cache/store.js';
import { systemClock, type Clock, type ItemKind, type MessageGateway } from '../types/notifier.js';
import type { Logger } from '../utils/logger.js';

export interface ItemNotifierOptions {
  store: CacheStore;
  gateway: MessageGateway;
  chatIds: readonly string[];
  intervalSeconds: number;
  clock?: Clock;
  logger?: Logger;
}

export interface NotifyPassResult {
  notified: number;
  failed: number;
}

export abstract class ItemNotifier<T extends { id: string }> extends PeriodicTask {
  protected readonly store: CacheStore;
  protected readonly clock: Clock;
  private readonly gateway: MessageGateway;
  private readonly chatIds: readonly string[];
  private lastPass: NotifyPassResult = { notified: 0, failed: 0 };

  constructor(
    name: string,
    private readonly kind: ItemKind,
    options: ItemNotifierOptions,
  ) {
    super(name, options.intervalSeconds * 1000, options.logger);
    this.store = options.store;
    this.gateway = options.gateway;
    this.chatIds = options.chatIds;
    this.clock = options.clock ?? systemClock;
  }

  /** Items that should be announced on this pass */
  protected abstract collect(now: Date): T[];

  protected abstract format(item: T, now: Date): string;

  getLastPass(): NotifyPassResult {
    return { ...this.lastPass };
  }

  protected async tick(): Promise<void> {
    if (!this.store.isReady()) {
      this.logger.debug('Cache not ready yet, skipping');
      return;
    }

    const now = this.clock();
    const items = this.collect(now);
    const pass: NotifyPassResult = { notified: 0, failed: 0 };

    for (const item of items) {
      if (!this.store.claim(this.kind, item.id)) continue;
      try {
        const text = this.format(item, now);
        const result = await sendToChats(this.gateway, this.chatIds, text, this.logger);
        if (result.delivered.length > 0) {
          this.store.markNotified(this.kind, item.id);
          pass.notified++;
        } else {
          pass.failed++;
          this.logger.warn(`No chat accepted ${this.kind}, will retry`, { id: item.id });
        }
      } finally {
        this.store.release(this.kind, item.id);
      }
    }

    this.lastPass = pass;
    if (pass.notified > 0 || pass.failed > 0) {
      this.logger.info('Notification pass finished', { ...pass });
    }
  }
}
