/**
 * PeriodicTask - an interval timer that runs one async tick at a time.
 *
 * A tick that comes due while the previous one is still running is skipped,
 * so a slow fetch or send never stacks up work. Each task owns its own timer;
 * tasks never wait on each other.
 */

import { logger as rootLogger, type Logger } from '../utils/logger.js';

export abstract class PeriodicTask {
  protected readonly logger: Logger;
  private timer: ReturnType<typeof setInterval> | null = null;
  private current: Promise<void> | null = null;

  constructor(
    readonly name: string,
    private readonly intervalMs: number,
    logger?: Logger,
  ) {
    this.logger = logger ?? rootLogger.child(name);
  }

  protected abstract tick(): Promise<void>;

  /**
   * Start the timer. Runs one tick immediately.
   */
  start(): void {
    if (this.timer) {
      this.logger.warn('Already started');
      return;
    }

    this.logger.info('Starting', { intervalMs: this.intervalMs });

    this.timer = setInterval(() => {
      this.runOnce().catch((error: unknown) => {
        this.logger.error('Tick failed', { error });
      });
    }, this.intervalMs);

    this.runOnce().catch((error: unknown) => {
      this.logger.error('Initial tick failed', { error });
    });
  }

  /**
   * Stop the timer. A tick already in progress keeps running; await
   * `drain()` to wait for it.
   */
  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      this.logger.info('Stopped');
    }
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  /**
   * Run a single tick now.
   * @returns false when skipped because the previous tick is still running
   */
  async runOnce(): Promise<boolean> {
    if (this.current) {
      this.logger.debug('Skipping tick - previous one still in progress');
      return false;
    }

    this.current = this.tick();
    try {
      await this.current;
    } finally {
      this.current = null;
    }
    return true;
  }

  /** Wait for the tick in progress, if any */
  async drain(): Promise<void> {
    if (this.current) {
      // Failures are already reported to whoever called runOnce()
      await this.current.catch(() => undefined);
    }
  }
}
