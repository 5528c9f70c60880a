import { normalizeError } from '../utils.js';
import type { NotificationChecker, NotificationOutcome } from './notification-checker.js';

export interface NotificationSchedulerOptions {
  /** Time between checks of all users */
  intervalMs: number;
}

/**
 * Runs NotificationChecker.checkAll on a fixed interval.
 *
 * The timer does not keep the process alive, and a tick that fires while the
 * previous run is still going is skipped.
 */
export class NotificationScheduler {
  private timer: NodeJS.Timeout | null = null;
  private running = false;

  constructor(
    private readonly checker: NotificationChecker,
    private readonly options: NotificationSchedulerOptions
  ) {
    if (!Number.isFinite(options.intervalMs) || options.intervalMs <= 0) {
      throw new Error('intervalMs must be a positive number');
    }
  }

  get isRunning(): boolean {
    return this.timer !== null;
  }

  start(): void {
    if (this.timer) {
      return;
    }
    this.timer = setInterval(() => {
      void this.runOnce();
    }, this.options.intervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  /**
   * One pass over all users. Returns null when a pass is already in progress
   * or the pass failed. Never rejects.
   */
  async runOnce(): Promise<NotificationOutcome[] | null> {
    if (this.running) {
      return null;
    }
    this.running = true;

    try {
      const outcomes = await this.checker.checkAll();
      const sent = outcomes.filter(outcome => outcome.status === 'sent').length;
      if (sent > 0) {
        console.error(`🔔 Sent ${sent} weather notification${sent === 1 ? '' : 's'}`);
      }
      return outcomes;
    } catch (error) {
      console.error('✗ Notification check failed:', normalizeError(error).message);
      return null;
    } finally {
      this.running = false;
    }
  }
}
