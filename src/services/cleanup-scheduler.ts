/**
 * CleanupScheduler
 *
 * Runs the cleanup job on a cron expression (continuous mode).
 * A tick that fires while the previous run is still active is skipped.
 */

import cron, { type ScheduledTask } from 'node-cron';
import { logger } from '../config/logger';

export class CleanupScheduler {
  private running = false;
  private task: ScheduledTask | null = null;

  constructor(
    private job: () => Promise<unknown>,
    private expression: string
  ) {}

  start(): void {
    if (!cron.validate(this.expression)) {
      throw new Error(`Invalid cleanup schedule: ${this.expression}`);
    }
    this.task = cron.schedule(this.expression, () => {
      void this.tick();
    });
    logger.info('CleanupScheduler: Scheduled cleanup', { schedule: this.expression });
  }

  stop(): void {
    this.task?.stop();
    this.task = null;
  }

  get isRunning(): boolean {
    return this.running;
  }

  async tick(): Promise<void> {
    if (this.running) {
      logger.warn('CleanupScheduler: Previous cleanup still running, skipping this tick');
      return;
    }

    this.running = true;
    try {
      await this.job();
    } catch (error) {
      logger.error('CleanupScheduler: Scheduled cleanup failed', {
        error: error instanceof Error ? error.message : String(error),
        stack: error instanceof Error ? error.stack : undefined,
      });
    } finally {
      this.running = false;
    }
  }
}
