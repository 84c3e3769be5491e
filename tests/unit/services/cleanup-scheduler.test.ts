/**
 * CleanupScheduler Unit Tests
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('node-cron', () => ({
  default: {
    validate: vi.fn((expression: string) => expression !== 'not a cron'),
    schedule: vi.fn(() => ({ stop: vi.fn() })),
  },
}));

import cron from 'node-cron';
import { CleanupScheduler } from '../../../src/services/cleanup-scheduler';

describe('CleanupScheduler', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should schedule the job on the cron expression', () => {
    const scheduler = new CleanupScheduler(vi.fn().mockResolvedValue(true), '0 3 * * *');

    scheduler.start();

    expect(cron.schedule).toHaveBeenCalledWith('0 3 * * *', expect.any(Function));
  });

  it('should reject an invalid expression', () => {
    const scheduler = new CleanupScheduler(vi.fn(), 'not a cron');

    expect(() => scheduler.start()).toThrow('Invalid cleanup schedule: not a cron');
    expect(cron.schedule).not.toHaveBeenCalled();
  });

  it('should skip a tick while the previous run is active', async () => {
    let finish: () => void = () => undefined;
    const job = vi.fn(
      () =>
        new Promise<void>((resolve) => {
          finish = resolve;
        })
    );
    const scheduler = new CleanupScheduler(job, '0 3 * * *');

    const first = scheduler.tick();
    await scheduler.tick();
    expect(job).toHaveBeenCalledTimes(1);
    expect(scheduler.isRunning).toBe(true);

    finish();
    await first;
    expect(scheduler.isRunning).toBe(false);

    const third = scheduler.tick();
    finish();
    await third;
    expect(job).toHaveBeenCalledTimes(2);
  });

  it('should survive a failing job', async () => {
    const scheduler = new CleanupScheduler(vi.fn().mockRejectedValue(new Error('boom')), '0 3 * * *');

    await expect(scheduler.tick()).resolves.toBeUndefined();
    expect(scheduler.isRunning).toBe(false);
  });
});
