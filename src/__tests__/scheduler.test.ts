import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { SyncScheduler } from '../sync/scheduler.js';

const MINUTE = 60_000;

describe('SyncScheduler', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it('should run the task once per interval', async () => {
    const task = vi.fn().mockResolvedValue(undefined);
    const scheduler = new SyncScheduler(task, 1);

    scheduler.start();
    expect(task).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(MINUTE);
    expect(task).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(MINUTE);
    expect(task).toHaveBeenCalledTimes(2);
    scheduler.stop();
  });

  it('should treat a second start as a no-op', async () => {
    const task = vi.fn().mockResolvedValue(undefined);
    const scheduler = new SyncScheduler(task, 1);

    scheduler.start();
    scheduler.start();
    await vi.advanceTimersByTimeAsync(MINUTE);

    expect(task).toHaveBeenCalledTimes(1);
    scheduler.stop();
  });

  it('should not run again after stop', async () => {
    const task = vi.fn().mockResolvedValue(undefined);
    const scheduler = new SyncScheduler(task, 1);

    scheduler.start();
    await vi.advanceTimersByTimeAsync(MINUTE);
    scheduler.stop();
    await vi.advanceTimersByTimeAsync(5 * MINUTE);

    expect(task).toHaveBeenCalledTimes(1);
    expect(scheduler.isRunning()).toBe(false);
  });

  it('should restart the wait when the interval changes', async () => {
    const task = vi.fn().mockResolvedValue(undefined);
    const scheduler = new SyncScheduler(task, 1);

    scheduler.start();
    await vi.advanceTimersByTimeAsync(MINUTE / 2);
    scheduler.start(2);
    expect(scheduler.intervalMinutes).toBe(2);

    await vi.advanceTimersByTimeAsync(MINUTE);
    expect(task).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(MINUTE);
    expect(task).toHaveBeenCalledTimes(1);
    scheduler.stop();
  });

  it('should run immediately on a manual trigger', async () => {
    const task = vi.fn().mockResolvedValue(undefined);
    const scheduler = new SyncScheduler(task, 5);

    await scheduler.triggerNow();

    expect(task).toHaveBeenCalledTimes(1);
    expect(scheduler.isRunning()).toBe(false);
  });

  it('should log a failing task and keep the schedule going', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const task = vi.fn().mockRejectedValueOnce(new Error('offline')).mockResolvedValue(undefined);
    const scheduler = new SyncScheduler(task, 1, 'keep');

    scheduler.start();
    await vi.advanceTimersByTimeAsync(MINUTE);
    expect(errorSpy).toHaveBeenCalledWith('Scheduler [keep]: offline');

    await vi.advanceTimersByTimeAsync(MINUTE);
    expect(task).toHaveBeenCalledTimes(2);
    scheduler.stop();
  });

  it('should reject a non-positive interval', () => {
    expect(() => new SyncScheduler(async () => {}, 0)).toThrow(
      'Sync interval must be a positive number of minutes, got 0',
    );
  });
});
