/**
 * Periodic runner for a sync task.
 *
 * Between runs the scheduler sleeps on a single setTimeout. stop() clears
 * that timer; a run already in flight finishes on its own. The next wait is
 * only armed after the previous run settles, so runs never overlap on
 * account of the timer (a manual trigger may still coincide with a timed
 * run; the orchestrator's guard turns the second into a no-op).
 */

import { errorMessage } from '../providers/provider.js';

const MS_PER_MINUTE = 60_000;

export class SyncScheduler {
  private timer: ReturnType<typeof setTimeout> | null = null;
  private running = false;
  private intervalMs: number;

  constructor(
    private readonly task: () => Promise<unknown>,
    intervalMinutes: number,
    private readonly label = 'sync',
  ) {
    this.intervalMs = SyncScheduler.toMs(intervalMinutes);
  }

  private static toMs(minutes: number): number {
    if (!Number.isFinite(minutes) || minutes <= 0) {
      throw new Error(`Sync interval must be a positive number of minutes, got ${minutes}`);
    }
    return Math.round(minutes * MS_PER_MINUTE);
  }

  get intervalMinutes(): number {
    return this.intervalMs / MS_PER_MINUTE;
  }

  isRunning(): boolean {
    return this.running;
  }

  /**
   * Start the schedule. Calling it again while running is a no-op unless a
   * different interval is given, which restarts the wait with that interval.
   */
  start(intervalMinutes?: number): void {
    if (intervalMinutes !== undefined) {
      const ms = SyncScheduler.toMs(intervalMinutes);
      const changed = ms !== this.intervalMs;
      this.intervalMs = ms;
      if (this.running && changed && this.timer !== null) {
        clearTimeout(this.timer);
        this.arm();
      }
    }
    if (this.running) return;

    this.running = true;
    this.arm();
  }

  stop(): void {
    this.running = false;
    if (this.timer !== null) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  /** Run the task now without waiting for the interval. */
  async triggerNow(): Promise<void> {
    await this.run();
  }

  private arm(): void {
    this.timer = setTimeout(() => {
      this.timer = null;
      void this.run().then(() => {
        if (this.running && this.timer === null) this.arm();
      });
    }, this.intervalMs);
    this.timer.unref();
  }

  private async run(): Promise<void> {
    try {
      await this.task();
    } catch (error) {
      console.error(`Scheduler [${this.label}]: ${errorMessage(error)}`);
    }
  }
}
