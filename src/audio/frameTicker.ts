export interface FrameTicker {
  start(onTick: () => void): void;
  stop(): void;
}

const MAX_CATCH_UP_TICKS = 5;

/**
 * Real-time pacing clock. Deadlines are computed from the start time, so
 * timer jitter does not accumulate; a late wake-up fires the missed ticks
 * (bounded) back to back.
 */
export class DriftCorrectedTicker implements FrameTicker {
  private readonly intervalMs: number;
  private readonly now: () => number;
  private timer?: NodeJS.Timeout;
  private startedAt = 0;
  private fired = 0;
  private onTick?: () => void;

  constructor(intervalMs: number, now: () => number = () => performance.now()) {
    this.intervalMs = Math.max(1, intervalMs);
    this.now = now;
  }

  public start(onTick: () => void): void {
    if (this.onTick) {
      return;
    }
    this.onTick = onTick;
    this.startedAt = this.now();
    this.fired = 0;
    this.schedule();
  }

  public stop(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
    this.onTick = undefined;
  }

  /** Number of ticks due at `nowMs` that have not fired yet. */
  public dueTicks(nowMs: number): number {
    const due = Math.floor((nowMs - this.startedAt) / this.intervalMs) - this.fired;
    return Math.max(0, due);
  }

  private schedule(): void {
    const nextDeadline = this.startedAt + (this.fired + 1) * this.intervalMs;
    const delay = Math.max(0, nextDeadline - this.now());
    this.timer = setTimeout(() => this.wake(), delay);
    this.timer.unref?.();
  }

  private wake(): void {
    const due = this.dueTicks(this.now());
    const toFire = Math.min(due, MAX_CATCH_UP_TICKS);

    if (due > MAX_CATCH_UP_TICKS) {
      // Too far behind: skip ahead instead of bursting.
      this.fired += due - MAX_CATCH_UP_TICKS;
    }

    for (let i = 0; i < toFire; i += 1) {
      this.fired += 1;
      const cb = this.onTick;
      if (!cb) return;
      cb();
    }

    if (this.onTick) {
      this.schedule();
    }
  }
}
