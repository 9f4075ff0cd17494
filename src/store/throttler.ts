export interface ThrottlerOptions {
  /** Minimum spacing between two executions. */
  windowMs: number;
  now?: () => number;
}

/**
 * Runs an action at most once per window.
 *
 * A call that arrives inside the window arms a single timer for the rest of the
 * window; calls arriving while that timer is armed are coalesced into it. The
 * timer runs the action it was given at fire time, so callers pass an action
 * that reads current state rather than capturing it.
 */
export class Throttler {
  private readonly windowMs: number;
  private readonly now: () => number;
  private lastExecutionTime = Number.NEGATIVE_INFINITY;
  private pending = false;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private latestAction: (() => void) | null = null;
  private disposed = false;

  constructor(options: ThrottlerOptions) {
    this.windowMs = options.windowMs;
    this.now = options.now ?? (() => Date.now());
  }

  get isPending(): boolean {
    return this.pending;
  }

  scheduleCall(action: () => void): void {
    if (this.disposed) return;

    const elapsed = this.now() - this.lastExecutionTime;
    if (elapsed >= this.windowMs) {
      this.cancel();
      this.execute(action);
      return;
    }

    this.latestAction = action;
    if (this.pending) return;

    this.pending = true;
    this.timer = setTimeout(() => {
      this.timer = null;
      const latest = this.latestAction;
      if (!this.pending || latest === null) return;
      this.pending = false;
      this.latestAction = null;
      this.execute(latest);
    }, this.windowMs - elapsed);
  }

  /** Drops the pending call, if any. */
  cancel(): void {
    if (this.timer) clearTimeout(this.timer);
    this.timer = null;
    this.pending = false;
    this.latestAction = null;
  }

  /** Cancels the pending call and ignores every later one. */
  dispose(): void {
    this.cancel();
    this.disposed = true;
  }

  private execute(action: () => void): void {
    this.lastExecutionTime = this.now();
    action();
  }
}
