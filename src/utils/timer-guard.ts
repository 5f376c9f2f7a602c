/**
 * Timer Lifecycle Management Guard
 *
 * Owns one background timer (the pool reaper, the batch retention sweep)
 * so that setting it twice never leaves an orphaned interval behind and
 * stopping a component always clears it.
 *
 * Usage:
 * ```typescript
 * const guard = new TimerGuard();
 * guard.setInterval(() => void pool.reap(), 60_000);
 * // Later...
 * guard.clear();
 * ```
 */

export class TimerGuard {
  private timer?: NodeJS.Timeout;

  /**
   * Set an interval (clears existing timer first)
   *
   * Background intervals are unref'd so they never keep the process alive.
   */
  setInterval(callback: () => void, intervalMs: number): void {
    this.clear();
    this.timer = setInterval(callback, intervalMs);
    this.timer.unref();
  }

  /**
   * Clear the timer if set. Idempotent.
   */
  clear(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
  }

  isActive(): boolean {
    return this.timer !== undefined;
  }
}
