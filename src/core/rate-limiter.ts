/**
 * Process-wide request spacing. Every outbound dispatch calls `waitTurn()`
 * first; it returns once at least `delayMs` has passed since the previous
 * dispatch began, whichever caller made it. Each caller books its start time
 * before sleeping, so concurrent callers queue up one delay apart.
 */

export type SleepFn = (ms: number) => Promise<void>;

export const sleep: SleepFn = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export class RateLimiter {
  /** Start time booked by the most recent caller; may lie in the future. */
  private lastDispatch = Number.NEGATIVE_INFINITY;

  constructor(
    private readonly delayMs: number,
    private readonly sleepFn: SleepFn = sleep,
  ) {}

  async waitTurn(): Promise<void> {
    const now = Date.now();
    const start = Math.max(now, this.lastDispatch + this.delayMs);
    this.lastDispatch = start;

    const wait = start - now;
    if (wait > 0) {
      await this.sleepFn(wait);
    }
  }
}
