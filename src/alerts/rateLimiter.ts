export const RATE_LIMIT_WINDOW_SECONDS = 60;

/**
 * Sliding one-minute window over alert sends.
 *
 * Timestamps are seconds since the epoch. An entry exactly 60 seconds old has
 * expired. Purge, check and append run without yielding, so a single handler
 * never interleaves two decisions.
 */
export class AlertRateLimiter {
  private sends: number[] = [];

  constructor(readonly maxSendsPerMinute = 15) {}

  recordIfAllowed(now: number): boolean {
    this.purge(now);
    if (this.sends.length < this.maxSendsPerMinute) {
      this.sends.push(now);
      return true;
    }
    return false;
  }

  recentCount(now: number): number {
    this.purge(now);
    return this.sends.length;
  }

  private purge(now: number) {
    const cutoff = now - RATE_LIMIT_WINDOW_SECONDS;
    this.sends = this.sends.filter(t => t > cutoff);
  }
}
