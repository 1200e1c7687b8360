/**
 * Sliding-window rate limiting per key (one key per session).
 *
 * Only requests within the last `windowMs` are counted. A limit of 0 or
 * less disables limiting.
 */
export class SlidingWindowRateLimiter {
  private readonly windows = new Map<string, number[]>();

  constructor(
    private readonly limit: number,
    private readonly windowMs: number = 60_000,
  ) {}

  /**
   * Record a request for `key` unless it would exceed the limit.
   *
   * @returns true if the request is rejected.
   */
  isLimited(key: string): boolean {
    if (this.limit <= 0) {
      return false;
    }

    const now = Date.now();
    const timestamps = (this.windows.get(key) ?? []).filter((ts) => now - ts < this.windowMs);

    if (timestamps.length >= this.limit) {
      this.windows.set(key, timestamps);
      return true;
    }

    timestamps.push(now);
    this.windows.set(key, timestamps);
    return false;
  }

  /** Drop the history for `key`, e.g. when its session closes. */
  forget(key: string): void {
    this.windows.delete(key);
  }

  /** Number of keys with history. */
  get size(): number {
    return this.windows.size;
  }
}
