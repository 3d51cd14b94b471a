/**
 * In-memory sliding-window rate limiter.
 *
 * Tracks admission timestamps per client identifier. Expired timestamps are
 * evicted lazily on each check, and clients whose windows have emptied are
 * swept out every `sweepEvery` checks. State lives for the lifetime of the
 * owning instance; share one instance per process and inject it where needed.
 */

export interface SlidingWindowRateLimiterOptions {
  maxRequests?: number;
  windowSeconds?: number;
  /** Clock in milliseconds, injectable for tests */
  now?: () => number;
  sweepEvery?: number;
}

export class SlidingWindowRateLimiter {
  readonly maxRequests: number;
  readonly windowSeconds: number;

  private readonly windows = new Map<string, number[]>();
  private readonly now: () => number;
  private readonly sweepEvery: number;
  private checksSinceSweep = 0;

  constructor(options: SlidingWindowRateLimiterOptions = {}) {
    this.maxRequests = options.maxRequests ?? 100;
    this.windowSeconds = options.windowSeconds ?? 3600;
    this.now = options.now ?? Date.now;
    this.sweepEvery = options.sweepEvery ?? 1000;

    if (this.maxRequests < 1) {
      throw new RangeError('maxRequests must be at least 1');
    }
    if (this.windowSeconds <= 0) {
      throw new RangeError('windowSeconds must be positive');
    }
  }

  private get windowMs(): number {
    return this.windowSeconds * 1000;
  }

  /**
   * Check whether the client may make a request. Records the request
   * when allowed; a denied request is not recorded.
   */
  isAllowed(clientId: string): boolean {
    this.maybeSweep();
    const now = this.now();

    const timestamps = this.evict(clientId, now);
    if (timestamps.length >= this.maxRequests) {
      return false;
    }

    timestamps.push(now);
    this.windows.set(clientId, timestamps);
    return true;
  }

  /**
   * Admissions left for the client in the current window
   */
  remaining(clientId: string): number {
    const timestamps = this.evict(clientId, this.now());
    return Math.max(0, this.maxRequests - timestamps.length);
  }

  /**
   * Whole seconds until the oldest recorded request leaves the window
   */
  retryAfterSeconds(clientId: string): number {
    const now = this.now();
    const timestamps = this.evict(clientId, now);
    if (timestamps.length === 0) {
      return 1;
    }
    const waitMs = timestamps[0] + this.windowMs - now;
    return Math.max(1, Math.ceil(waitMs / 1000));
  }

  reset(clientId?: string): void {
    if (clientId === undefined) {
      this.windows.clear();
    } else {
      this.windows.delete(clientId);
    }
  }

  /**
   * Drop clients whose windows no longer hold any timestamp
   */
  sweep(): number {
    const now = this.now();
    let removed = 0;
    for (const clientId of [...this.windows.keys()]) {
      if (this.evict(clientId, now).length === 0) {
        this.windows.delete(clientId);
        removed++;
      }
    }
    this.checksSinceSweep = 0;
    return removed;
  }

  get size(): number {
    return this.windows.size;
  }

  private maybeSweep(): void {
    this.checksSinceSweep++;
    if (this.checksSinceSweep >= this.sweepEvery) {
      this.sweep();
    }
  }

  private evict(clientId: string, now: number): number[] {
    const timestamps = this.windows.get(clientId);
    if (!timestamps) {
      return [];
    }

    const cutoff = now - this.windowMs;
    let expired = 0;
    while (expired < timestamps.length && timestamps[expired] < cutoff) {
      expired++;
    }
    if (expired > 0) {
      timestamps.splice(0, expired);
    }
    return timestamps;
  }
}
