export interface RateLimiterOptions {
  /** Requests allowed per key inside one window */
  maxRequests: number;
  /** Trailing window length (ms) */
  windowMs: number;
}

/** Admission limit: new connections per remote address */
export const CONNECTION_RATE_LIMIT: RateLimiterOptions = { maxRequests: 10, windowMs: 60_000 };

/** Throughput limit: inbound frames per peer */
export const MESSAGE_RATE_LIMIT: RateLimiterOptions = { maxRequests: 50, windowMs: 60_000 };

/**
 * Sliding-window request counter keyed by identity (remote address or peer id).
 *
 * Timestamps older than the window are evicted lazily on each call, so every
 * stored timestamp is inside the window whenever it is counted. Exceeding the
 * limit never throws; the caller decides the consequence.
 */
export class RateLimiter {
  readonly maxRequests: number;
  readonly windowMs: number;
  private requests = new Map<string, number[]>();

  constructor(options: RateLimiterOptions) {
    if (!Number.isInteger(options.maxRequests) || options.maxRequests < 1) {
      throw new RangeError(`maxRequests must be a positive integer, got ${options.maxRequests}`);
    }
    if (!(options.windowMs > 0)) {
      throw new RangeError(`windowMs must be positive, got ${options.windowMs}`);
    }
    this.maxRequests = options.maxRequests;
    this.windowMs = options.windowMs;
  }

  /** Returns true and records the request when `key` is under its limit */
  isAllowed(key: string): boolean {
    const now = Date.now();
    const recent = this.evict(key, now);

    if (recent.length >= this.maxRequests) {
      return false;
    }

    recent.push(now);
    this.requests.set(key, recent);
    return true;
  }

  /** Requests still counted against `key` */
  count(key: string): number {
    return this.evict(key, Date.now()).length;
  }

  reset(key: string): void {
    this.requests.delete(key);
  }

  /** Drop every key whose window has emptied */
  cleanup(): void {
    const now = Date.now();
    for (const key of Array.from(this.requests.keys())) {
      if (this.evict(key, now).length === 0) {
        this.requests.delete(key);
      }
    }
  }

  get size(): number {
    return this.requests.size;
  }

  private evict(key: string, now: number): number[] {
    const timestamps = this.requests.get(key);
    if (!timestamps) return [];
    const recent = timestamps.filter((timestamp) => now - timestamp < this.windowMs);
    if (recent.length !== timestamps.length) {
      this.requests.set(key, recent);
    }
    return recent;
  }
}
