import { performance } from "node:perf_hooks";

export interface RateLimiterOptions {
    /** requests allowed per key inside one window */
    max: number;
    windowMs: number;
    /** monotonic clock in ms */
    now?: () => number;
}

/**
 * In-memory sliding window per key. Single instance only: counters are not
 * shared between processes.
 */
export class SlidingWindowRateLimiter {
    private readonly max: number;
    private readonly windowMs: number;
    private readonly now: () => number;
    private readonly hits = new Map<string, number[]>();

    constructor(options: RateLimiterOptions) {
        if (!Number.isInteger(options.max) || options.max <= 0) {
            throw new RangeError("rate limit max must be a positive integer");
        }
        if (!Number.isFinite(options.windowMs) || options.windowMs <= 0) {
            throw new RangeError("rate limit windowMs must be > 0");
        }
        this.max = options.max;
        this.windowMs = options.windowMs;
        this.now = options.now ?? (() => performance.now());
    }

    private recent(key: string, now: number): number[] {
        const cutoff = now - this.windowMs;
        return (this.hits.get(key) ?? []).filter((t) => t > cutoff);
    }

    /** Records the request and returns true when it is allowed. */
    tryAcquire(key: string): boolean {
        const now = this.now();
        const timestamps = this.recent(key, now);
        if (timestamps.length >= this.max) {
            this.hits.set(key, timestamps);
            return false;
        }
        timestamps.push(now);
        this.hits.set(key, timestamps);
        return true;
    }

    /** Milliseconds until the next request for key would be allowed. */
    retryAfterMs(key: string): number {
        const now = this.now();
        const timestamps = this.recent(key, now);
        if (timestamps.length < this.max) return 0;
        return Math.max(0, timestamps[0] + this.windowMs - now);
    }

    get trackedKeys(): number {
        return this.hits.size;
    }
}
