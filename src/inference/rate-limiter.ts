import { setTimeout as delay } from "node:timers/promises";

/**
 * Token bucket shared by every worker of a sweep, so raising the worker count
 * does not multiply the request rate against the inference service.
 */
export class TokenBucketRateLimiter {
  private readonly capacity: number;
  private readonly refillPerMs: number;
  private readonly now: () => number;
  private tokens: number;
  private lastRefillAt: number;

  constructor(requestsPerSecond: number, burst: number = requestsPerSecond, now: () => number = Date.now) {
    if (!Number.isFinite(requestsPerSecond) || requestsPerSecond <= 0) {
      throw new Error("requestsPerSecond must be positive");
    }
    const normalizedBurst = Math.max(1, Math.floor(burst));
    this.capacity = normalizedBurst;
    this.refillPerMs = requestsPerSecond / 1000;
    this.tokens = normalizedBurst;
    this.now = now;
    this.lastRefillAt = now();
  }

  async take(signal?: AbortSignal): Promise<void> {
    while (true) {
      this.refill();
      if (this.tokens >= 1) {
        this.tokens -= 1;
        return;
      }

      const missing = 1 - this.tokens;
      const waitMs = Math.max(1, Math.ceil(missing / this.refillPerMs));
      await delay(waitMs, undefined, signal ? { signal } : undefined);
    }
  }

  private refill(): void {
    const now = this.now();
    if (now <= this.lastRefillAt) {
      return;
    }

    const elapsedMs = now - this.lastRefillAt;
    this.lastRefillAt = now;
    this.tokens = Math.min(this.capacity, this.tokens + elapsedMs * this.refillPerMs);
  }
}

export const createRateLimiter = (requestsPerSecond: number | null): TokenBucketRateLimiter | null =>
  requestsPerSecond === null ? null : new TokenBucketRateLimiter(requestsPerSecond);
