/**
 * Token bucket limiting how often the catalog is queried
 */
export interface RateLimiterOptions {
  tokensPerInterval: number;
  interval: number; // in milliseconds
  maxTokens?: number;
}

export class RateLimiter {
  private tokens: number;
  private lastRefill: number;
  private readonly tokensPerInterval: number;
  private readonly interval: number;
  private readonly maxTokens: number;

  constructor(options: RateLimiterOptions, private now: () => number = Date.now) {
    if (options.tokensPerInterval <= 0) {
      throw new Error(`tokensPerInterval must be positive, got ${options.tokensPerInterval}`);
    }
    this.tokensPerInterval = options.tokensPerInterval;
    this.interval = options.interval;
    this.maxTokens = options.maxTokens ?? options.tokensPerInterval;
    this.tokens = this.maxTokens;
    this.lastRefill = this.now();
  }

  public static perMinute(requests: number): RateLimiter {
    return new RateLimiter({ tokensPerInterval: requests, interval: 60 * 1000 });
  }

  private refill(): void {
    const now = this.now();
    const elapsed = now - this.lastRefill;

    if (elapsed < 0) {
      // Clock moved backwards
      this.lastRefill = now;
      return;
    }

    const tokensToAdd = Math.floor(elapsed / this.interval * this.tokensPerInterval);
    if (tokensToAdd > 0) {
      this.tokens = Math.min(this.tokens + tokensToAdd, this.maxTokens);
      this.lastRefill = now;
    }
  }

  /**
   * Resolves once `count` tokens have been taken from the bucket
   */
  public async removeTokens(count: number): Promise<void> {
    if (count > this.maxTokens) {
      throw new Error(`Requested tokens ${count} exceeds maximum tokens ${this.maxTokens}`);
    }

    this.refill();
    while (this.tokens < count) {
      const waitTime = Math.ceil((count - this.tokens) * this.interval / this.tokensPerInterval);
      await new Promise<void>(resolve => setTimeout(resolve, waitTime));
      this.refill();
    }
    this.tokens -= count;
  }

  /**
   * Run `task` after taking one token
   */
  public async schedule<T>(task: () => Promise<T>): Promise<T> {
    await this.removeTokens(1);
    return task();
  }
}
