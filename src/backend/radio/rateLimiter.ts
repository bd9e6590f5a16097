import { RateLimitedError } from '../../core/errors';

export interface TokenBucketOptions {
  /** Maximum burst tokens */
  capacity: number;
  /** Tokens added per second */
  refillPerSecond: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Token bucket shared by every upstream request.
 */
export class TokenBucket {
  private tokens: number;
  private lastRefill: number;
  private readonly capacity: number;
  private readonly refillPerSecond: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(opts: TokenBucketOptions) {
    this.capacity = opts.capacity;
    this.refillPerSecond = opts.refillPerSecond;
    this.now = opts.now ?? Date.now;
    this.sleep = opts.sleep ?? defaultSleep;
    this.tokens = opts.capacity;
    this.lastRefill = this.now();
  }

  /**
   * Try to take a token without waiting.
   */
  tryAcquire(): boolean {
    this.refill();
    if (this.tokens >= 1) {
      this.tokens -= 1;
      return true;
    }
    return false;
  }

  /**
   * Take a token, waiting up to `maxWaitMs` for one to be refilled.
   * @throws RateLimitedError when no token becomes available in time.
   */
  async acquire(maxWaitMs: number): Promise<void> {
    const deadline = this.now() + maxWaitMs;
    while (!this.tryAcquire()) {
      const waitMs = this.msUntilNextToken();
      if (!Number.isFinite(waitMs) || this.now() + waitMs > deadline) {
        throw new RateLimitedError(`no upstream request token available within ${maxWaitMs}ms`);
      }
      await this.sleep(waitMs);
    }
  }

  get available(): number {
    this.refill();
    return Math.floor(this.tokens);
  }

  private msUntilNextToken(): number {
    if (this.tokens >= 1) return 0;
    if (this.refillPerSecond <= 0) return Number.POSITIVE_INFINITY;
    return Math.ceil(((1 - this.tokens) / this.refillPerSecond) * 1000);
  }

  private refill(): void {
    const now = this.now();
    const elapsed = (now - this.lastRefill) / 1000;
    this.tokens = Math.min(this.capacity, this.tokens + elapsed * this.refillPerSecond);
    this.lastRefill = now;
  }
}

export default TokenBucket;
