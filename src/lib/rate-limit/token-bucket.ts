/**
 * Token Bucket
 * In-process limiter for outbound calls; acquire() waits until a token is available
 */

import { TokenBucketConfig, TokenBucketStats } from './rate-limit.types';

export class TokenBucket {
  private tokens: number;
  private lastRefill: number;
  private granted: number = 0;
  private waited: number = 0;
  private readonly capacity: number;
  private readonly refillPerMs: number;

  constructor(config: TokenBucketConfig, private readonly now: () => number = Date.now) {
    if (config.capacity < 1 || config.refillPerSecond <= 0) {
      throw new Error('Token bucket needs capacity >= 1 and a positive refill rate');
    }
    this.capacity = config.capacity;
    this.refillPerMs = config.refillPerSecond / 1000;
    this.tokens = config.capacity;
    this.lastRefill = this.now();
  }

  /**
   * Take a token if one is available
   */
  tryRemoveToken(): boolean {
    this.refill();
    if (this.tokens >= 1) {
      this.tokens -= 1;
      this.granted++;
      return true;
    }
    return false;
  }

  /**
   * Milliseconds until the next token is available (0 if one is available now)
   */
  msUntilNextToken(): number {
    this.refill();
    if (this.tokens >= 1) {
      return 0;
    }
    return Math.ceil((1 - this.tokens) / this.refillPerMs);
  }

  /**
   * Wait for a token. Resolves false if the signal aborts first.
   */
  async acquire(signal?: AbortSignal): Promise<boolean> {
    let hasWaited = false;

    while (!this.tryRemoveToken()) {
      if (signal?.aborted) {
        return false;
      }
      if (!hasWaited) {
        hasWaited = true;
        this.waited++;
      }
      const proceed = await this.sleep(this.msUntilNextToken(), signal);
      if (!proceed) {
        return false;
      }
    }

    return true;
  }

  getStats(): TokenBucketStats {
    this.refill();
    return {
      available: Math.floor(this.tokens),
      granted: this.granted,
      waited: this.waited,
    };
  }

  private refill(): void {
    const current = this.now();
    const elapsed = current - this.lastRefill;
    if (elapsed > 0) {
      this.tokens = Math.min(this.capacity, this.tokens + elapsed * this.refillPerMs);
      this.lastRefill = current;
    }
  }

  private sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
    return new Promise((resolve) => {
      const onAbort = (): void => {
        clearTimeout(timer);
        resolve(false);
      };
      const timer = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort);
        resolve(true);
      }, Math.max(1, ms));
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }
}
