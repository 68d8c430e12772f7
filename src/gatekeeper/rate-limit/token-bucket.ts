/**
 * Continuous token bucket. Tokens accrue at `ratePerSecond` up to `capacity`;
 * each granted request spends one.
 */
export class TokenBucket {
  private tokens: number;
  private lastRefillMs: number;

  constructor(
    readonly capacity: number,
    readonly ratePerSecond: number,
    nowMs: number,
  ) {
    this.tokens = capacity;
    this.lastRefillMs = nowMs;
  }

  tryTake(nowMs: number): boolean {
    this.refill(nowMs);
    if (this.tokens >= 1) {
      this.tokens -= 1;
      return true;
    }
    return false;
  }

  available(nowMs: number): number {
    this.refill(nowMs);
    return this.tokens;
  }

  isFull(nowMs: number): boolean {
    return this.available(nowMs) >= this.capacity;
  }

  /** Milliseconds until one whole token is available, as of the last refill */
  msUntilNextToken(): number {
    if (this.tokens >= 1) {
      return 0;
    }
    return Math.ceil(((1 - this.tokens) * 1000) / this.ratePerSecond);
  }

  private refill(nowMs: number): void {
    // a clock that steps backwards adds nothing
    if (nowMs <= this.lastRefillMs) {
      return;
    }
    const earned = ((nowMs - this.lastRefillMs) * this.ratePerSecond) / 1000;
    this.tokens = Math.min(this.capacity, this.tokens + earned);
    this.lastRefillMs = nowMs;
  }
}
