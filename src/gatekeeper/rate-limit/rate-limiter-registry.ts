import { Logger } from '@nestjs/common';
import type { Clock } from '../clock';
import { GatekeeperConfigError } from '../errors';
import { TokenBucket } from './token-bucket';
import type { RateLimitConfig } from './rate-classes';

export const DEFAULT_SWEEP_INTERVAL_MS = 5 * 60 * 1000;

export interface RateLimiterRegistryOptions extends RateLimitConfig {
  sweepIntervalMs: number;
  clock: Clock;
}

export interface RateDecision {
  allowed: boolean;
  /** Whole tokens left after this decision */
  remaining: number;
  retryAfterMs: number;
}

/**
 * Per-client token buckets, created lazily at full capacity.
 *
 * consume() and sweep() are synchronous, so each runs to completion on the
 * event loop without interleaving: a sweep can never delete a bucket between
 * another caller's refill and decrement, and no lock outlives a call.
 */
export class RateLimiterRegistry {
  private readonly logger = new Logger(RateLimiterRegistry.name);
  private readonly buckets = new Map<string, TokenBucket>();
  private sweepTimer: NodeJS.Timeout | null = null;

  constructor(
    readonly name: string,
    private readonly options: RateLimiterRegistryOptions,
  ) {
    if (!(options.ratePerSecond > 0)) {
      throw new GatekeeperConfigError(
        `Rate limiter "${name}" needs a positive rate, got ${options.ratePerSecond}`,
      );
    }
    if (!Number.isInteger(options.burst) || options.burst < 1) {
      throw new GatekeeperConfigError(
        `Rate limiter "${name}" needs a burst of at least 1, got ${options.burst}`,
      );
    }
    if (!(options.sweepIntervalMs > 0)) {
      throw new GatekeeperConfigError(
        `Rate limiter "${name}" needs a positive sweep interval`,
      );
    }
  }

  get config(): RateLimitConfig {
    return {
      ratePerSecond: this.options.ratePerSecond,
      burst: this.options.burst,
    };
  }

  get size(): number {
    return this.buckets.size;
  }

  get running(): boolean {
    return this.sweepTimer !== null;
  }

  allow(key: string): boolean {
    return this.consume(key).allowed;
  }

  consume(key: string): RateDecision {
    const now = this.options.clock.now();
    let bucket = this.buckets.get(key);
    if (!bucket) {
      bucket = new TokenBucket(
        this.options.burst,
        this.options.ratePerSecond,
        now,
      );
      this.buckets.set(key, bucket);
    }

    const allowed = bucket.tryTake(now);
    return {
      allowed,
      remaining: Math.floor(bucket.available(now)),
      retryAfterMs: allowed ? 0 : bucket.msUntilNextToken(),
    };
  }

  /**
   * Drops every bucket that has refilled to capacity.
   * @returns number of buckets evicted
   */
  sweep(): number {
    const now = this.options.clock.now();
    let evicted = 0;
    for (const [key, bucket] of this.buckets) {
      if (bucket.isFull(now)) {
        this.buckets.delete(key);
        evicted++;
      }
    }
    if (evicted > 0) {
      this.logger.debug(
        `[${this.name}] Evicted ${evicted} idle bucket(s), ${this.buckets.size} remaining`,
      );
    }
    return evicted;
  }

  reset(key: string): boolean {
    return this.buckets.delete(key);
  }

  has(key: string): boolean {
    return this.buckets.has(key);
  }

  start(): void {
    if (this.sweepTimer) {
      return;
    }
    this.sweepTimer = setInterval(() => {
      this.sweep();
    }, this.options.sweepIntervalMs);
    this.sweepTimer.unref();
  }

  stop(): void {
    if (!this.sweepTimer) {
      return;
    }
    clearInterval(this.sweepTimer);
    this.sweepTimer = null;
  }
}
