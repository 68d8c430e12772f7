import { Inject, Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { CLOCK, GATEKEEPER_OPTIONS } from '../gatekeeper.constants';
import type { Clock } from '../clock';
import type { GatekeeperOptions } from '../interfaces/gatekeeper-options.interface';
import { GatekeeperConfigError } from '../errors';
import { RateLimiterRegistry } from './rate-limiter-registry';
import { resolveRateLimit, type RateLimitChoice } from './rate-classes';

export interface RateLimitScopeStats {
  scope: string;
  ratePerSecond: number;
  burst: number;
  trackedClients: number;
}

/**
 * Owns one RateLimiterRegistry per scope and ties their sweeps to the
 * application lifecycle.
 */
@Injectable()
export class RateLimitService implements OnModuleDestroy {
  private readonly logger = new Logger(RateLimitService.name);
  private readonly registries = new Map<string, RateLimiterRegistry>();

  constructor(
    @Inject(GATEKEEPER_OPTIONS) private readonly options: GatekeeperOptions,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  registryFor(scope: string, limit: RateLimitChoice): RateLimiterRegistry {
    const config = resolveRateLimit(limit);
    const existing = this.registries.get(scope);
    if (existing) {
      const bound = existing.config;
      if (
        bound.ratePerSecond !== config.ratePerSecond ||
        bound.burst !== config.burst
      ) {
        throw new GatekeeperConfigError(
          `Rate limit scope "${scope}" is already bound to ${bound.ratePerSecond}/s burst ${bound.burst}`,
        );
      }
      return existing;
    }

    const registry = new RateLimiterRegistry(scope, {
      ...config,
      sweepIntervalMs: this.options.sweepIntervalMs,
      clock: this.clock,
    });
    registry.start();
    this.registries.set(scope, registry);
    this.logger.log(
      `Rate limit scope "${scope}": ${config.ratePerSecond}/s, burst ${config.burst}`,
    );
    return registry;
  }

  find(scope: string): RateLimiterRegistry | undefined {
    return this.registries.get(scope);
  }

  stats(): RateLimitScopeStats[] {
    return [...this.registries.values()].map((registry) => ({
      scope: registry.name,
      ratePerSecond: registry.config.ratePerSecond,
      burst: registry.config.burst,
      trackedClients: registry.size,
    }));
  }

  /**
   * Forgets a client's bucket so its next request starts at full burst.
   * @returns false when the scope or client is not tracked
   */
  reset(scope: string, clientKey: string): boolean {
    const registry = this.registries.get(scope);
    if (!registry) {
      return false;
    }
    return registry.reset(clientKey);
  }

  onModuleDestroy(): void {
    for (const registry of this.registries.values()) {
      registry.stop();
    }
    this.logger.log(`Stopped ${this.registries.size} rate limit sweep(s)`);
  }
}
