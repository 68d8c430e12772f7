export interface RateLimitConfig {
  ratePerSecond: number;
  burst: number;
}

export enum RateClass {
  STRICT = 'strict',
  MODERATE = 'moderate',
  LENIENT = 'lenient',
}

export const RATE_CLASSES: Readonly<Record<RateClass, RateLimitConfig>> = {
  [RateClass.STRICT]: { ratePerSecond: 1, burst: 2 },
  [RateClass.MODERATE]: { ratePerSecond: 10, burst: 20 },
  [RateClass.LENIENT]: { ratePerSecond: 100, burst: 200 },
};

/** Either a named class or a custom rate and burst */
export type RateLimitChoice = RateClass | RateLimitConfig;

export function resolveRateLimit(limit: RateLimitChoice): RateLimitConfig {
  if (typeof limit === 'string') {
    return RATE_CLASSES[limit];
  }
  return { ratePerSecond: limit.ratePerSecond, burst: limit.burst };
}
