import { HttpStatus, Logger } from '@nestjs/common';
import type { RateLimiterRegistry } from '../../rate-limit/rate-limiter-registry';
import type { GatekeeperStage, StageContext } from '../gatekeeper-stage.interface';
import { PASS, reject, type StageOutcome } from '../rejection';

export class RateLimitStage implements GatekeeperStage {
  readonly name = 'rate-limit';
  private readonly logger = new Logger(RateLimitStage.name);

  constructor(private readonly registry: RateLimiterRegistry) {}

  run({ state }: StageContext): StageOutcome {
    const decision = this.registry.consume(state.clientKey);
    if (decision.allowed) {
      return PASS;
    }

    this.logger.debug(
      `Rate limit "${this.registry.name}" exceeded by ${state.clientKey} (request ${state.requestId ?? '-'})`,
    );
    return reject(
      HttpStatus.TOO_MANY_REQUESTS,
      'LimitExceeded',
      'Rate limit exceeded. Please try again later.',
      {
        'Retry-After': String(
          Math.max(1, Math.ceil(decision.retryAfterMs / 1000)),
        ),
      },
    );
  }
}
