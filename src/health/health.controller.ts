import { Controller, Get, Inject } from '@nestjs/common';
import { ok } from '../common/dto/api-response.dto';
import type { Clock } from '../gatekeeper/clock';
import { CLOCK } from '../gatekeeper/gatekeeper.constants';

@Controller('health')
export class HealthController {
  constructor(@Inject(CLOCK) private readonly clock: Clock) {}

  @Get()
  check() {
    return ok('Service is running', {
      status: 'OK',
      timestamp: new Date(this.clock.now()).toISOString(),
    });
  }
}
