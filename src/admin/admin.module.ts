import { Module } from '@nestjs/common';
import { GatekeeperModule } from '../gatekeeper/gatekeeper.module';
import { RateLimitsAdminController } from './rate-limits-admin.controller';

@Module({
  imports: [GatekeeperModule],
  controllers: [RateLimitsAdminController],
})
export class AdminModule {}
