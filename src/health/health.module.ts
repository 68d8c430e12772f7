import { Module } from '@nestjs/common';
import { GatekeeperModule } from '../gatekeeper/gatekeeper.module';
import { HealthController } from './health.controller';

@Module({
  imports: [GatekeeperModule],
  controllers: [HealthController],
})
export class HealthModule {}
