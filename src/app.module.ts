import {
  Inject,
  MiddlewareConsumer,
  Module,
  NestModule,
} from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { LoggerModule } from 'nestjs-pino';
import { AdminModule } from './admin/admin.module';
import { FilesModule } from './files/files.module';
import { GatekeeperModule } from './gatekeeper/gatekeeper.module';
import { GATEKEEPER_OPTIONS } from './gatekeeper/gatekeeper.constants';
import type { GatekeeperOptions } from './gatekeeper/interfaces/gatekeeper-options.interface';
import { PipelineComposer } from './gatekeeper/pipeline/pipeline-composer';
import { HealthModule } from './health/health.module';
import { buildRouteBindings } from './routes/route-policies';
import { pinoConfig } from './shared/logging/pino.config';
import { RequestIdMiddleware } from './shared/middleware/request-id.middleware';
import { UsersModule } from './users/users.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
    }),
    LoggerModule.forRoot(pinoConfig),
    GatekeeperModule,
    HealthModule,
    UsersModule,
    FilesModule,
    AdminModule,
  ],
})
export class AppModule implements NestModule {
  constructor(
    private readonly pipelineComposer: PipelineComposer,
    @Inject(GATEKEEPER_OPTIONS) private readonly options: GatekeeperOptions,
  ) {}

  configure(consumer: MiddlewareConsumer) {
    consumer.apply(RequestIdMiddleware).forRoutes('*');

    for (const { method, path, policy } of buildRouteBindings(this.options)) {
      const pipeline = this.pipelineComposer.compose(policy);
      consumer.apply(pipeline.handler).forRoutes({ path, method });
    }
  }
}
