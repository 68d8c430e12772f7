import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import type { NestExpressApplication } from '@nestjs/platform-express';
import { Logger } from 'nestjs-pino';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';
import { positiveInteger } from './config/gatekeeper-options.factory';
import { API_PREFIX } from './routes/route-policies';

async function bootstrap() {
  const app = await NestFactory.create<NestExpressApplication>(AppModule, {
    bufferLogs: true,
  });

  app.useLogger(app.get(Logger));
  const logger = app.get(Logger);
  const configService = app.get(ConfigService);

  configureApp(app);

  const port = positiveInteger(configService, 'PORT', 8080);
  await app.listen(port);
  logger.log(`Request gatekeeper listening on http://localhost:${port}/${API_PREFIX}`);
}

void bootstrap();
