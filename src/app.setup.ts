import { ValidationPipe } from '@nestjs/common';
import type { NestExpressApplication } from '@nestjs/platform-express';
import { HttpExceptionFilter } from './common/filters/http-exception.filter';
import { validationExceptionFactory } from './common/validation/validation-exception.factory';
import { GATEKEEPER_OPTIONS } from './gatekeeper/gatekeeper.constants';
import type { GatekeeperOptions } from './gatekeeper/interfaces/gatekeeper-options.interface';
import { API_PREFIX } from './routes/route-policies';

/**
 * Everything main.ts applies to the app besides logging and listening.
 * Shared with the e2e suite so both run the same surface.
 */
export function configureApp(app: NestExpressApplication): void {
  const options = app.get<GatekeeperOptions>(GATEKEEPER_OPTIONS);

  app.set('trust proxy', options.trustProxy);
  app.setGlobalPrefix(API_PREFIX);
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      transform: true,
      exceptionFactory: validationExceptionFactory,
    }),
  );
  app.useGlobalFilters(new HttpExceptionFilter());
  app.enableShutdownHooks();
}
