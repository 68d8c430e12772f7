import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { resolve } from 'path';
import { GatekeeperConfigError } from '../gatekeeper/errors';
import { GATEKEEPER_OPTIONS } from '../gatekeeper/gatekeeper.constants';
import type { GatekeeperOptions } from '../gatekeeper/interfaces/gatekeeper-options.interface';
import { DEFAULT_SWEEP_INTERVAL_MS } from '../gatekeeper/rate-limit/rate-limiter-registry';

export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;
export const DEFAULT_UPLOAD_ROOT = './uploads';

export function loadGatekeeperOptions(
  configService: ConfigService,
): GatekeeperOptions {
  const jwtSecret = configService.get<string>('JWT_SECRET', '');
  if (jwtSecret.trim() === '') {
    throw new GatekeeperConfigError('JWT_SECRET must be set');
  }

  return {
    jwtSecret,
    uploadRoot: resolve(
      configService.get<string>('UPLOAD_ROOT', DEFAULT_UPLOAD_ROOT),
    ),
    sweepIntervalMs: positiveInteger(
      configService,
      'RATE_LIMIT_SWEEP_INTERVAL_MS',
      DEFAULT_SWEEP_INTERVAL_MS,
    ),
    requestTimeoutMs: positiveInteger(
      configService,
      'REQUEST_TIMEOUT_MS',
      DEFAULT_REQUEST_TIMEOUT_MS,
    ),
    trustProxy: configService.get<string>('TRUST_PROXY', 'false') === 'true',
  };
}

export function positiveInteger(
  configService: ConfigService,
  key: string,
  fallback: number,
): number {
  const raw = configService.get<string | number>(key);
  if (raw === undefined || raw === '') {
    return fallback;
  }
  const value = typeof raw === 'number' ? raw : Number(raw.trim());
  if (!Number.isInteger(value) || value < 1) {
    throw new GatekeeperConfigError(
      `${key} must be a positive integer, got "${raw}"`,
    );
  }
  return value;
}

export const gatekeeperOptionsFactory = {
  provide: GATEKEEPER_OPTIONS,
  useFactory: (configService: ConfigService): GatekeeperOptions => {
    const options = loadGatekeeperOptions(configService);
    new Logger('GatekeeperOptionsFactory').log(
      `Uploads under ${options.uploadRoot}, timeout ${options.requestTimeoutMs}ms, sweep every ${options.sweepIntervalMs}ms`,
    );
    return options;
  },
  inject: [ConfigService],
};
