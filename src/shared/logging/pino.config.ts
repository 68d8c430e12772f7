import { Params } from 'nestjs-pino';
import { IncomingMessage, ServerResponse } from 'http';
import { multistream } from 'pino';
import pinoPretty from 'pino-pretty';
import { createWriteStream } from 'fs';
import {
  newRequestId,
  REQUEST_ID_HEADER,
} from '../middleware/request-id.middleware';

const serviceName = process.env.SERVICE_NAME || 'request-gatekeeper';
const isProduction = process.env.NODE_ENV === 'production';

function requestIdOf(req: IncomingMessage): string | undefined {
  const requestId = req.headers[REQUEST_ID_HEADER];
  return typeof requestId === 'string' ? requestId : undefined;
}

export const pinoConfig: Params = {
  pinoHttp: {
    level: process.env.LOG_LEVEL || 'info',

    base: {
      service: serviceName,
      environment: process.env.NODE_ENV || 'development',
      version: process.env.APP_VERSION || '1.0.0',
    },

    redact: {
      paths: [
        'req.headers.authorization',
        'req.headers.cookie',
        'password',
        'accessToken',
        'token',
      ],
      remove: true,
    },

    timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,

    serializers: {
      req: (req: IncomingMessage) => ({
        id: requestIdOf(req),
        method: req.method,
        url: req.url,
        headers: isProduction ? undefined : req.headers,
      }),
      res: (res: ServerResponse) => ({
        statusCode: res.statusCode,
      }),
    },

    autoLogging: {
      ignore: (req: IncomingMessage) => (req.url || '').endsWith('/health'),
    },

    genReqId: (req: IncomingMessage) => {
      const requestId = requestIdOf(req) ?? newRequestId();
      req.headers[REQUEST_ID_HEADER] = requestId;
      return requestId;
    },

    customProps: (req: IncomingMessage) => ({
      requestId: requestIdOf(req),
    }),

    stream: multistream([
      {
        level: 'trace' as const,
        stream: isProduction
          ? process.stdout
          : pinoPretty({
              colorize: true,
              translateTime: 'HH:MM:ss Z',
              ignore: 'pid,hostname',
              singleLine: false,
            }),
      },
      // JSON lines for log shippers
      ...(process.env.LOG_FILE
        ? [
            {
              level: 'debug' as const,
              stream: createWriteStream(process.env.LOG_FILE, { flags: 'a' }),
            },
          ]
        : []),
    ]),
  },
};
