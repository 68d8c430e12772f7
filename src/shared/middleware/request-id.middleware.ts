import { Injectable, NestMiddleware } from '@nestjs/common';
import { Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';
import type { GatekeptRequest } from '../../gatekeeper/interfaces/gatekept-request.interface';

export const REQUEST_ID_HEADER = 'x-request-id';

export function newRequestId(): string {
  return `req-${uuidv4()}`;
}

@Injectable()
export class RequestIdMiddleware implements NestMiddleware {
  use(req: GatekeptRequest, res: Response, next: NextFunction): void {
    const header = req.headers[REQUEST_ID_HEADER];
    const requestId =
      typeof header === 'string' && header !== '' ? header : newRequestId();
    // the http logger reads the id back from the header
    req.headers[REQUEST_ID_HEADER] = requestId;
    req.requestId = requestId;
    res.setHeader('X-Request-ID', requestId);
    next();
  }
}
