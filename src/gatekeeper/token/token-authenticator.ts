import { Injectable } from '@nestjs/common';
import type { IncomingHttpHeaders } from 'http';
import { TokenCodec } from './token-codec';
import type { Authentication } from './identity-claims';

export const BEARER_PREFIX = 'Bearer ';

export interface HeaderSource {
  headers: IncomingHttpHeaders;
}

@Injectable()
export class TokenAuthenticator {
  constructor(private readonly tokenCodec: TokenCodec) {}

  /**
   * Reads `Authorization: Bearer <token>` and verifies the token.
   * The prefix match is exact: case-sensitive with a single space.
   */
  authenticate(request: HeaderSource, secret: string): Authentication {
    const header = request.headers.authorization;
    if (!header) {
      return { ok: false, failure: 'MissingHeader' };
    }
    if (!header.startsWith(BEARER_PREFIX)) {
      return { ok: false, failure: 'BadScheme' };
    }
    return this.tokenCodec.verify(header.slice(BEARER_PREFIX.length), secret);
  }
}
