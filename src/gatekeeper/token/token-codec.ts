import { Inject, Injectable } from '@nestjs/common';
import { JwtService } from '@nestjs/jwt';
import { errorMessage, hasErrorName } from '../errors';
import { CLOCK } from '../gatekeeper.constants';
import type { Clock } from '../clock';
import type {
  IdentityClaims,
  TokenFailure,
  TokenSubject,
  TokenVerification,
} from './identity-claims';

const ALGORITHM = 'HS256';

interface TokenPayload {
  sub: string;
  email: string;
  role: string;
  exp: number;
}

/**
 * HS256 JWT codec.
 *
 * jsonwebtoken checks structure, then the signature (constant-time compare),
 * then expiry, so a forged token that also expired reports BadSignature.
 * A token is expired from the second named by its `exp` claim onwards.
 */
@Injectable()
export class TokenCodec {
  constructor(
    private readonly jwtService: JwtService,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  sign(subject: TokenSubject, secret: string, ttlSeconds: number): string {
    const issuedAt = this.nowSeconds();
    return this.jwtService.sign(
      {
        sub: subject.id,
        email: subject.email,
        role: subject.role,
        iat: issuedAt,
        exp: issuedAt + ttlSeconds,
      },
      { secret, algorithm: ALGORITHM },
    );
  }

  verify(token: string, secret: string): TokenVerification {
    let payload: unknown;
    try {
      payload = this.jwtService.verify<object>(token, {
        secret,
        algorithms: [ALGORITHM],
        clockTimestamp: this.nowSeconds(),
      });
    } catch (error) {
      return { ok: false, failure: classifyVerifyError(error) };
    }

    if (!isTokenPayload(payload)) {
      return { ok: false, failure: 'Malformed' };
    }

    const claims: IdentityClaims = Object.freeze({
      subject: payload.sub,
      email: payload.email,
      role: payload.role,
      expiresAt: new Date(payload.exp * 1000),
    });
    return { ok: true, claims };
  }

  private nowSeconds(): number {
    return Math.floor(this.clock.now() / 1000);
  }
}

// @nestjs/jwt may throw from its own nested copy of jsonwebtoken, so
// match on the error name rather than the class.
function classifyVerifyError(error: unknown): TokenFailure {
  if (hasErrorName(error, 'TokenExpiredError')) {
    return 'Expired';
  }
  if (
    hasErrorName(error, 'JsonWebTokenError') &&
    errorMessage(error) === 'invalid signature'
  ) {
    return 'BadSignature';
  }
  return 'Malformed';
}

function isTokenPayload(value: unknown): value is TokenPayload {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const candidate: Record<string, unknown> = { ...value };
  return (
    typeof candidate.sub === 'string' &&
    candidate.sub.length > 0 &&
    typeof candidate.email === 'string' &&
    typeof candidate.role === 'string' &&
    candidate.role.length > 0 &&
    typeof candidate.exp === 'number' &&
    Number.isFinite(candidate.exp)
  );
}
