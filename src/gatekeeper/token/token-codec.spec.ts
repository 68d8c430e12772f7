import { JwtService } from '@nestjs/jwt';
import { FakeClock, FAKE_EPOCH_MS } from '../../../test/support/fake-clock';
import { TokenCodec } from './token-codec';

const SECRET = 'test-secret';
const subject = { id: 'user-1', email: 'user@example.com', role: 'user' };

function base64url(value: object): string {
  return Buffer.from(JSON.stringify(value)).toString('base64url');
}

describe('TokenCodec', () => {
  let clock: FakeClock;
  let jwtService: JwtService;
  let codec: TokenCodec;

  beforeEach(() => {
    clock = new FakeClock();
    jwtService = new JwtService({});
    codec = new TokenCodec(jwtService, clock);
  });

  it('should verify a token it signed and return frozen claims', () => {
    const token = codec.sign(subject, SECRET, 60);

    const result = codec.verify(token, SECRET);

    expect(result).toEqual({
      ok: true,
      claims: {
        subject: 'user-1',
        email: 'user@example.com',
        role: 'user',
        expiresAt: new Date(FAKE_EPOCH_MS + 60_000),
      },
    });
    if (result.ok) {
      expect(Object.isFrozen(result.claims)).toBe(true);
    }
  });

  it('should report BadSignature for a different secret', () => {
    const token = codec.sign(subject, 'other-secret', 60);

    expect(codec.verify(token, SECRET)).toEqual({
      ok: false,
      failure: 'BadSignature',
    });
  });

  it('should report BadSignature when the payload was altered', () => {
    const [header, , signature] = codec.sign(subject, SECRET, 60).split('.');
    const forged = [
      header,
      base64url({
        sub: 'user-1',
        email: 'user@example.com',
        role: 'admin',
        iat: FAKE_EPOCH_MS / 1000,
        exp: FAKE_EPOCH_MS / 1000 + 60,
      }),
      signature,
    ].join('.');

    expect(codec.verify(forged, SECRET)).toEqual({
      ok: false,
      failure: 'BadSignature',
    });
  });

  it('should accept a token until the second named by exp', () => {
    const token = codec.sign(subject, SECRET, 60);
    clock.advance(59_999);

    expect(codec.verify(token, SECRET).ok).toBe(true);
  });

  it('should report Expired from the exp second onwards', () => {
    const token = codec.sign(subject, SECRET, 60);
    clock.advance(60_000);

    expect(codec.verify(token, SECRET)).toEqual({
      ok: false,
      failure: 'Expired',
    });
  });

  it('should prefer BadSignature over Expired', () => {
    const token = codec.sign(subject, 'other-secret', 60);
    clock.advance(120_000);

    expect(codec.verify(token, SECRET)).toEqual({
      ok: false,
      failure: 'BadSignature',
    });
  });

  it('should report Malformed for garbage', () => {
    expect(codec.verify('not-a-token', SECRET)).toEqual({
      ok: false,
      failure: 'Malformed',
    });
    expect(codec.verify('', SECRET)).toEqual({
      ok: false,
      failure: 'Malformed',
    });
  });

  it('should reject unsigned tokens', () => {
    const unsigned = [
      base64url({ alg: 'none', typ: 'JWT' }),
      base64url({ sub: 'user-1', email: 'a@b.c', role: 'admin', exp: 2_000_000_000 }),
      '',
    ].join('.');

    expect(codec.verify(unsigned, SECRET)).toEqual({
      ok: false,
      failure: 'Malformed',
    });
  });

  it('should reject tokens signed with another algorithm', () => {
    const token = jwtService.sign(
      { sub: 'user-1', email: 'a@b.c', role: 'user', exp: FAKE_EPOCH_MS / 1000 + 60 },
      { secret: SECRET, algorithm: 'HS512' },
    );

    expect(codec.verify(token, SECRET)).toEqual({
      ok: false,
      failure: 'Malformed',
    });
  });

  it('should report Malformed when a claim is missing', () => {
    const token = jwtService.sign(
      { sub: 'user-1', email: 'a@b.c', exp: FAKE_EPOCH_MS / 1000 + 60 },
      { secret: SECRET, algorithm: 'HS256' },
    );

    expect(codec.verify(token, SECRET)).toEqual({
      ok: false,
      failure: 'Malformed',
    });
  });

  it('should report Malformed when a claim has the wrong type', () => {
    const token = jwtService.sign(
      { sub: 42, email: 'a@b.c', role: 'user', exp: FAKE_EPOCH_MS / 1000 + 60 },
      { secret: SECRET, algorithm: 'HS256' },
    );

    expect(codec.verify(token, SECRET)).toEqual({
      ok: false,
      failure: 'Malformed',
    });
  });

  describe('with errors from another copy of jsonwebtoken', () => {
    class ForeignJwtError extends Error {
      constructor(name: string, message: string) {
        super(message);
        this.name = name;
      }
    }

    it.each([
      ['TokenExpiredError', 'jwt expired', 'Expired'],
      ['JsonWebTokenError', 'invalid signature', 'BadSignature'],
      ['JsonWebTokenError', 'jwt malformed', 'Malformed'],
      ['NotBeforeError', 'jwt not active', 'Malformed'],
    ])('should classify %s "%s" as %s', (name, message, failure) => {
      jest.spyOn(jwtService, 'verify').mockImplementation(() => {
        throw new ForeignJwtError(name, message);
      });

      expect(codec.verify('a.b.c', SECRET)).toEqual({ ok: false, failure });
    });
  });
});
