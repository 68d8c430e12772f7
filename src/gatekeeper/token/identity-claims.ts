/**
 * Identity attributes carried by a verified token. Only TokenCodec.verify
 * produces these; nothing builds them from request input directly.
 */
export interface IdentityClaims {
  readonly subject: string;
  readonly email: string;
  readonly role: string;
  readonly expiresAt: Date;
}

export type TokenFailure = 'Malformed' | 'BadSignature' | 'Expired';

export type AuthFailure = 'MissingHeader' | 'BadScheme' | TokenFailure;

export type TokenVerification =
  | { ok: true; claims: IdentityClaims }
  | { ok: false; failure: TokenFailure };

export type Authentication =
  | { ok: true; claims: IdentityClaims }
  | { ok: false; failure: AuthFailure };

/** Who a token is issued for; used by the external login flow and tests */
export interface TokenSubject {
  id: string;
  email: string;
  role: string;
}
