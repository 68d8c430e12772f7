import { Injectable } from '@nestjs/common';
import type { IdentityClaims } from '../token/identity-claims';

export type RoleAuthorization = { ok: true } | { ok: false; failure: 'Forbidden' };

@Injectable()
export class RoleAuthorizer {
  authorize(
    claims: IdentityClaims,
    allowedRoles: ReadonlySet<string>,
  ): RoleAuthorization {
    if (allowedRoles.has(claims.role)) {
      return { ok: true };
    }
    return { ok: false, failure: 'Forbidden' };
  }
}
