import { HttpStatus, Logger } from '@nestjs/common';
import type { RoleAuthorizer } from '../../authorization/role-authorizer';
import type { GatekeeperStage, StageContext } from '../gatekeeper-stage.interface';
import { PASS, reject, type StageOutcome } from '../rejection';

export class AuthorizeStage implements GatekeeperStage {
  readonly name = 'authorize';
  private readonly logger = new Logger(AuthorizeStage.name);

  constructor(
    private readonly authorizer: RoleAuthorizer,
    private readonly allowedRoles: ReadonlySet<string>,
  ) {}

  run({ state }: StageContext): StageOutcome {
    const claims = state.claims;
    if (claims && this.authorizer.authorize(claims, this.allowedRoles).ok) {
      return PASS;
    }

    this.logger.warn(
      `Forbidden: role "${claims?.role ?? '(none)'}" of ${claims?.subject ?? 'anonymous'} not in [${[...this.allowedRoles].join(', ')}] (request ${state.requestId ?? '-'})`,
    );
    return reject(HttpStatus.FORBIDDEN, 'Forbidden', 'Insufficient permissions');
  }
}
