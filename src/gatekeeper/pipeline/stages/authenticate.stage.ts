import { HttpStatus, Logger } from '@nestjs/common';
import type { TokenAuthenticator } from '../../token/token-authenticator';
import type { GatekeeperStage, StageContext } from '../gatekeeper-stage.interface';
import { PASS, reject, type StageOutcome } from '../rejection';

export const UNAUTHORIZED_MESSAGE = 'Invalid or missing authentication token';

export class AuthenticateStage implements GatekeeperStage {
  readonly name = 'authenticate';
  private readonly logger = new Logger(AuthenticateStage.name);

  constructor(
    private readonly authenticator: TokenAuthenticator,
    private readonly secret: string,
  ) {}

  run({ req, state }: StageContext): StageOutcome {
    const result = this.authenticator.authenticate(req, this.secret);
    if (result.ok) {
      state.claims = result.claims;
      return PASS;
    }

    // every kind looks the same to the client
    this.logger.warn(
      `Authentication failed (${result.failure}) for ${state.clientKey} (request ${state.requestId ?? '-'})`,
    );
    return reject(HttpStatus.UNAUTHORIZED, 'Unauthorized', UNAUTHORIZED_MESSAGE);
  }
}
