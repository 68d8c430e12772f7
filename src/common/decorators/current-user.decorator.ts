import { createParamDecorator, ExecutionContext } from '@nestjs/common';
import type { GatekeptRequest } from '../../gatekeeper/interfaces/gatekept-request.interface';
import type { IdentityClaims } from '../../gatekeeper/token/identity-claims';

export const CurrentUser = createParamDecorator(
  (data: unknown, ctx: ExecutionContext): IdentityClaims => {
    const request = ctx.switchToHttp().getRequest<GatekeptRequest>();
    // Claims are attached by the route's authenticate stage
    const claims = request.gatekeeper?.claims;
    if (!claims) {
      throw new Error('Route is not authenticated by the gatekeeper');
    }
    return claims;
  },
);
