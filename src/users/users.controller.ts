import { Controller, Get } from '@nestjs/common';
import { CurrentUser } from '../common/decorators/current-user.decorator';
import { ok } from '../common/dto/api-response.dto';
import type { IdentityClaims } from '../gatekeeper/token/identity-claims';

@Controller('users')
export class UsersController {
  /**
   * GET /users/profile
   * Identity as asserted by the caller's verified token
   */
  @Get('profile')
  getProfile(@CurrentUser() user: IdentityClaims) {
    return ok('Profile retrieved successfully', {
      id: user.subject,
      email: user.email,
      role: user.role,
      tokenExpiresAt: user.expiresAt.toISOString(),
    });
  }
}
