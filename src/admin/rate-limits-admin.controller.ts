import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Logger,
  NotFoundException,
  Post,
} from '@nestjs/common';
import { CurrentUser } from '../common/decorators/current-user.decorator';
import { ok } from '../common/dto/api-response.dto';
import { RateLimitService } from '../gatekeeper/rate-limit/rate-limit.service';
import type { IdentityClaims } from '../gatekeeper/token/identity-claims';
import { ResetRateLimitDto } from './dto/reset-rate-limit.dto';

@Controller('admin/rate-limits')
export class RateLimitsAdminController {
  private readonly logger = new Logger(RateLimitsAdminController.name);

  constructor(private readonly rateLimitService: RateLimitService) {}

  @Get()
  list() {
    return ok('Rate limits retrieved successfully', {
      scopes: this.rateLimitService.stats(),
    });
  }

  @Post('reset')
  @HttpCode(HttpStatus.OK)
  reset(@Body() dto: ResetRateLimitDto, @CurrentUser() admin: IdentityClaims) {
    if (!this.rateLimitService.reset(dto.scope, dto.clientKey)) {
      throw new NotFoundException(
        `No bucket for client "${dto.clientKey}" in scope "${dto.scope}"`,
      );
    }
    this.logger.log(
      `${admin.email} reset rate limit of ${dto.clientKey} in scope "${dto.scope}"`,
    );
    return ok('Rate limit reset', {
      scope: dto.scope,
      clientKey: dto.clientKey,
    });
  }
}
