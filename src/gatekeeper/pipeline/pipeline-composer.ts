import { Inject, Injectable, Logger } from '@nestjs/common';
import { RoleAuthorizer } from '../authorization/role-authorizer';
import { GatekeeperConfigError } from '../errors';
import { GATEKEEPER_OPTIONS } from '../gatekeeper.constants';
import type { GatekeeperOptions } from '../interfaces/gatekeeper-options.interface';
import { RateLimitService } from '../rate-limit/rate-limit.service';
import { TokenAuthenticator } from '../token/token-authenticator';
import { MultipartReader } from '../upload/multipart-reader';
import { UploadValidator } from '../upload/upload-validator';
import type { GatekeeperStage } from './gatekeeper-stage.interface';
import { RoutePipeline } from './route-pipeline';
import type { RoutePolicy } from './route-policy.interface';
import { AuthenticateStage } from './stages/authenticate.stage';
import { AuthorizeStage } from './stages/authorize.stage';
import { RateLimitStage } from './stages/rate-limit.stage';
import { UploadStage } from './stages/upload.stage';

@Injectable()
export class PipelineComposer {
  private readonly logger = new Logger(PipelineComposer.name);

  constructor(
    @Inject(GATEKEEPER_OPTIONS) private readonly options: GatekeeperOptions,
    private readonly rateLimitService: RateLimitService,
    private readonly authenticator: TokenAuthenticator,
    private readonly authorizer: RoleAuthorizer,
    private readonly multipartReader: MultipartReader,
    private readonly uploadValidator: UploadValidator,
  ) {}

  /**
   * Stage order is always rate-limit, authenticate, authorize, upload.
   * Invalid policies fail here, at startup, rather than per request.
   */
  compose(policy: RoutePolicy): RoutePipeline {
    const stages: GatekeeperStage[] = [];

    if (policy.rateLimit) {
      const registry = this.rateLimitService.registryFor(
        policy.rateLimit.scope ?? policy.id,
        policy.rateLimit.limit,
      );
      stages.push(new RateLimitStage(registry));
    }

    if (policy.roles && policy.roles.length === 0) {
      throw new GatekeeperConfigError(
        `Route "${policy.id}" restricts roles but allows none`,
      );
    }
    if (policy.authenticate || policy.roles) {
      stages.push(
        new AuthenticateStage(this.authenticator, this.options.jwtSecret),
      );
    }
    if (policy.roles) {
      stages.push(new AuthorizeStage(this.authorizer, new Set(policy.roles)));
    }

    if (policy.upload) {
      stages.push(
        new UploadStage(
          this.multipartReader,
          this.uploadValidator,
          policy.upload,
        ),
      );
    }

    const timeoutMs = policy.timeoutMs ?? this.options.requestTimeoutMs;
    if (!Number.isInteger(timeoutMs) || timeoutMs < 1) {
      throw new GatekeeperConfigError(
        `Route "${policy.id}" timeout must be a positive integer`,
      );
    }

    const pipeline = new RoutePipeline(policy.id, stages, timeoutMs);
    this.logger.log(
      `Route "${policy.id}": ${pipeline.stageNames.join(' -> ') || '(no stages)'}`,
    );
    return pipeline;
  }
}
