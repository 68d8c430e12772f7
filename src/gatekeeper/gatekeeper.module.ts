import { Module } from '@nestjs/common';
import { JwtModule } from '@nestjs/jwt';
import { gatekeeperOptionsFactory } from '../config/gatekeeper-options.factory';
import { RoleAuthorizer } from './authorization/role-authorizer';
import { systemClock } from './clock';
import { CLOCK, FILE_STORE, GATEKEEPER_OPTIONS } from './gatekeeper.constants';
import { PipelineComposer } from './pipeline/pipeline-composer';
import { RateLimitService } from './rate-limit/rate-limit.service';
import { TokenAuthenticator } from './token/token-authenticator';
import { TokenCodec } from './token/token-codec';
import { ContentSniffer } from './upload/content-sniffer';
import { LocalFileStore } from './upload/local-file-store';
import { MultipartReader } from './upload/multipart-reader';
import { UploadValidator } from './upload/upload-validator';

@Module({
  // secrets are passed per call, so the module itself holds none
  imports: [JwtModule.register({})],
  providers: [
    gatekeeperOptionsFactory,
    { provide: CLOCK, useValue: systemClock },
    { provide: FILE_STORE, useClass: LocalFileStore },
    TokenCodec,
    TokenAuthenticator,
    RoleAuthorizer,
    RateLimitService,
    ContentSniffer,
    MultipartReader,
    UploadValidator,
    PipelineComposer,
  ],
  exports: [GATEKEEPER_OPTIONS, CLOCK, TokenCodec, RateLimitService, PipelineComposer],
})
export class GatekeeperModule {}
