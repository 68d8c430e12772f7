import { HttpStatus, Logger } from '@nestjs/common';
import type { MultipartReader } from '../../upload/multipart-reader';
import type { UploadConstraintSet } from '../../upload/upload-constraints';
import type {
  UploadFailure,
  UploadValidator,
} from '../../upload/upload-validator';
import type { GatekeeperStage, StageContext } from '../gatekeeper-stage.interface';
import { PASS, reject, type StageOutcome } from '../rejection';

const SERVER_SIDE_FAILURES: ReadonlySet<UploadFailure> = new Set([
  'StorageFailure',
  'InternalFailure',
]);

export class UploadStage implements GatekeeperStage {
  readonly name = 'upload';
  private readonly logger = new Logger(UploadStage.name);

  constructor(
    private readonly reader: MultipartReader,
    private readonly validator: UploadValidator,
    private readonly constraints: UploadConstraintSet,
  ) {}

  async run({ req, res, state, signal }: StageContext): Promise<StageOutcome> {
    const read = await this.reader.read(req, res, this.constraints);
    if (!read.ok) {
      this.logger.warn(
        `Upload rejected (${read.failure}) for ${state.clientKey}: ${read.message}`,
      );
      return reject(HttpStatus.BAD_REQUEST, read.failure, read.message);
    }

    const outcome = await this.validator.process(
      read.form,
      this.constraints,
      signal,
    );
    if (!outcome.ok) {
      const status = SERVER_SIDE_FAILURES.has(outcome.failure)
        ? HttpStatus.INTERNAL_SERVER_ERROR
        : HttpStatus.BAD_REQUEST;
      if (status === HttpStatus.BAD_REQUEST) {
        this.logger.warn(
          `Upload rejected (${outcome.failure}) for ${state.clientKey}: ${outcome.message}`,
        );
      }
      return reject(status, outcome.failure, outcome.message);
    }

    state.files = outcome.files;
    return PASS;
  }
}
