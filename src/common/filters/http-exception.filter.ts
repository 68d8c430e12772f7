import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import type { Response } from 'express';
import { errorStack } from '../../gatekeeper/errors';
import { fail, isApiFailure } from '../dto/api-response.dto';

const STATUS_TAGS: Readonly<Record<number, string>> = {
  [HttpStatus.BAD_REQUEST]: 'ValidationFailed',
  [HttpStatus.UNAUTHORIZED]: 'Unauthorized',
  [HttpStatus.FORBIDDEN]: 'Forbidden',
  [HttpStatus.NOT_FOUND]: 'NotFound',
  [HttpStatus.REQUEST_TIMEOUT]: 'RequestTimeout',
  [HttpStatus.PAYLOAD_TOO_LARGE]: 'FileTooLarge',
  [HttpStatus.TOO_MANY_REQUESTS]: 'LimitExceeded',
};

/**
 * Gives errors raised inside Nest (routing, pipes, controllers) the same
 * envelope the gatekeeper writes for its own rejections.
 */
@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const res = host.switchToHttp().getResponse<Response>();

    if (exception instanceof HttpException) {
      const status = exception.getStatus();
      const body = exception.getResponse();
      if (isApiFailure(body)) {
        res.status(status).json(body);
        return;
      }
      const tag =
        STATUS_TAGS[status] ??
        (status >= 500 ? 'InternalFailure' : 'RequestFailed');
      res.status(status).json(fail(exception.message, tag));
      return;
    }

    this.logger.error(
      'Unhandled exception',
      errorStack(exception),
    );
    res
      .status(HttpStatus.INTERNAL_SERVER_ERROR)
      .json(fail('Internal server error', 'InternalFailure'));
  }
}
