import {
  ArgumentsHost,
  BadRequestException,
  NotFoundException,
  ServiceUnavailableException,
} from '@nestjs/common';
import { fail } from '../dto/api-response.dto';
import { HttpExceptionFilter } from './http-exception.filter';

function hostFor(response: { status: jest.Mock; json: jest.Mock }): ArgumentsHost {
  return {
    switchToHttp: () => ({
      getRequest: jest.fn(),
      getResponse: jest.fn().mockReturnValue(response),
      getNext: jest.fn(),
    }),
    switchToRpc: jest.fn(),
    switchToWs: jest.fn(),
    getArgs: jest.fn(),
    getArgByIndex: jest.fn(),
    getType: jest.fn(),
  };
}

describe('HttpExceptionFilter', () => {
  const filter = new HttpExceptionFilter();
  let response: { status: jest.Mock; json: jest.Mock };

  beforeEach(() => {
    response = { status: jest.fn(), json: jest.fn() };
    response.status.mockReturnValue(response);
  });

  it('should pass an envelope through untouched', () => {
    const body = fail('Validation failed', 'ValidationFailed', {
      scope: 'Invalid value',
    });

    filter.catch(new BadRequestException(body), hostFor(response));

    expect(response.status).toHaveBeenCalledWith(400);
    expect(response.json).toHaveBeenCalledWith(body);
  });

  it('should wrap other HTTP exceptions with a tag for their status', () => {
    filter.catch(new NotFoundException('Cannot GET /nope'), hostFor(response));

    expect(response.status).toHaveBeenCalledWith(404);
    expect(response.json).toHaveBeenCalledWith({
      success: false,
      message: 'Cannot GET /nope',
      error: 'NotFound',
    });
  });

  it('should tag unlisted server errors as InternalFailure', () => {
    filter.catch(
      new ServiceUnavailableException('Down for maintenance'),
      hostFor(response),
    );

    expect(response.status).toHaveBeenCalledWith(503);
    expect(response.json).toHaveBeenCalledWith({
      success: false,
      message: 'Down for maintenance',
      error: 'InternalFailure',
    });
  });

  it('should hide the details of unexpected errors', () => {
    filter.catch(new Error('database password is wrong'), hostFor(response));

    expect(response.status).toHaveBeenCalledWith(500);
    expect(response.json).toHaveBeenCalledWith({
      success: false,
      message: 'Internal server error',
      error: 'InternalFailure',
    });
  });
});
