import { BadRequestException } from '@nestjs/common';
import type { ValidationError } from 'class-validator';
import { fail } from '../dto/api-response.dto';

/** Property name on the DTO -> field name reported to clients */
export const VALIDATION_FIELD_NAMES: Readonly<Record<string, string>> = {
  clientKey: 'client_key',
  scope: 'scope',
};

const REQUIRED_CONSTRAINTS = ['isNotEmpty', 'isDefined'];

export function validationExceptionFactory(
  errors: ValidationError[],
): BadRequestException {
  const details: Record<string, string> = {};
  for (const error of flatten(errors)) {
    const field = VALIDATION_FIELD_NAMES[error.property] ?? error.property;
    details[field] = messageFor(error);
  }
  return new BadRequestException(
    fail('Validation failed', 'ValidationFailed', details),
  );
}

function messageFor(error: ValidationError): string {
  const failed = Object.keys(error.constraints ?? {});
  if (failed.some((constraint) => REQUIRED_CONSTRAINTS.includes(constraint))) {
    return 'This field is required';
  }
  if (failed.length > 0 && failed.every((constraint) => constraint === 'maxLength')) {
    return 'Value is too long';
  }
  return 'Invalid value';
}

function flatten(errors: readonly ValidationError[]): ValidationError[] {
  return errors.flatMap((error) =>
    error.children && error.children.length > 0
      ? flatten(error.children)
      : [error],
  );
}
