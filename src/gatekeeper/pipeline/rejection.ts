export type RejectionTag =
  | 'Unauthorized'
  | 'Forbidden'
  | 'LimitExceeded'
  | 'FileRequired'
  | 'TooManyFiles'
  | 'FileTooLarge'
  | 'DisallowedExtension'
  | 'DisallowedContentType'
  | 'InvalidFormData'
  | 'ValidationFailed'
  | 'RequestTimeout'
  | 'StorageFailure'
  | 'InternalFailure';

/** Terminal response produced by the first stage that refuses a request */
export interface Rejection {
  status: number;
  error: RejectionTag;
  message: string;
  headers?: Record<string, string>;
}

export type StageOutcome = { pass: true } | { pass: false; rejection: Rejection };

export const PASS: StageOutcome = { pass: true };

export function reject(
  status: number,
  error: RejectionTag,
  message: string,
  headers?: Record<string, string>,
): StageOutcome {
  return { pass: false, rejection: { status, error, message, headers } };
}
