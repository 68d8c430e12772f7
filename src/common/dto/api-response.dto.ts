export interface ApiSuccess<T> {
  success: true;
  message: string;
  data: T;
}

export interface ApiFailure {
  success: false;
  message: string;
  error: string;
  details?: Record<string, string>;
}

export function ok<T>(message: string, data: T): ApiSuccess<T> {
  return { success: true, message, data };
}

export function fail(
  message: string,
  error: string,
  details?: Record<string, string>,
): ApiFailure {
  return details
    ? { success: false, message, error, details }
    : { success: false, message, error };
}

export function isApiFailure(value: unknown): value is ApiFailure {
  return (
    typeof value === 'object' &&
    value !== null &&
    'success' in value &&
    value.success === false &&
    'message' in value &&
    typeof value.message === 'string' &&
    'error' in value &&
    typeof value.error === 'string'
  );
}
