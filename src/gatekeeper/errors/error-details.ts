/**
 * Structural checks on thrown values. Errors raised by Node internals or a
 * second copy of a library fail `instanceof` against our own classes.
 */
function fieldOf(error: unknown, field: string): unknown {
  if (typeof error !== 'object' || error === null) {
    return undefined;
  }
  return Reflect.get(error, field);
}

export function hasErrorCode(error: unknown, code: string): boolean {
  return fieldOf(error, 'code') === code;
}

export function hasErrorName(error: unknown, name: string): boolean {
  return fieldOf(error, 'name') === name;
}

export function errorMessage(error: unknown): string {
  const message = fieldOf(error, 'message');
  return typeof message === 'string' ? message : String(error);
}

export function errorStack(error: unknown): string {
  const stack = fieldOf(error, 'stack');
  return typeof stack === 'string' ? stack : String(error);
}
