import { runInNewContext } from 'vm';
import {
  errorMessage,
  errorStack,
  hasErrorCode,
  hasErrorName,
} from './error-details';

describe('error details', () => {
  const foreignError: unknown = runInNewContext(
    "Object.assign(new Error('file exists'), { code: 'EEXIST' })",
  );

  it('should read the code of an error from another realm', () => {
    expect(foreignError instanceof Error).toBe(false);
    expect(hasErrorCode(foreignError, 'EEXIST')).toBe(true);
    expect(hasErrorCode(foreignError, 'ENOENT')).toBe(false);
  });

  it('should read the name and message of an error from another realm', () => {
    expect(hasErrorName(foreignError, 'Error')).toBe(true);
    expect(errorMessage(foreignError)).toBe('file exists');
    expect(errorStack(foreignError)).toMatch(/^Error: file exists/);
  });

  it('should fall back to String() for values that are not objects', () => {
    expect(hasErrorCode('EEXIST', 'EEXIST')).toBe(false);
    expect(hasErrorCode(null, 'EEXIST')).toBe(false);
    expect(errorMessage(42)).toBe('42');
    expect(errorStack(undefined)).toBe('undefined');
  });
});
