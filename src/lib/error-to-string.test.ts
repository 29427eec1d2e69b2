import { describe, expect, it } from 'vitest';
import { errorToString, toError } from './error-to-string';
import { EOL } from './constants';

class SampleErr extends Error {
  public errPrefix = 'SampleErr';
  public errType = 'Test';
  public errCode = 'Broken';
  public additionalInfo: Record<string, unknown>;
  public sensitiveFieldNames = ['token'];

  constructor(additionalInfo: Record<string, unknown>) {
    super('Sample failure');
    this.name = 'SampleErr';
    this.additionalInfo = additionalInfo;
  }
}

describe('errorToString', () => {
  it('should align keys into one column', () => {
    const error = new SampleErr({ id: 'api' });
    error.stack = undefined;

    expect(errorToString(error)).toBe(
      [
        'Name               SampleErr',
        'Message            Sample failure',
        'Prefix             SampleErr',
        'errType            Test',
        'errCode            Broken',
        'AdditionalInfo.id  api',
      ].join(EOL),
    );
  });

  it('should mask sensitive additional info fields', () => {
    const error = new SampleErr({ token: 'test-secret' });
    error.stack = undefined;

    expect(errorToString(error)).toContain('AdditionalInfo.token  ***');
    expect(errorToString(error)).not.toContain('test-secret');
  });

  it('should append the stack and an indented cause', () => {
    const cause = new Error('root cause');
    cause.stack = undefined;
    const error = new Error('outer', { cause });
    error.stack = 'Error: outer\n    at somewhere';

    const lines = errorToString(error).split(EOL);

    expect(lines).toEqual([
      'Name     Error',
      'Message  outer',
      '',
      'Error: outer',
      '    at somewhere',
      '',
      'Cause:',
      '    Name     Error',
      '    Message  root cause',
    ]);
  });

  it('should stringify non-error values', () => {
    expect(errorToString('plain')).toBe('plain');
    expect(errorToString(42)).toBe('42');
    expect(errorToString(undefined)).toBe('undefined');
  });
});

describe('toError', () => {
  it('should keep Error instances and wrap everything else', () => {
    const error = new Error('same');

    expect(toError(error)).toBe(error);
    expect(toError({ a: 1 }).message).toBe('{"a":1}');
  });
});
