import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import {
  formatError,
  formatResultError,
  handleGenericError,
  handleResultError,
  handleValidationErrors,
} from '@/cli/error-formatting';
import { Failure, Success } from '@/types';

describe('formatError', () => {
  it('should format a bare message', () => {
    expect(formatError('Split failed')).toBe('❌ Split failed');
  });

  it('should append string and Error causes', () => {
    expect(formatError('Split failed', 'disk full')).toBe('❌ Split failed: disk full');
    expect(formatError('Split failed', new Error('boom'))).toBe('❌ Split failed: boom');
  });

  it('should stringify other causes', () => {
    expect(formatError('Split failed', 42)).toBe('❌ Split failed: 42');
  });
});

describe('formatResultError', () => {
  it('should include hint and resolution lines', () => {
    const failure = Failure('Bundle file not found', {
      message: 'Bundle file not found',
      hint: 'Check the path',
      resolution: 'Pass --file',
    });

    expect(formatResultError(failure, 'Split of demo failed')).toEqual([
      '❌ Split of demo failed: Bundle file not found',
      '  Hint: Check the path',
      '  Resolution: Pass --file',
    ]);
  });

  it('should return no lines for a success', () => {
    expect(formatResultError(Success(1), 'ignored')).toEqual([]);
  });
});

describe('exit handlers', () => {
  let errorSpy: jest.SpiedFunction<typeof console.error>;

  beforeEach(() => {
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => {});
    jest.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('process.exit');
    });
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should print the result error and exit with status 1', () => {
    expect(() => handleResultError(Failure('bad yaml'), 'Smelt failed')).toThrow('process.exit');

    expect(errorSpy).toHaveBeenCalledWith('❌ Smelt failed: bad yaml');
    expect(process.exit).toHaveBeenCalledWith(1);
  });

  it('should refuse a successful result', () => {
    expect(() => handleResultError(Success(1), 'Smelt failed')).toThrow(
      'Called handleResultError on successful result',
    );
  });

  it('should list every validation error', () => {
    expect(() => handleValidationErrors(['first', 'second'])).toThrow('process.exit');

    expect(errorSpy.mock.calls.map((call) => call[0])).toEqual([
      '❌ Invalid options:',
      '  • first',
      '  • second',
      '\nUse --help for usage information',
    ]);
  });

  it('should print generic errors', () => {
    expect(() => handleGenericError('CLI failed', new Error('boom'))).toThrow('process.exit');

    expect(errorSpy).toHaveBeenCalledWith('❌ CLI failed: boom');
  });
});
