import { MutmutError, MutmutErrorCode, isProcessErrorCode } from '../../../src/shared/errors.js';

describe('MutmutError', () => {
  it('creates error with code and message', () => {
    const err = new MutmutError(MutmutErrorCode.ENVIRONMENT_ERROR, 'invalid venv');
    expect(err.code).toBe(MutmutErrorCode.ENVIRONMENT_ERROR);
    expect(err.message).toBe('invalid venv');
    expect(err.name).toBe('MutmutError');
    expect(err instanceof Error).toBe(true);
  });

  it('includes optional context', () => {
    const err = new MutmutError(MutmutErrorCode.TOOL_FAILURE, 'mutmut clean exited with 2', { stderr: 'boom', exitCode: 2 });
    expect(err.context).toEqual({ stderr: 'boom', exitCode: 2 });
  });
});

describe('isProcessErrorCode', () => {
  it('is true only for launch failures and timeouts', () => {
    expect(isProcessErrorCode(MutmutErrorCode.LAUNCH_FAILURE)).toBe(true);
    expect(isProcessErrorCode(MutmutErrorCode.TIMEOUT)).toBe(true);
    expect(isProcessErrorCode(MutmutErrorCode.TOOL_FAILURE)).toBe(false);
    expect(isProcessErrorCode(MutmutErrorCode.PARSE_ERROR)).toBe(false);
  });
});
