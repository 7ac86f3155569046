import {
  ErrorCode,
  RemoteJobFailure,
  StageExecutionError,
  ValidationError,
  toApplicationError,
} from '../../src/errors/index.js';
import { getErrorCode, getErrorMessage, serializeError } from '../../src/utils/errorHandling.js';

describe('serializeError', () => {
  it('should keep code, retry hint and job context of application errors', () => {
    const error = new RemoteJobFailure('abc123', 'FAILED', 'lip sync failed', { stage: 'video', itemId: 'item-3' });

    expect(serializeError(error)).toEqual({
      name: 'RemoteJobFailure',
      code: ErrorCode.JOB_REMOTE_FAILED,
      message: 'Remote job abc123 ended with status FAILED: lip sync failed',
      retryable: false,
      jobId: 'abc123',
      stage: 'video',
      itemId: 'item-3',
    });
  });

  it('should describe plain errors and thrown values', () => {
    const systemError = Object.assign(new Error('no such file'), { code: 'ENOENT' });

    expect(serializeError(systemError)).toEqual({
      name: 'Error',
      code: 'ENOENT',
      message: 'no such file',
      retryable: false,
    });
    expect(serializeError('boom')).toEqual({ name: 'Error', code: 'UNKNOWN', message: 'boom', retryable: false });
  });
});

describe('toApplicationError', () => {
  it('should tag application errors with stage and item without overwriting', () => {
    const error = new ValidationError('bad', { stage: 'audio' });

    const tagged = toApplicationError(error, 'video', { itemId: 'item-1', jobId: 'abc123' });

    expect(tagged).toBe(error);
    expect(tagged.context.stage).toBe('audio');
    expect(tagged.context.itemId).toBe('item-1');
    expect(tagged.context.jobId).toBe('abc123');
  });

  it('should wrap anything else in a StageExecutionError', () => {
    const cause = new TypeError('undefined is not a function');

    const wrapped = toApplicationError(cause, 'script', { itemId: 'item-2' });

    expect(wrapped).toBeInstanceOf(StageExecutionError);
    expect(wrapped.code).toBe(ErrorCode.PIPELINE_STAGE_FAILED);
    expect(wrapped.message).toBe('undefined is not a function');
    expect(wrapped.cause).toBe(cause);
    expect(wrapped.context).toMatchObject({ stage: 'script', itemId: 'item-2' });
  });
});

describe('error helpers', () => {
  it('should read messages and codes from unknown values', () => {
    expect(getErrorMessage({ message: 'from object' })).toBe('from object');
    expect(getErrorMessage(42)).toBe('An unknown error occurred');
    expect(getErrorCode({ code: 'ECONNRESET' })).toBe('ECONNRESET');
    expect(getErrorCode(new Error('x'))).toBeUndefined();
  });
});
