/**
 * Error Mapping Tests
 */

import { describe, it, expect } from 'vitest';
import { errorCommands, toIoError } from '@/modules/io/handlers/error.handler';
import { InvalidEventError, IoErrorCode } from '@/modules/io/types';
import { SessionBusyError, SessionClosedError, TaskRunnerStoppedError } from '@/modules/session/types';

describe('toIoError', () => {
  it('should pass endpoint errors through', () => {
    const error = new InvalidEventError('nope');

    expect(toIoError(error)).toBe(error);
  });

  it('should map body-parser failures', () => {
    expect(toIoError({ type: 'entity.parse.failed', status: 400 })).toMatchObject({
      code: IoErrorCode.MALFORMED_BODY,
      statusCode: 400,
    });
    expect(toIoError({ type: 'entity.too.large', status: 413 })).toMatchObject({
      code: IoErrorCode.BODY_TOO_LARGE,
      statusCode: 413,
    });
  });

  it('should map session errors that the client can retry', () => {
    expect(toIoError(new SessionBusyError('s1', 10))).toMatchObject({
      code: IoErrorCode.SESSION_BUSY,
      statusCode: 503,
    });
    expect(toIoError(new TaskRunnerStoppedError())).toMatchObject({
      code: IoErrorCode.UNAVAILABLE,
      statusCode: 503,
      message: 'Server is shutting down',
    });
  });

  it('should hide anything else behind a generic 500', () => {
    for (const error of [new Error('db password wrong'), new SessionClosedError('s1'), 'text']) {
      expect(toIoError(error)).toMatchObject({
        code: IoErrorCode.INTERNAL,
        statusCode: 500,
        message: 'Internal server error',
      });
    }
  });
});

describe('errorCommands', () => {
  it('should wrap the error in a single error command', () => {
    expect(errorCommands(new InvalidEventError('bad'))).toEqual([
      { command: 'error', spec: { code: 'invalid_event', message: 'Invalid client event: bad' } },
    ]);
  });
});
