/**
 * Centralized Error Handling for the polling endpoint
 */

import type { ErrorRequestHandler } from 'express';
import { logger } from '@/shared/utils';
import { SessionError, SessionErrorCode } from '@/modules/session';
import type { Command } from '@/modules/session';
import { IoError, IoErrorCode } from '../types';

/**
 * body-parser failures carry a `type` tag and an HTTP status
 */
function bodyParserError(error: unknown): IoError | undefined {
  if (typeof error !== 'object' || error === null || !('type' in error)) {
    return undefined;
  }
  switch (error.type) {
    case 'entity.parse.failed':
      return new IoError('Request body is not valid JSON', IoErrorCode.MALFORMED_BODY, 400);
    case 'entity.too.large':
      return new IoError('Request body is too large', IoErrorCode.BODY_TOO_LARGE, 413);
    default:
      return undefined;
  }
}

/**
 * Map any thrown value onto the endpoint's error taxonomy
 */
export function toIoError(error: unknown): IoError {
  if (error instanceof IoError) {
    return error;
  }

  const parserError = bodyParserError(error);
  if (parserError) {
    return parserError;
  }

  if (error instanceof SessionError) {
    switch (error.code) {
      case SessionErrorCode.SESSION_BUSY:
        return new IoError(error.message, IoErrorCode.SESSION_BUSY, 503);
      case SessionErrorCode.RUNNER_STOPPED:
        return new IoError('Server is shutting down', IoErrorCode.UNAVAILABLE, 503);
      default:
        break;
    }
  }

  return new IoError('Internal server error', IoErrorCode.INTERNAL, 500);
}

/**
 * Client-visible form of an error: a one-command response body
 */
export function errorCommands(error: IoError): Command[] {
  return [{ command: 'error', spec: { code: error.code, message: error.message } }];
}

/**
 * Express error middleware for the polling endpoint
 */
export const ioErrorHandler: ErrorRequestHandler = (error, req, res, next) => {
  if (res.headersSent) {
    next(error);
    return;
  }

  const ioError = toIoError(error);

  if (ioError.statusCode >= 500) {
    logger.error('Request failed', error, {
      method: req.method,
      path: req.path,
      code: ioError.code,
    });
  } else {
    logger.warn('Rejected client request', {
      method: req.method,
      path: req.path,
      code: ioError.code,
      reason: ioError.message,
    });
  }

  res.status(ioError.statusCode).json(errorCommands(ioError));
};
