/**
 * Polling Endpoint Error Types
 */

export enum IoErrorCode {
  INVALID_EVENT = 'invalid_event',
  MALFORMED_BODY = 'malformed_body',
  BODY_TOO_LARGE = 'body_too_large',
  SESSION_BUSY = 'session_busy',
  UNAVAILABLE = 'unavailable',
  INTERNAL = 'internal_error',
}

export class IoError extends Error {
  constructor(
    message: string,
    readonly code: IoErrorCode,
    readonly statusCode: number
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * POST body is JSON but not a client event
 */
export class InvalidEventError extends IoError {
  constructor(reason: string) {
    super(`Invalid client event: ${reason}`, IoErrorCode.INVALID_EVENT, 400);
  }
}

/**
 * A session did not accept a pushed event within the bounded wait
 */
export class PushTimeoutError extends IoError {
  constructor(timeoutMs: number) {
    super(`Session did not accept the event within ${timeoutMs}ms`, IoErrorCode.SESSION_BUSY, 503);
  }
}
