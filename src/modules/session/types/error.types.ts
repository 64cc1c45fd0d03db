/**
 * Session Error Types
 */

export enum SessionErrorCode {
  SESSION_CLOSED = 'session_closed',
  SESSION_BUSY = 'session_busy',
  ID_COLLISION = 'id_collision',
  RUNNER_STOPPED = 'runner_stopped',
  WORKER_MODULE_MISSING = 'worker_module_missing',
}

export class SessionError extends Error {
  constructor(
    message: string,
    readonly code: SessionErrorCode
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Raised inside application logic awaiting input on a session that was closed
 */
export class SessionClosedError extends SessionError {
  constructor(sessionId: string) {
    super(`Session ${sessionId} is closed`, SessionErrorCode.SESSION_CLOSED);
  }
}

/**
 * A thread-based session did not drain its inbound queue in time
 */
export class SessionBusyError extends SessionError {
  constructor(sessionId: string, timeoutMs: number) {
    super(
      `Session ${sessionId} did not accept the event within ${timeoutMs}ms`,
      SessionErrorCode.SESSION_BUSY
    );
  }
}

export class SessionIdCollisionError extends SessionError {
  constructor(attempts: number) {
    super(
      `Could not allocate a unique session id after ${attempts} attempts`,
      SessionErrorCode.ID_COLLISION
    );
  }
}

export class TaskRunnerStoppedError extends SessionError {
  constructor() {
    super('Task runner is not accepting tasks', SessionErrorCode.RUNNER_STOPPED);
  }
}

export class WorkerModuleMissingError extends SessionError {
  constructor() {
    super(
      'Thread-based sessions need a workerModule to load inside the worker thread',
      SessionErrorCode.WORKER_MODULE_MISSING
    );
  }
}
