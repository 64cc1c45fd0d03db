/**
 * Session Module - Public API
 */

export {
  SessionContext,
  SessionRegistry,
  ExpiryTracker,
  CoroutineBasedSession,
  ThreadBasedSession,
  TaskRunner,
  createSessionFactory,
} from './services';
export type { SessionFactoryOptions } from './services';

export { SESSION_CONSTANTS, SESSION_COMMANDS } from './config/session.constants';

export {
  SessionError,
  SessionErrorCode,
  SessionClosedError,
  SessionBusyError,
  SessionIdCollisionError,
  TaskRunnerStoppedError,
  WorkerModuleMissingError,
} from './types';

export type {
  ClientEvent,
  Command,
  WebIOSession,
  SessionIO,
  SessionHandler,
  SessionFactory,
  SessionApp,
  SessionType,
  SessionContextConfig,
  SessionContextStats,
  SessionWorkerData,
  WorkerHandle,
  WorkerSpawner,
} from './types';
