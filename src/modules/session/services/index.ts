/**
 * Session Services
 */

export { SessionRegistry } from './session-registry.service';
export { ExpiryTracker } from './expiry-tracker.service';
export { SessionContext, DEFAULT_SESSION_CONTEXT_CONFIG } from './session-context.service';
export { BaseSession } from './base-session';
export { CoroutineBasedSession } from './coroutine-session.service';
export { ThreadBasedSession } from './thread-session.service';
export type { ThreadSessionOptions } from './thread-session.service';
export { TaskRunner } from './task-runner.service';
export type { Task } from './task-runner.service';
export { createSessionFactory } from './session-factory';
export type { SessionFactoryOptions } from './session-factory';
export { spawnSessionWorker } from './worker-spawner';
