/**
 * Session Factory
 * Picks the session variant once, at configuration time
 */

import { SESSION_CONSTANTS } from '../config/session.constants';
import { CoroutineBasedSession } from './coroutine-session.service';
import { ThreadBasedSession } from './thread-session.service';
import type { TaskRunner } from './task-runner.service';
import { spawnSessionWorker } from './worker-spawner';
import { WorkerModuleMissingError } from '../types';
import type { SessionApp, SessionFactory, SessionType, WorkerSpawner } from '../types';

export interface SessionFactoryOptions {
  type: SessionType;
  app: SessionApp;
  runner?: TaskRunner;
  spawnWorker?: WorkerSpawner;
  pushTimeoutMs?: number;
}

export function createSessionFactory(options: SessionFactoryOptions): SessionFactory {
  const { type, app, runner } = options;

  if (type === 'thread') {
    const modulePath = app.workerModule;
    if (!modulePath) {
      throw new WorkerModuleMissingError();
    }
    const spawn = options.spawnWorker ?? spawnSessionWorker;
    const exportName = app.workerExport ?? SESSION_CONSTANTS.DEFAULT_WORKER_EXPORT;

    return (sessionId) =>
      new ThreadBasedSession(sessionId, {
        spawn,
        modulePath,
        exportName,
        pushTimeoutMs: options.pushTimeoutMs,
      });
  }

  return (sessionId) => new CoroutineBasedSession(sessionId, app.handler, runner);
}
