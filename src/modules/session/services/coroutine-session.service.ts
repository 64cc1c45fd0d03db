/**
 * Coroutine-Based Session
 * Runs application logic as an async task on the shared event loop,
 * optionally scheduled through the server's TaskRunner.
 */

import { logger } from '@/shared/utils';
import { BaseSession } from './base-session';
import type { TaskRunner } from './task-runner.service';
import { SessionClosedError } from '../types';
import type { ClientEvent, SessionHandler, SessionIO } from '../types';

interface PendingReceive {
  resolve: (event: ClientEvent) => void;
  reject: (error: Error) => void;
}

export class CoroutineBasedSession extends BaseSession {
  private inbox: ClientEvent[] = [];
  private pendingReceives: PendingReceive[] = [];

  readonly io: SessionIO = {
    sessionId: this.sessionId,
    send: (command) => this.enqueue(command),
    receive: () => this.receive(),
    close: () => this.close(),
    isClosed: () => this.closed,
  };

  constructor(sessionId: string, handler: SessionHandler, runner?: TaskRunner) {
    super(sessionId);

    const task = runner ? runner.submit(() => this.run(handler)) : this.run(handler);
    task.catch((error: unknown) => {
      logger.error('Coroutine session task escaped its handler', error, { sessionId });
    });
  }

  /**
   * Deliver a client event to the waiting receive(), or queue it
   */
  push(event: ClientEvent): void {
    if (this.closed) {
      logger.debug('Event pushed to closed session ignored', {
        sessionId: this.sessionId,
        event: event.event,
      });
      return;
    }

    const pending = this.pendingReceives.shift();
    if (pending) {
      pending.resolve(event);
    } else {
      this.inbox.push(event);
    }
  }

  private receive(): Promise<ClientEvent> {
    const queued = this.inbox.shift();
    if (queued) {
      return Promise.resolve(queued);
    }
    if (this.closed) {
      return Promise.reject(new SessionClosedError(this.sessionId));
    }
    return new Promise<ClientEvent>((resolve, reject) => {
      this.pendingReceives.push({ resolve, reject });
    });
  }

  private async run(handler: SessionHandler): Promise<void> {
    try {
      await handler(this.io);
      this.finish();
    } catch (error) {
      if (error instanceof SessionClosedError && this.closed) {
        return;
      }
      logger.error('Session task failed', error, { sessionId: this.sessionId });
      this.finish(error);
    }
  }

  protected release(): void {
    const pending = this.pendingReceives;
    this.pendingReceives = [];
    this.inbox = [];
    for (const { reject } of pending) {
      reject(new SessionClosedError(this.sessionId));
    }
  }
}
