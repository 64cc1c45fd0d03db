/**
 * Thread-Based Session
 * Runs application logic in a dedicated worker thread. Client events cross
 * into the worker through a bounded queue; commands come back as messages
 * and are buffered until the next pull.
 */

import { logger } from '@/shared/utils';
import { SESSION_CONSTANTS } from '../config/session.constants';
import { BaseSession } from './base-session';
import { SessionBusyError, isWorkerToParentMessage } from '../types';
import type { ClientEvent, WorkerHandle, WorkerSpawner } from '../types';

export interface ThreadSessionOptions {
  spawn: WorkerSpawner;
  modulePath: string;
  exportName: string;
  queueCapacity?: number;
  pushTimeoutMs?: number;
}

export class ThreadBasedSession extends BaseSession {
  private readonly worker: WorkerHandle;
  private readonly queueCapacity: number;
  private readonly pushTimeoutMs: number;
  private inFlight = 0;
  private capacityWaiters: Array<() => void> = [];

  constructor(sessionId: string, options: ThreadSessionOptions) {
    super(sessionId);
    this.queueCapacity = options.queueCapacity ?? SESSION_CONSTANTS.THREAD_EVENT_QUEUE_CAPACITY;
    this.pushTimeoutMs = options.pushTimeoutMs ?? SESSION_CONSTANTS.PUSH_TIMEOUT_MS;

    this.worker = options.spawn({
      sessionId,
      modulePath: options.modulePath,
      exportName: options.exportName,
    });

    this.worker.onMessage((message) => this.handleWorkerMessage(message));
    this.worker.onError((error) => {
      logger.error('Session worker failed', error, { sessionId });
      this.finish(error);
    });
    this.worker.onExit((code) => {
      if (this.closed) {
        return;
      }
      this.finish(code === 0 ? undefined : new Error(`Session worker exited with code ${code}`));
    });
  }

  /**
   * Hand an event to the worker. Waits for room when the worker has
   * `queueCapacity` unconsumed events, rejecting with SessionBusyError after
   * `pushTimeoutMs`.
   */
  async push(event: ClientEvent): Promise<void> {
    if (this.inFlight >= this.queueCapacity && !this.closed) {
      await this.waitForCapacity();
    }

    if (this.closed) {
      logger.debug('Event pushed to closed session ignored', {
        sessionId: this.sessionId,
        event: event.event,
      });
      return;
    }

    this.inFlight++;
    this.worker.postMessage({ type: 'event', event });
  }

  get pendingEvents(): number {
    return this.inFlight;
  }

  private waitForCapacity(): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const onCapacity = (): void => {
        clearTimeout(timer);
        resolve();
      };
      const timer = setTimeout(() => {
        this.capacityWaiters = this.capacityWaiters.filter((waiter) => waiter !== onCapacity);
        reject(new SessionBusyError(this.sessionId, this.pushTimeoutMs));
      }, this.pushTimeoutMs);
      this.capacityWaiters.push(onCapacity);
    });
  }

  private handleWorkerMessage(message: unknown): void {
    if (!isWorkerToParentMessage(message)) {
      logger.warn('Unrecognised message from session worker', { sessionId: this.sessionId });
      return;
    }

    switch (message.type) {
      case 'command':
        this.enqueue(message.command);
        break;
      case 'ack': {
        this.inFlight = Math.max(0, this.inFlight - 1);
        const waiter = this.capacityWaiters.shift();
        waiter?.();
        break;
      }
      case 'done':
        this.finish();
        break;
      case 'error':
        logger.error('Session task failed', { message: message.message }, {
          sessionId: this.sessionId,
        });
        this.finish(new Error(message.message));
        break;
    }
  }

  protected release(): void {
    const waiters = this.capacityWaiters;
    this.capacityWaiters = [];
    waiters.forEach((waiter) => waiter());

    this.worker.postMessage({ type: 'close' });
    this.worker.terminate().catch((error: unknown) => {
      logger.error('Error terminating session worker', error, { sessionId: this.sessionId });
    });
  }
}
