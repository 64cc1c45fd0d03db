/**
 * Task Runner
 * Dedicated cooperative execution context for coroutine-based sessions.
 * Started once at boot; tasks are deferred to their own event loop turn and
 * tracked so shutdown can wait for them.
 */

import { logger } from '@/shared/utils';
import { TaskRunnerStoppedError } from '../types';

export type Task = () => void | Promise<void>;

export class TaskRunner {
  private running = false;
  private active: Set<Promise<void>> = new Set();

  start(): void {
    if (this.running) {
      return;
    }
    this.running = true;
    logger.debug('Task runner started');
  }

  get isRunning(): boolean {
    return this.running;
  }

  get pending(): number {
    return this.active.size;
  }

  /**
   * Schedule `task` on a later turn. The returned promise settles with it.
   */
  submit(task: Task): Promise<void> {
    if (!this.running) {
      throw new TaskRunnerStoppedError();
    }

    const tracked: Promise<void> = new Promise<void>((resolve) => setImmediate(resolve))
      .then(task)
      .finally(() => {
        this.active.delete(tracked);
      });
    this.active.add(tracked);
    return tracked;
  }

  /**
   * Refuse new tasks and wait up to `timeoutMs` for running ones.
   * Returns how many were still pending.
   */
  async stop(timeoutMs: number): Promise<number> {
    this.running = false;
    if (this.active.size === 0) {
      logger.debug('Task runner stopped');
      return 0;
    }

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<void>((resolve) => {
      timer = setTimeout(resolve, timeoutMs);
    });

    await Promise.race([Promise.allSettled(Array.from(this.active)), timeout]);
    clearTimeout(timer);

    const remaining = this.active.size;
    if (remaining > 0) {
      logger.warn('Task runner stopped with pending tasks', { remaining });
    } else {
      logger.debug('Task runner stopped');
    }
    return remaining;
  }
}
