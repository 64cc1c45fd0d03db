/**
 * Base Session
 * Outbound buffer and closed-state bookkeeping shared by both session variants
 */

import { logger } from '@/shared/utils';
import { SESSION_COMMANDS } from '../config/session.constants';
import type { ClientEvent, Command, WebIOSession } from '../types';

export abstract class BaseSession implements WebIOSession {
  private outbox: Command[] = [];
  protected closed = false;

  constructor(readonly sessionId: string) {}

  abstract push(event: ClientEvent): void | Promise<void>;

  /**
   * Drain queued commands in the order they were sent. Never blocks.
   */
  pull(): Command[] {
    const messages = this.outbox;
    this.outbox = [];
    return messages;
  }

  isClosed(): boolean {
    return this.closed;
  }

  /**
   * Close the session. The client is told through a final close_session
   * command; later calls do nothing.
   */
  close(): void {
    if (this.closed) {
      return;
    }
    this.outbox.push({ command: SESSION_COMMANDS.CLOSE_SESSION });
    this.closed = true;
    this.release();
  }

  protected enqueue(command: Command): void {
    if (this.closed) {
      logger.debug('Dropping command sent after close', {
        sessionId: this.sessionId,
        command: command.command,
      });
      return;
    }
    this.outbox.push(command);
  }

  /**
   * Application logic ended. A failure is reported to the client before the
   * session closes.
   */
  protected finish(error?: unknown): void {
    if (this.closed) {
      return;
    }
    if (error !== undefined) {
      const message = error instanceof Error ? error.message : String(error);
      this.enqueue({
        command: SESSION_COMMANDS.OUTPUT,
        spec: { type: 'error', content: message },
      });
    }
    this.close();
  }

  /**
   * Free whatever runs the application. Called once, on close.
   */
  protected abstract release(): void;
}
