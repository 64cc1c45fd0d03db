/**
 * Session Registry
 * Owns the identifier -> session mapping and identity assignment
 */

import { generateSessionToken, logger } from '@/shared/utils';
import { SESSION_CONSTANTS } from '../config/session.constants';
import { SessionIdCollisionError } from '../types';
import type { SessionFactory, WebIOSession } from '../types';

export class SessionRegistry {
  private sessions: Map<string, WebIOSession> = new Map();

  constructor(private readonly generateId: () => string = generateSessionToken) {}

  /**
   * Allocate a fresh identifier and bind a session built by `factory` to it.
   * Entropy makes a collision negligible; one is still retried rather than
   * overwriting a live session.
   */
  create(factory: SessionFactory): { sessionId: string; session: WebIOSession } {
    const sessionId = this.allocateId();
    const session = factory(sessionId);
    this.sessions.set(sessionId, session);
    return { sessionId, session };
  }

  lookup(sessionId: string): WebIOSession | undefined {
    return this.sessions.get(sessionId);
  }

  has(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  /**
   * Idempotent: returns false when nothing was registered under the id
   */
  remove(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }

  ids(): string[] {
    return Array.from(this.sessions.keys());
  }

  get size(): number {
    return this.sessions.size;
  }

  clear(): void {
    this.sessions.clear();
  }

  private allocateId(): string {
    for (let attempt = 1; attempt <= SESSION_CONSTANTS.MAX_ID_ATTEMPTS; attempt++) {
      const candidate = this.generateId();
      if (!this.sessions.has(candidate)) {
        return candidate;
      }
      logger.warn('Session id collision, regenerating', { attempt });
    }
    throw new SessionIdCollisionError(SESSION_CONSTANTS.MAX_ID_ATTEMPTS);
  }
}
