/**
 * Session Context
 * Server-scoped owner of the session registry, the expiry tracker and the
 * last-sweep timestamp.
 *
 * Every method that mutates the registry or the tracker is synchronous, so on
 * Node's single event loop each one runs as a critical section: a registry
 * entry and its expiry record are always created and removed together.
 */

import { logger } from '@/shared/utils';
import { SESSION_CONSTANTS } from '../config/session.constants';
import { ExpiryTracker } from './expiry-tracker.service';
import { SessionRegistry } from './session-registry.service';
import type {
  SessionContextConfig,
  SessionContextStats,
  SessionFactory,
  WebIOSession,
} from '../types';

export const DEFAULT_SESSION_CONTEXT_CONFIG: SessionContextConfig = {
  expireMs: SESSION_CONSTANTS.DEFAULT_EXPIRE_SECONDS * 1000,
  sweepIntervalMs: SESSION_CONSTANTS.DEFAULT_SWEEP_INTERVAL_SECONDS * 1000,
  now: () => Date.now(),
};

export class SessionContext {
  private readonly config: SessionContextConfig;
  private readonly registry: SessionRegistry;
  private readonly tracker = new ExpiryTracker();
  private lastSweepAt = 0;
  private counters = { created: 0, closed: 0, evicted: 0 };

  constructor(config: Partial<SessionContextConfig> = {}, registry = new SessionRegistry()) {
    this.config = { ...DEFAULT_SESSION_CONTEXT_CONFIG, ...config };
    this.registry = registry;
  }

  now(): number {
    return this.config.now();
  }

  /**
   * Register a new session and seed its expiry record
   */
  createSession(factory: SessionFactory): { sessionId: string; session: WebIOSession } {
    const created = this.registry.create(factory);
    this.tracker.touch(created.sessionId, this.now());
    this.counters.created++;

    logger.info('Session created', {
      sessionId: created.sessionId,
      activeSessions: this.registry.size,
    });

    return created;
  }

  lookupSession(sessionId: string): WebIOSession | undefined {
    return this.registry.lookup(sessionId);
  }

  /**
   * Refresh a live session's expiry record. Unknown ids are ignored so that
   * no orphan record is ever created.
   */
  touchSession(sessionId: string): void {
    if (this.registry.has(sessionId)) {
      this.tracker.touch(sessionId, this.now());
    }
  }

  /**
   * Remove a session that reported itself closed.
   * Safe to call twice; the second call is a no-op returning false.
   */
  removeSession(sessionId: string): boolean {
    const removedSession = this.registry.remove(sessionId);
    const removedRecord = this.tracker.delete(sessionId);

    if (!removedSession && !removedRecord) {
      logger.debug('Session already removed', { sessionId });
      return false;
    }

    this.counters.closed++;
    logger.info('Session removed', {
      sessionId,
      activeSessions: this.registry.size,
    });
    return true;
  }

  /**
   * Run an eviction sweep when the sweep interval has elapsed since the
   * previous one. Returns the evicted ids.
   */
  sweepIfDue(): string[] {
    const now = this.now();
    if (now - this.lastSweepAt <= this.config.sweepIntervalMs) {
      return [];
    }

    const evicted = this.sweep(now);
    this.lastSweepAt = this.now();
    return evicted;
  }

  /**
   * Evict idle sessions and close them
   */
  sweep(now: number = this.now()): string[] {
    const evicted = this.tracker.evictExpired(this.config.expireMs, now);

    for (const sessionId of evicted) {
      const session = this.registry.lookup(sessionId);
      this.registry.remove(sessionId);
      if (session) {
        this.closeSession(sessionId, session);
      }
    }

    if (evicted.length > 0) {
      this.counters.evicted += evicted.length;
      logger.info('Evicted expired sessions', {
        count: evicted.length,
        activeSessions: this.registry.size,
      });
    }

    return evicted;
  }

  /**
   * Close and forget every session (graceful shutdown)
   */
  shutdown(): number {
    const ids = this.registry.ids();

    for (const sessionId of ids) {
      const session = this.registry.lookup(sessionId);
      if (session) {
        this.closeSession(sessionId, session);
      }
    }

    this.registry.clear();
    this.tracker.clear();
    logger.info('All sessions cleared', { count: ids.length });
    return ids.length;
  }

  get size(): number {
    return this.registry.size;
  }

  /**
   * Ids in the expiry tracker, least recently active first
   */
  idsByActivity(): string[] {
    return this.tracker.ids();
  }

  lastActiveAt(sessionId: string): number | undefined {
    return this.tracker.lastActiveAt(sessionId);
  }

  getStats(): SessionContextStats {
    return {
      active: this.registry.size,
      lastSweepAt: this.lastSweepAt,
      ...this.counters,
    };
  }

  private closeSession(sessionId: string, session: WebIOSession): void {
    try {
      session.close();
    } catch (error) {
      logger.error('Error closing session', error, { sessionId });
    }
  }
}
