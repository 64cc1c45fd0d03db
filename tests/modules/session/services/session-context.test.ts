/**
 * Session Context Tests
 * Registry and expiry records must always move as a pair
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { SessionContext } from '@/modules/session/services/session-context.service';
import { RecordingSession } from '../utils/session-mock';

describe('SessionContext', () => {
  let now: number;
  let context: SessionContext;

  const create = (): { sessionId: string; session: RecordingSession } => {
    const session = new RecordingSession();
    const { sessionId } = context.createSession(() => session);
    return { sessionId, session };
  };

  beforeEach(() => {
    now = 0;
    context = new SessionContext({ expireMs: 1000, sweepIntervalMs: 100, now: () => now });
  });

  describe('createSession', () => {
    it('should seed an expiry record at the current time', () => {
      now = 42;
      const { sessionId, session } = create();

      expect(context.lookupSession(sessionId)).toBe(session);
      expect(context.lastActiveAt(sessionId)).toBe(42);
      expect(context.size).toBe(1);
    });
  });

  describe('touchSession', () => {
    it('should refresh and reorder a live session', () => {
      const a = create();
      now = 10;
      const b = create();

      now = 20;
      context.touchSession(a.sessionId);

      expect(context.idsByActivity()).toEqual([b.sessionId, a.sessionId]);
      expect(context.lastActiveAt(a.sessionId)).toBe(20);
    });

    it('should not create a record for an unknown id', () => {
      context.touchSession('ghost');

      expect(context.idsByActivity()).toEqual([]);
    });
  });

  describe('removeSession', () => {
    it('should remove both the session and its record', () => {
      const { sessionId } = create();

      expect(context.removeSession(sessionId)).toBe(true);
      expect(context.lookupSession(sessionId)).toBeUndefined();
      expect(context.lastActiveAt(sessionId)).toBeUndefined();
    });

    it('should leave the same state when called twice', () => {
      const { sessionId } = create();
      const other = create();

      context.removeSession(sessionId);
      const second = context.removeSession(sessionId);

      expect(second).toBe(false);
      expect(context.size).toBe(1);
      expect(context.idsByActivity()).toEqual([other.sessionId]);
      expect(context.getStats().closed).toBe(1);
    });
  });

  describe('sweepIfDue', () => {
    it('should evict and close idle sessions once the interval has passed', () => {
      const stale = create();
      now = 500;
      const fresh = create();

      now = 1050;
      const evicted = context.sweepIfDue();

      expect(evicted).toEqual([stale.sessionId]);
      expect(stale.session.closeCalls).toBe(1);
      expect(fresh.session.closeCalls).toBe(0);
      expect(context.lookupSession(stale.sessionId)).toBeUndefined();
      expect(context.lastActiveAt(stale.sessionId)).toBeUndefined();
      expect(context.getStats()).toEqual({
        active: 1,
        lastSweepAt: 1050,
        created: 2,
        closed: 0,
        evicted: 1,
      });
    });

    it('should skip the sweep until the interval has elapsed again', () => {
      create();
      now = 500;
      const later = create();

      now = 1050;
      context.sweepIfDue();

      now = 1550;
      expect(context.sweepIfDue()).toEqual([later.sessionId]);
      expect(context.getStats().lastSweepAt).toBe(1550);
    });

    it('should not sweep when the interval has not elapsed', () => {
      now = 50;
      const { sessionId } = create();

      now = 100;
      expect(context.sweepIfDue()).toEqual([]);
      expect(context.lookupSession(sessionId)).toBeDefined();
      expect(context.getStats().lastSweepAt).toBe(0);
    });

    it('should tolerate a session removed by the request path first', () => {
      const { sessionId } = create();
      context.removeSession(sessionId);

      now = 5000;
      expect(context.sweepIfDue()).toEqual([]);
      expect(context.size).toBe(0);
    });
  });

  describe('shutdown', () => {
    it('should close and forget every session', () => {
      const a = create();
      const b = create();

      expect(context.shutdown()).toBe(2);
      expect(a.session.closeCalls).toBe(1);
      expect(b.session.closeCalls).toBe(1);
      expect(context.size).toBe(0);
      expect(context.idsByActivity()).toEqual([]);
    });
  });
});
