/**
 * Thread-Based Session Tests
 * The worker thread is replaced by an in-process fake
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { ThreadBasedSession } from '@/modules/session/services/thread-session.service';
import { SessionBusyError } from '@/modules/session/types';
import type { SessionWorkerData } from '@/modules/session/types';
import { FakeWorker } from '../utils/session-mock';

describe('ThreadBasedSession', () => {
  let worker: FakeWorker;
  let spawned: SessionWorkerData[];

  const createSession = (overrides: { queueCapacity?: number; pushTimeoutMs?: number } = {}) =>
    new ThreadBasedSession('t1', {
      spawn: (data) => {
        spawned.push(data);
        return worker;
      },
      modulePath: '/srv/app.ts',
      exportName: 'main',
      ...overrides,
    });

  beforeEach(() => {
    worker = new FakeWorker();
    spawned = [];
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should start one worker with the session and module details', () => {
    createSession();

    expect(spawned).toEqual([{ sessionId: 't1', modulePath: '/srv/app.ts', exportName: 'main' }]);
  });

  describe('push', () => {
    it('should forward events to the worker in order', async () => {
      const session = createSession();

      await session.push({ event: 'click', task_id: 'btn' });
      await session.push({ event: 'input', data: 'hi' });

      expect(worker.posted).toEqual([
        { type: 'event', event: { event: 'click', task_id: 'btn' } },
        { type: 'event', event: { event: 'input', data: 'hi' } },
      ]);
      expect(session.pendingEvents).toBe(2);
    });

    it('should wait for an ack when the queue is full', async () => {
      const session = createSession({ queueCapacity: 1, pushTimeoutMs: 1000 });
      await session.push({ event: 'first' });

      const second = session.push({ event: 'second' });
      expect(worker.postedEvents()).toEqual(['first']);

      worker.emitMessage({ type: 'ack' });
      await second;

      expect(worker.postedEvents()).toEqual(['first', 'second']);
      expect(session.pendingEvents).toBe(1);
    });

    it('should reject with SessionBusyError when no ack arrives in time', async () => {
      const session = createSession({ queueCapacity: 1, pushTimeoutMs: 20 });
      await session.push({ event: 'first' });

      await expect(session.push({ event: 'second' })).rejects.toBeInstanceOf(SessionBusyError);
      expect(worker.postedEvents()).toEqual(['first']);
    });

    it('should give up waiting quietly when the session closes', async () => {
      const session = createSession({ queueCapacity: 1, pushTimeoutMs: 1000 });
      await session.push({ event: 'first' });

      const second = session.push({ event: 'second' });
      session.close();
      await second;

      expect(worker.postedEvents()).toEqual(['first']);
    });
  });

  describe('worker messages', () => {
    it('should buffer commands until pulled', () => {
      const session = createSession();

      worker.emitMessage({ type: 'command', command: { command: 'a' } });
      worker.emitMessage({ type: 'command', command: { command: 'b', spec: { n: 1 } } });

      expect(session.pull()).toEqual([{ command: 'a' }, { command: 'b', spec: { n: 1 } }]);
      expect(session.pull()).toEqual([]);
    });

    it('should close and stop the worker when the application is done', () => {
      const session = createSession();

      worker.emitMessage({ type: 'command', command: { command: 'last' } });
      worker.emitMessage({ type: 'done' });

      expect(session.isClosed()).toBe(true);
      expect(session.pull()).toEqual([{ command: 'last' }, { command: 'close_session' }]);
      expect(worker.posted.at(-1)).toEqual({ type: 'close' });
      expect(worker.terminate).toHaveBeenCalledTimes(1);
    });

    it('should report an application error before closing', () => {
      const session = createSession();

      worker.emitMessage({ type: 'error', message: 'bad input' });

      expect(session.pull()).toEqual([
        { command: 'output', spec: { type: 'error', content: 'bad input' } },
        { command: 'close_session' },
      ]);
    });

    it('should ignore unrecognised messages', () => {
      const session = createSession();

      worker.emitMessage({ type: 'gossip' });
      worker.emitMessage('not even an object');

      expect(session.pull()).toEqual([]);
      expect(session.isClosed()).toBe(false);
    });
  });

  describe('worker lifecycle', () => {
    it('should close with an error when the worker exits unexpectedly', () => {
      const session = createSession();

      worker.emitExit(1);

      expect(session.pull()).toEqual([
        { command: 'output', spec: { type: 'error', content: 'Session worker exited with code 1' } },
        { command: 'close_session' },
      ]);
    });

    it('should close cleanly on a zero exit code', () => {
      const session = createSession();

      worker.emitExit(0);

      expect(session.pull()).toEqual([{ command: 'close_session' }]);
    });

    it('should close when the worker raises an error event', () => {
      const session = createSession();

      worker.emitError(new Error('worker crashed'));

      expect(session.isClosed()).toBe(true);
      expect(session.pull()[0]).toEqual({
        command: 'output',
        spec: { type: 'error', content: 'worker crashed' },
      });
    });

    it('should terminate the worker once when closed externally', () => {
      const session = createSession();

      session.close();
      session.close();
      worker.emitExit(1);

      expect(worker.terminate).toHaveBeenCalledTimes(1);
      expect(session.pull()).toEqual([{ command: 'close_session' }]);
    });
  });
});
