/**
 * Expiry Tracker Tests
 */

import { describe, it, expect } from 'vitest';
import { ExpiryTracker } from '@/modules/session/services/expiry-tracker.service';

describe('ExpiryTracker', () => {
  describe('touch', () => {
    it('should keep ids ordered from least to most recently active', () => {
      const tracker = new ExpiryTracker();
      tracker.touch('a', 1);
      tracker.touch('b', 2);
      tracker.touch('c', 3);

      tracker.touch('a', 4);

      expect(tracker.ids()).toEqual(['b', 'c', 'a']);
      expect(tracker.lastActiveAt('a')).toBe(4);
    });
  });

  describe('evictExpired', () => {
    it('should remove exactly the expired prefix', () => {
      const tracker = new ExpiryTracker();
      tracker.touch('s1', 100);
      tracker.touch('s2', 200);
      tracker.touch('s3', 300);
      tracker.touch('s4', 400);

      const evicted = tracker.evictExpired(250, 500);

      expect(evicted).toEqual(['s1', 's2']);
      expect(tracker.ids()).toEqual(['s3', 's4']);
    });

    it('should treat an age equal to the budget as expired', () => {
      const tracker = new ExpiryTracker();
      tracker.touch('edge', 0);
      tracker.touch('inside', 1);

      expect(tracker.evictExpired(100, 100)).toEqual(['edge']);
      expect(tracker.has('inside')).toBe(true);
    });

    it('should stop at the first entry still within budget', () => {
      const tracker = new ExpiryTracker();
      tracker.touch('fresh', 1000);
      // Stale by timestamp but behind a fresh entry: never inspected
      tracker.touch('stale', 0);

      expect(tracker.evictExpired(100, 1050)).toEqual([]);
      expect(tracker.ids()).toEqual(['fresh', 'stale']);
    });

    it('should empty the tracker when everything expired', () => {
      const tracker = new ExpiryTracker();
      tracker.touch('x', 0);
      tracker.touch('y', 10);

      expect(tracker.evictExpired(50, 1000)).toEqual(['x', 'y']);
      expect(tracker.size).toBe(0);
    });

    it('should spare a session touched again before the sweep', () => {
      const tracker = new ExpiryTracker();
      tracker.touch('old', 0);
      tracker.touch('other', 10);
      tracker.touch('old', 900);

      expect(tracker.evictExpired(500, 1000)).toEqual(['other']);
      expect(tracker.ids()).toEqual(['old']);
    });
  });

  describe('delete', () => {
    it('should be idempotent', () => {
      const tracker = new ExpiryTracker();
      tracker.touch('a', 1);

      expect(tracker.delete('a')).toBe(true);
      expect(tracker.delete('a')).toBe(false);
      expect(tracker.size).toBe(0);
    });
  });
});
