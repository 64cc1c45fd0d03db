/**
 * Expiry Tracker
 * Access-ordered record of when each session was last active.
 *
 * A Map iterates in insertion order, so deleting and re-inserting on every
 * touch keeps the least recently active id first.
 */

export class ExpiryTracker {
  private lastActive: Map<string, number> = new Map();

  /**
   * Insert or refresh `sessionId`, moving it to the most recently active end
   */
  touch(sessionId: string, now: number): void {
    this.lastActive.delete(sessionId);
    this.lastActive.set(sessionId, now);
  }

  delete(sessionId: string): boolean {
    return this.lastActive.delete(sessionId);
  }

  has(sessionId: string): boolean {
    return this.lastActive.has(sessionId);
  }

  lastActiveAt(sessionId: string): number | undefined {
    return this.lastActive.get(sessionId);
  }

  /**
   * Remove every entry idle for at least `maxIdleMs` and return their ids,
   * oldest first. Stops at the first entry still within budget: everything
   * after it is fresher.
   */
  evictExpired(maxIdleMs: number, now: number): string[] {
    const evicted: string[] = [];

    for (const [sessionId, activeAt] of this.lastActive) {
      if (now - activeAt < maxIdleMs) {
        break;
      }
      this.lastActive.delete(sessionId);
      evicted.push(sessionId);
    }

    return evicted;
  }

  /**
   * Ids from least to most recently active
   */
  ids(): string[] {
    return Array.from(this.lastActive.keys());
  }

  get size(): number {
    return this.lastActive.size;
  }

  clear(): void {
    this.lastActive.clear();
  }
}
