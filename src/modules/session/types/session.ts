/**
 * Session Types
 */

import type { SessionType } from '@/shared/config';

export type { SessionType };

// ============================================================================
// Wire Messages
// ============================================================================

/**
 * Client-originated event delivered by POST
 */
export interface ClientEvent {
  event: string;
  task_id?: string;
  data?: unknown;
}

/**
 * Server-originated instruction delivered in a poll response
 */
export interface Command {
  command: string;
  task_id?: string;
  spec?: Record<string, unknown>;
}

// ============================================================================
// Session Contract
// ============================================================================

/**
 * What the request dispatcher sees of a session, whatever runs it
 */
export interface WebIOSession {
  push(event: ClientEvent): void | Promise<void>;
  pull(): Command[];
  isClosed(): boolean;
  close(): void;
}

/**
 * Handle given to application logic running inside a session
 */
export interface SessionIO {
  readonly sessionId: string;
  send(command: Command): void;
  receive(): Promise<ClientEvent>;
  close(): void;
  isClosed(): boolean;
}

export type SessionHandler = (io: SessionIO) => void | Promise<void>;

export type SessionFactory = (sessionId: string) => WebIOSession;

/**
 * Application bound to the polling endpoint.
 * Thread-based sessions load `workerModule` inside a worker thread, since
 * functions cannot cross thread boundaries.
 */
export interface SessionApp {
  handler: SessionHandler;
  workerModule?: string;
  workerExport?: string;
}

// ============================================================================
// Session Context
// ============================================================================

export interface SessionContextConfig {
  expireMs: number;        // Idle budget before a session is evicted
  sweepIntervalMs: number; // Minimum gap between two eviction sweeps
  now: () => number;       // Clock in milliseconds
}

export interface SessionContextStats {
  active: number;
  lastSweepAt: number;
  created: number;
  closed: number;
  evicted: number;
}
