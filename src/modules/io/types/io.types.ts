/**
 * Polling Endpoint Types
 */

import type { Command, SessionContext, SessionFactory } from '@/modules/session';

export type IoMethod = 'GET' | 'POST';

/**
 * Transport-neutral view of one poll/push request
 */
export interface IoRequest {
  method: IoMethod;
  sessionId?: string;
  body?: unknown;
}

export interface IoResponse {
  status: number;
  body: Command[];
  headers: Record<string, string>;
}

/**
 * How a request relates to the session registry
 */
export enum RequestState {
  NEW_SESSION = 'new_session',
  UNKNOWN_SESSION = 'unknown_session',
  EXISTING_SESSION = 'existing_session',
}

export interface DispatcherOptions {
  context: SessionContext;
  factory: SessionFactory;
  sessionHeader: string;
  pushTimeoutMs: number;
}
