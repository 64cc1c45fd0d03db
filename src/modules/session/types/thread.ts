/**
 * Worker Thread Message Protocol
 *
 * parent -> worker:
 *   { type: 'event', event: ClientEvent }
 *   { type: 'close' }
 *
 * worker -> parent:
 *   { type: 'command', command: Command }
 *   { type: 'ack' }                       one per consumed event
 *   { type: 'done' }                      application returned
 *   { type: 'error', message: string }    application threw
 */

import type { ClientEvent, Command } from './session';

export type ParentToWorkerMessage =
  | { type: 'event'; event: ClientEvent }
  | { type: 'close' };

export type WorkerToParentMessage =
  | { type: 'command'; command: Command }
  | { type: 'ack' }
  | { type: 'done' }
  | { type: 'error'; message: string };

export interface SessionWorkerData {
  sessionId: string;
  modulePath: string;
  exportName: string;
}

/**
 * Minimal surface of a worker thread used by ThreadBasedSession
 */
export interface WorkerHandle {
  postMessage(message: ParentToWorkerMessage): void;
  onMessage(listener: (message: unknown) => void): void;
  onError(listener: (error: Error) => void): void;
  onExit(listener: (code: number) => void): void;
  terminate(): Promise<number>;
}

export type WorkerSpawner = (data: SessionWorkerData) => WorkerHandle;

function isCommand(value: unknown): value is Command {
  return (
    typeof value === 'object' &&
    value !== null &&
    'command' in value &&
    typeof value.command === 'string'
  );
}

export function isWorkerToParentMessage(value: unknown): value is WorkerToParentMessage {
  if (typeof value !== 'object' || value === null || !('type' in value)) {
    return false;
  }
  switch (value.type) {
    case 'command':
      return 'command' in value && isCommand(value.command);
    case 'error':
      return 'message' in value && typeof value.message === 'string';
    case 'ack':
    case 'done':
      return true;
    default:
      return false;
  }
}

export function isParentToWorkerMessage(value: unknown): value is ParentToWorkerMessage {
  if (typeof value !== 'object' || value === null || !('type' in value)) {
    return false;
  }
  if (value.type === 'close') {
    return true;
  }
  return value.type === 'event' && 'event' in value && typeof value.event === 'object';
}

export function isSessionWorkerData(value: unknown): value is SessionWorkerData {
  return (
    typeof value === 'object' &&
    value !== null &&
    'sessionId' in value &&
    typeof value.sessionId === 'string' &&
    'modulePath' in value &&
    typeof value.modulePath === 'string' &&
    'exportName' in value &&
    typeof value.exportName === 'string'
  );
}
