/**
 * Client Event Validation
 */

import type { ClientEvent } from '@/modules/session';
import { InvalidEventError } from '../types';

/**
 * Check a parsed POST body and copy out the client event fields
 */
export function parseClientEvent(body: unknown): ClientEvent {
  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    throw new InvalidEventError('body must be a JSON object');
  }
  if (!('event' in body) || typeof body.event !== 'string' || body.event === '') {
    throw new InvalidEventError('"event" must be a non-empty string');
  }

  const event: ClientEvent = { event: body.event };

  if ('task_id' in body && body.task_id !== undefined && body.task_id !== null) {
    if (typeof body.task_id !== 'string') {
      throw new InvalidEventError('"task_id" must be a string');
    }
    event.task_id = body.task_id;
  }
  if ('data' in body) {
    event.data = body.data;
  }

  return event;
}
