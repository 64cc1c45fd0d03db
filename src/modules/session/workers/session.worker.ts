/**
 * Session worker thread entry point.
 *
 * Loads the application module named in workerData, runs its exported
 * handler against a SessionIO backed by the parent port and reports back
 * with the protocol described in types/thread.ts.
 */

import { parentPort, workerData } from 'worker_threads';
import { resolve } from 'path';
import { pathToFileURL } from 'url';
import { SessionClosedError, isParentToWorkerMessage, isSessionWorkerData } from '../types';
import type { ClientEvent, SessionHandler, SessionIO } from '../types';

if (!parentPort) {
  throw new Error('session.worker.ts must run as a worker thread (parentPort is null).');
}
if (!isSessionWorkerData(workerData)) {
  throw new Error('session.worker.ts started without session worker data.');
}

const port = parentPort;
const { sessionId, modulePath, exportName } = workerData;

const inbox: ClientEvent[] = [];
let waiting: { resolve: (event: ClientEvent) => void; reject: (error: Error) => void } | null =
  null;
let closed = false;

function isSessionHandler(value: unknown): value is SessionHandler {
  return typeof value === 'function';
}

function closeLocally(): void {
  closed = true;
  waiting?.reject(new SessionClosedError(sessionId));
  waiting = null;
}

port.on('message', (message: unknown) => {
  if (!isParentToWorkerMessage(message)) {
    return;
  }

  if (message.type === 'close') {
    closeLocally();
    port.close();
    return;
  }

  if (waiting) {
    const { resolve: deliver } = waiting;
    waiting = null;
    port.postMessage({ type: 'ack' });
    deliver(message.event);
  } else {
    inbox.push(message.event);
  }
});

const io: SessionIO = {
  sessionId,
  send: (command) => {
    if (!closed) {
      port.postMessage({ type: 'command', command });
    }
  },
  receive: () => {
    const queued = inbox.shift();
    if (queued) {
      port.postMessage({ type: 'ack' });
      return Promise.resolve(queued);
    }
    if (closed) {
      return Promise.reject(new SessionClosedError(sessionId));
    }
    return new Promise<ClientEvent>((resolveEvent, reject) => {
      waiting = { resolve: resolveEvent, reject };
    });
  },
  close: () => {
    if (!closed) {
      closeLocally();
      port.postMessage({ type: 'done' });
    }
  },
  isClosed: () => closed,
};

async function main(): Promise<void> {
  const loaded: unknown = await import(pathToFileURL(resolve(modulePath)).href);
  const handler: unknown =
    typeof loaded === 'object' && loaded !== null ? Reflect.get(loaded, exportName) : undefined;

  if (!isSessionHandler(handler)) {
    throw new Error(`Module ${modulePath} has no function export "${exportName}"`);
  }

  await handler(io);
  if (!closed) {
    closed = true;
    port.postMessage({ type: 'done' });
  }
}

main().catch((error: unknown) => {
  if (error instanceof SessionClosedError && closed) {
    return;
  }
  port.postMessage({
    type: 'error',
    message: error instanceof Error ? error.message : String(error),
  });
});
