/**
 * Worker Spawner
 * Starts the session worker entry point in a new worker thread
 */

import { Worker } from 'worker_threads';
import { createRequire } from 'module';
import { pathToFileURL } from 'url';
import type { SessionWorkerData, WorkerHandle } from '../types';

const WORKER_ENTRY = new URL('../workers/session.worker.ts', import.meta.url);
const TSX_API = pathToFileURL(createRequire(import.meta.url).resolve('tsx/esm/api'));

/**
 * The entry point is TypeScript, so the thread starts from a plain script
 * that registers tsx before importing it. `--import tsx` in execArgv is not
 * enough: Node resolves the worker's entry URL before that hook is active.
 */
export function buildWorkerBootstrap(entry: URL = WORKER_ENTRY, tsxApi: URL = TSX_API): string {
  return [
    `import(${JSON.stringify(tsxApi.href)})`,
    '  .then((api) => (api.register ?? api.default.register)())',
    `  .then(() => import(${JSON.stringify(entry.href)}));`,
  ].join('\n');
}

export function spawnSessionWorker(data: SessionWorkerData): WorkerHandle {
  const worker = new Worker(buildWorkerBootstrap(), {
    eval: true,
    workerData: data,
  });
  let exited = false;
  worker.on('exit', () => {
    exited = true;
  });

  return {
    postMessage: (message) => {
      if (!exited) {
        worker.postMessage(message);
      }
    },
    onMessage: (listener) => {
      worker.on('message', listener);
    },
    onError: (listener) => {
      worker.on('error', listener);
    },
    onExit: (listener) => {
      worker.on('exit', listener);
    },
    terminate: () => worker.terminate(),
  };
}
