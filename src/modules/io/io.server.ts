/**
 * Polling Server
 * Builds the explicitly scoped server context (sessions, task runner,
 * dispatcher, Express app, HTTP server) and owns its start/stop lifecycle.
 */

import express from 'express';
import cors from 'cors';
import { createServer } from 'http';
import type { Server as HTTPServer } from 'http';
import type { AddressInfo } from 'net';
import type { Express } from 'express';
import { httpShutdownConfig, ioConfig } from '@/shared/config';
import { logger } from '@/shared/utils';
import {
  SESSION_CONSTANTS,
  SessionContext,
  TaskRunner,
  createSessionFactory,
} from '@/modules/session';
import type {
  SessionApp,
  SessionContextStats,
  SessionType,
  WorkerSpawner,
} from '@/modules/session';
import { IoDispatcher } from './services';
import { createIoController, methodNotAllowed } from './controllers';
import { ioErrorHandler } from './handlers';

export interface IoServerOptions {
  app: SessionApp;
  host?: string;
  port?: number;
  ioPath?: string;
  corsOrigin?: string;
  staticDir?: string;
  sessionType?: SessionType;
  expireSeconds?: number;
  sweepIntervalSeconds?: number;
  disableTaskRunner?: boolean;
  pushTimeoutMs?: number;
  now?: () => number;
  spawnWorker?: WorkerSpawner;
}

export type ResolvedIoServerOptions = Required<
  Omit<IoServerOptions, 'app' | 'staticDir' | 'now' | 'spawnWorker'>
> &
  Pick<IoServerOptions, 'staticDir'>;

export interface IoServer {
  app: Express;
  httpServer: HTTPServer;
  sessions: SessionContext;
  runner: TaskRunner;
  dispatcher: IoDispatcher;
  options: ResolvedIoServerOptions;
}

function resolveOptions(options: IoServerOptions): ResolvedIoServerOptions {
  return {
    host: options.host ?? 'localhost',
    port: options.port ?? 8080,
    ioPath: options.ioPath ?? '/io',
    corsOrigin: options.corsOrigin ?? '*',
    staticDir: options.staticDir,
    sessionType: options.sessionType ?? 'coroutine',
    expireSeconds: options.expireSeconds ?? SESSION_CONSTANTS.DEFAULT_EXPIRE_SECONDS,
    sweepIntervalSeconds:
      options.sweepIntervalSeconds ?? SESSION_CONSTANTS.DEFAULT_SWEEP_INTERVAL_SECONDS,
    disableTaskRunner: options.disableTaskRunner ?? false,
    pushTimeoutMs: options.pushTimeoutMs ?? SESSION_CONSTANTS.PUSH_TIMEOUT_MS,
  };
}

/**
 * The cooperative runner only serves coroutine sessions
 */
function usesTaskRunner(options: ResolvedIoServerOptions): boolean {
  return options.sessionType === 'coroutine' && !options.disableTaskRunner;
}

export function createIoServer(input: IoServerOptions): IoServer {
  const options = resolveOptions(input);

  const sessions = new SessionContext({
    expireMs: options.expireSeconds * 1000,
    sweepIntervalMs: options.sweepIntervalSeconds * 1000,
    ...(input.now ? { now: input.now } : {}),
  });
  const runner = new TaskRunner();

  const factory = createSessionFactory({
    type: options.sessionType,
    app: input.app,
    runner: usesTaskRunner(options) ? runner : undefined,
    spawnWorker: input.spawnWorker,
    pushTimeoutMs: options.pushTimeoutMs,
  });

  const dispatcher = new IoDispatcher({
    context: sessions,
    factory,
    sessionHeader: ioConfig.sessionHeader,
    pushTimeoutMs: options.pushTimeoutMs,
  });

  const app = express();
  app.use(cors({ origin: options.corsOrigin, exposedHeaders: [ioConfig.sessionHeader] }));

  const server: IoServer = {
    app,
    httpServer: createServer(app),
    sessions,
    runner,
    dispatcher,
    options,
  };

  app.get('/health', (req, res) => {
    res.json({
      status: 'ok',
      uptime: process.uptime(),
      sessions: getIoStats(server),
    });
  });

  const ioController = createIoController(dispatcher);
  app
    .route(options.ioPath)
    .head(methodNotAllowed)
    .get(ioController)
    .post(express.json({ limit: ioConfig.maxBodySize }), ioController)
    .all(methodNotAllowed);

  if (options.staticDir) {
    const root = options.staticDir;
    app.get('/', (req, res, next) => {
      res.sendFile('index.html', { root }, (error) => {
        if (error) {
          next(error);
        }
      });
    });
    app.use(express.static(root));
  }

  app.use(ioErrorHandler);

  return server;
}

/**
 * Start the task runner (when used) and listen
 */
export async function startIoServer(server: IoServer): Promise<AddressInfo> {
  const { httpServer, options } = server;

  if (usesTaskRunner(options)) {
    server.runner.start();
  }

  await new Promise<void>((resolve, reject) => {
    httpServer.once('error', reject);
    httpServer.listen(options.port, options.host, () => {
      httpServer.off('error', reject);
      resolve();
    });
  });

  const address = httpServer.address();
  if (address === null || typeof address === 'string') {
    throw new Error('HTTP server is not listening on a TCP address');
  }

  logger.info('Polling server started', {
    host: address.address,
    port: address.port,
    ioPath: options.ioPath,
    sessionType: options.sessionType,
    taskRunner: usesTaskRunner(options),
  });

  return address;
}

/**
 * Stop accepting requests, close every session, then stop the runner
 */
export async function shutdownIoServer(server: IoServer): Promise<void> {
  const { httpServer, sessions, runner } = server;

  if (httpServer.listening) {
    await new Promise<void>((resolve) => {
      const forceTimer = setTimeout(() => {
        logger.warn('HTTP server force closed after timeout');
        httpServer.closeAllConnections();
        resolve();
      }, httpShutdownConfig.shutdownTimeout);

      httpServer.close(() => {
        clearTimeout(forceTimer);
        logger.info('HTTP server closed');
        resolve();
      });
      httpServer.closeIdleConnections();
    });
  }

  sessions.shutdown();
  await runner.stop(httpShutdownConfig.taskRunnerStopTimeout);
}

export function getIoStats(server: IoServer): SessionContextStats {
  return server.sessions.getStats();
}
