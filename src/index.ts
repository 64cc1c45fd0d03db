import { fileURLToPath } from 'url';
import { env, isSessionType, loadServerOptions, validateEnv } from '@/shared/config';
import { logger } from '@/shared/utils';
import { createIoServer, shutdownIoServer, startIoServer } from '@/modules/io';
import { echoApp } from '@/apps/echo.app';

// Validate environment variables
try {
  validateEnv();
} catch (error) {
  logger.error('Environment validation failed', error);
  process.exit(1);
}

const sessionType = isSessionType(env.SESSION_TYPE) ? env.SESSION_TYPE : 'coroutine';

const server = createIoServer({
  ...loadServerOptions(),
  app: {
    handler: echoApp,
    workerModule: fileURLToPath(new URL('./apps/echo.app.ts', import.meta.url)),
  },
  sessionType,
  expireSeconds: env.SESSION_EXPIRE_SECONDS,
  sweepIntervalSeconds: env.REMOVE_EXPIRED_SESSIONS_INTERVAL,
  disableTaskRunner: env.DISABLE_TASK_RUNNER,
  pushTimeoutMs: env.PUSH_TIMEOUT_MS,
});

let shuttingDown = false;

// Graceful shutdown handler
async function gracefulShutdown(signal: string): Promise<void> {
  if (shuttingDown) {
    return;
  }
  shuttingDown = true;
  logger.info(`${signal} received, starting graceful shutdown`);

  try {
    await shutdownIoServer(server);
    logger.info('Graceful shutdown completed');
    process.exit(0);
  } catch (error) {
    logger.error('Error during graceful shutdown', error);
    process.exit(1);
  }
}

// Register shutdown handlers
process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => void gracefulShutdown('SIGINT'));

// Handle uncaught errors
process.on('uncaughtException', (error: Error) => {
  logger.error('Uncaught exception', error);
  void gracefulShutdown('UNCAUGHT_EXCEPTION');
});

process.on('unhandledRejection', (reason: unknown) => {
  logger.error('Unhandled rejection', { reason });
  void gracefulShutdown('UNHANDLED_REJECTION');
});

// Start server
startIoServer(server)
  .then((address) => {
    logger.info('Polling backend ready', {
      port: address.port,
      environment: env.NODE_ENV,
    });
  })
  .catch((error: unknown) => {
    logger.error('Failed to start server', error);
    process.exit(1);
  });
