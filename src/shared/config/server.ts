/**
 * HTTP Server Configuration
 */

/**
 * Polling endpoint configuration
 */
export const ioConfig = {
  // Header carrying the session identifier in both directions
  sessionHeader: 'webio-session-id',

  // Liveness probe query parameter and its literal reply
  testQueryParam: 'test',
  testResponse: 'ok',

  // Maximum accepted JSON body for client events
  maxBodySize: '1mb',
};

/**
 * HTTP server shutdown configuration
 */
export const httpShutdownConfig = {
  // Force close after this many milliseconds
  shutdownTimeout: 5000,

  // Time allowed for running coroutine sessions to settle on shutdown
  taskRunnerStopTimeout: 2000,
};
