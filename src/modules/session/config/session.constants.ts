/**
 * Session Constants
 */

export const SESSION_CONSTANTS = {
  DEFAULT_EXPIRE_SECONDS: 60 * 60 * 4, // 4 hours idle = evicted
  DEFAULT_SWEEP_INTERVAL_SECONDS: 120, // Sweep at most every 2 minutes

  MAX_ID_ATTEMPTS: 5, // Regenerate on collision at most this many times

  PUSH_TIMEOUT_MS: 5000, // Longest a request waits on a busy thread session
  THREAD_EVENT_QUEUE_CAPACITY: 32, // Unacknowledged events per thread session

  DEFAULT_WORKER_EXPORT: 'default',
} as const;

/**
 * Commands the session layer emits on its own
 */
export const SESSION_COMMANDS = {
  CLOSE_SESSION: 'close_session',
  OUTPUT: 'output',
} as const;
