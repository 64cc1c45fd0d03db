/**
 * Shared Utilities
 */

export { logger, Logger, LogLevel, parseLogLevel } from './logger';
export type { LogMeta } from './logger';
export { generateId, generateSessionToken } from './uuid';
