/**
 * Shared Configuration
 * Centralized exports for all configuration
 */

import dotenv from 'dotenv';

// Load environment variables
dotenv.config();

export const SESSION_TYPES = ['coroutine', 'thread'] as const;
export type SessionType = (typeof SESSION_TYPES)[number];

function readNumber(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  return Number(raw);
}

function readBoolean(name: string, fallback: boolean): boolean {
  const raw = process.env[name]?.trim().toLowerCase();
  if (raw === undefined || raw === '') {
    return fallback;
  }
  return raw === 'true' || raw === '1' || raw === 'yes';
}

function readSessionType(): SessionType | string {
  return process.env.SESSION_TYPE?.trim().toLowerCase() || 'coroutine';
}

/**
 * Environment variables
 */
export const env = {
  NODE_ENV: process.env.NODE_ENV || 'development',
  HOST: process.env.HOST || 'localhost',
  PORT: readNumber('PORT', 8080),
  CORS_ORIGIN: process.env.CORS_ORIGIN || '*',
  STATIC_DIR: process.env.STATIC_DIR || undefined,

  // Sessions
  SESSION_TYPE: readSessionType(),
  SESSION_EXPIRE_SECONDS: readNumber('SESSION_EXPIRE_SECONDS', 60 * 60 * 4),
  REMOVE_EXPIRED_SESSIONS_INTERVAL: readNumber('REMOVE_EXPIRED_SESSIONS_INTERVAL', 120),
  DISABLE_TASK_RUNNER: readBoolean('DISABLE_TASK_RUNNER', false),
  PUSH_TIMEOUT_MS: readNumber('PUSH_TIMEOUT_MS', 5000),
  IO_PATH: process.env.IO_PATH || '/io',

  // Logging
  LOG_LEVEL: process.env.LOG_LEVEL || 'info',
} as const;

export function isSessionType(value: string): value is SessionType {
  return SESSION_TYPES.some((type) => type === value);
}

/**
 * Validate environment variables
 */
export function validateEnv(): void {
  const problems: string[] = [];

  if (!Number.isInteger(env.PORT) || env.PORT < 0 || env.PORT > 65535) {
    problems.push(`PORT must be an integer between 0 and 65535`);
  }

  if (!isSessionType(env.SESSION_TYPE)) {
    problems.push(`SESSION_TYPE must be one of ${SESSION_TYPES.join(', ')}`);
  }

  const positive: (keyof typeof env)[] = [
    'SESSION_EXPIRE_SECONDS',
    'REMOVE_EXPIRED_SESSIONS_INTERVAL',
    'PUSH_TIMEOUT_MS',
  ];
  for (const key of positive) {
    const value = env[key];
    if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
      problems.push(`${key} must be a positive number`);
    }
  }

  if (!env.IO_PATH.startsWith('/')) {
    problems.push('IO_PATH must start with "/"');
  }

  if (problems.length > 0) {
    throw new Error(`Invalid environment configuration: ${problems.join('; ')}`);
  }
}

/**
 * Server options derived from the environment at startup
 */
export function loadServerOptions(): {
  host: string;
  port: number;
  ioPath: string;
  corsOrigin: string;
  staticDir?: string;
} {
  return {
    host: env.HOST,
    port: env.PORT,
    ioPath: env.IO_PATH,
    corsOrigin: env.CORS_ORIGIN,
    staticDir: env.STATIC_DIR,
  };
}

export * from './server';
