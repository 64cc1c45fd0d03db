/**
 * Vitest Setup File
 * Global test configuration and setup
 */

if (!process.env.NODE_ENV) {
  process.env.NODE_ENV = 'test';
}

// Keep test output to failures unless a run asks for more
if (!process.env.LOG_LEVEL) {
  process.env.LOG_LEVEL = 'error';
}

