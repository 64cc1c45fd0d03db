/**
 * Polling Endpoint Types
 */

export * from './io.types';
export * from './error.types';
