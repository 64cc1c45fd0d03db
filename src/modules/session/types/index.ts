/**
 * Session Module Types
 */

export * from './session';
export * from './thread';
export * from './error.types';
