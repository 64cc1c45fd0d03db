/**
 * UUID Utility
 * Centralized identifier generation
 */

import { v4 as uuidv4 } from 'uuid';

/**
 * Generate a random UUID v4
 */
export function generateId(): string {
  return uuidv4();
}

/**
 * Generate an opaque session token: a UUID v4 without dashes
 * (32 hex characters, 122 random bits)
 */
export function generateSessionToken(): string {
  return uuidv4().replace(/-/g, '');
}
