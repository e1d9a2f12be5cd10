/**
 * Common utilities
 */

import { v7 as uuidv7 } from 'uuid';

/**
 * Generate a UUIDv7 (time-ordered), used to correlate the log lines of one
 * rebuild or reload.
 */
export function generateId(): string {
  return uuidv7();
}
