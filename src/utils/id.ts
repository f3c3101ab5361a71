import { randomUUID } from 'node:crypto';

/**
 * Generate a unique ID using crypto
 */
export function generateId(): string {
  return randomUUID();
}
